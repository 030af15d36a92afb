import type { z } from 'zod';
import { BadRequestError } from './errors';

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; message: string };

export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): ValidationResult<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }

  const issue = parsed.error.issues[0];
  if (!issue) {
    return { ok: false, message: 'Invalid request' };
  }
  const field = issue.path.join('.');
  return { ok: false, message: field ? `${field}: ${issue.message}` : issue.message };
}

/** Like `validate`, but throws a 400 `VALIDATION_ERROR` on failure. */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const validation = validate(schema, input);
  if (!validation.ok) {
    throw new BadRequestError(validation.message, 'VALIDATION_ERROR');
  }
  return validation.value;
}
