import { z } from 'zod';

export const osrsSearchSchema = z.object({
  username: z.string(),
});

export const ffxivSearchSchema = z.object({
  name: z.string(),
  world: z.string().optional(),
});

export const favoriteSchema = z.object({
  game: z.string().min(1),
  label: z.string().min(1),
  identifier: z.string().min(1),
  payload: z.record(z.unknown()),
});

export const favoritesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
});
