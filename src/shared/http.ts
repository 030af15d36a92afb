import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { BadRequestError, HttpError, NotFoundError } from './errors';
import { errorMessage, log } from './log';

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

const JSON_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
};

export function ok(body: unknown): APIGatewayProxyResult {
  return {
    statusCode: 200,
    headers: JSON_HEADERS,
    body: JSON.stringify(body),
  };
}

export function errorResponse(err: HttpError): APIGatewayProxyResult {
  return {
    statusCode: err.statusCode,
    headers: JSON_HEADERS,
    body: JSON.stringify({ error: err.code, message: err.message }),
  };
}

function internalError(): APIGatewayProxyResult {
  return {
    statusCode: 500,
    headers: JSON_HEADERS,
    body: JSON.stringify({ error: 'INTERNAL_ERROR', message: 'An unexpected error occurred' }),
  };
}

// ---------------------------------------------------------------------------
// Request helpers
// ---------------------------------------------------------------------------

/** The parts of an API Gateway proxy event the router reads. */
export type HttpEvent = Pick<
  APIGatewayProxyEvent,
  'httpMethod' | 'path' | 'headers' | 'queryStringParameters' | 'body' | 'isBase64Encoded'
>;

export interface RouteRequest {
  event: HttpEvent;
  params: Record<string, string>;
  query: Record<string, string>;
  /** Parsed JSON body; `undefined` when the request carries none. */
  body: unknown;
}

function parseBody(event: HttpEvent): unknown {
  if (event.body === null || event.body === undefined || event.body === '') {
    return undefined;
  }
  const raw = event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
  try {
    return JSON.parse(raw);
  } catch {
    throw new BadRequestError('Invalid JSON body', 'VALIDATION_ERROR');
  }
}

function compactQuery(event: HttpEvent): Record<string, string> {
  const query: Record<string, string> = {};
  for (const [key, value] of Object.entries(event.queryStringParameters ?? {})) {
    if (value !== undefined) {
      query[key] = value;
    }
  }
  return query;
}

/** Returns the bearer token of the Authorization header, if any. */
export function bearerToken(event: HttpEvent): string | undefined {
  const header = Object.entries(event.headers ?? {}).find(([name]) => name.toLowerCase() === 'authorization')?.[1];
  if (!header || !header.startsWith('Bearer ')) {
    return undefined;
  }
  const token = header.slice('Bearer '.length).trim();
  return token === '' ? undefined : token;
}

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

/** Assignable to `APIGatewayProxyHandler`; callable directly from tests. */
export type ApiHandler = (event: HttpEvent) => Promise<APIGatewayProxyResult>;

export interface Route {
  method: HttpMethod;
  /** Path pattern, e.g. `/api/products/:id`. */
  path: string;
  handle: (req: RouteRequest) => Promise<APIGatewayProxyResult>;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new BadRequestError('Invalid path', 'VALIDATION_ERROR');
  }
}

function matchPath(pattern: string, path: string): Record<string, string> | null {
  const expected = pattern.split('/').filter(Boolean);
  const actual = path.split('/').filter(Boolean);
  if (expected.length !== actual.length) {
    return null;
  }

  const params: Record<string, string> = {};
  for (const [index, segment] of expected.entries()) {
    const value = actual[index] ?? '';
    if (segment.startsWith(':')) {
      params[segment.slice(1)] = decodeSegment(value);
    } else if (segment !== value) {
      return null;
    }
  }
  return params;
}

/**
 * Builds a single Lambda handler that dispatches on method and path, logs
 * each request and renders thrown `HttpError`s.
 */
export function createRouter(service: string, routes: Route[]): ApiHandler {
  return async (event) => {
    const start = Date.now();
    const method = event.httpMethod.toUpperCase();
    const path = event.path;

    try {
      for (const route of routes) {
        if (route.method !== method) continue;
        const params = matchPath(route.path, path);
        if (!params) continue;

        const result = await route.handle({ event, params, query: compactQuery(event), body: parseBody(event) });
        log({ level: 'info', action: `${service}.request`, method, path, statusCode: result.statusCode, durationMs: Date.now() - start });
        return result;
      }

      log({ level: 'warn', action: `${service}.route_not_found`, method, path });
      return errorResponse(new NotFoundError(`No route for ${method} ${path}`));
    } catch (err) {
      if (err instanceof HttpError) {
        log({ level: 'warn', action: `${service}.request`, method, path, statusCode: err.statusCode, error: err.message, durationMs: Date.now() - start });
        return errorResponse(err);
      }
      log({ level: 'error', action: `${service}.error`, method, path, error: errorMessage(err), durationMs: Date.now() - start });
      return internalError();
    }
  };
}
