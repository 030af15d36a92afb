/**
 * Local HTTP adapter: serves one of the Lambda handlers on PORT.
 *
 *   node dist/src/dev-server.js storefront
 *   node dist/src/dev-server.js game-stats
 */
import http from 'http';
import { URL } from 'url';
import { z } from 'zod';
import type { ApiHandler, HttpEvent } from './shared/http';
import { errorMessage, log } from './shared/log';

const serviceSchema = z.enum(['storefront', 'game-stats']);
const portSchema = z.coerce.number().int().positive().default(8000);

interface LoadedService {
  handler: ApiHandler;
  store: { close(): void };
}

async function loadService(name: z.output<typeof serviceSchema>): Promise<LoadedService> {
  return name === 'storefront' ? import('./storefront') : import('./game-stats');
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}

async function toEvent(req: http.IncomingMessage): Promise<HttpEvent> {
  const url = new URL(req.url ?? '/', 'http://localhost');
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    if (typeof value === 'string') headers[name] = value;
  }
  const query = Object.fromEntries(url.searchParams.entries());
  const body = await readBody(req);

  return {
    httpMethod: req.method ?? 'GET',
    path: url.pathname,
    headers,
    queryStringParameters: Object.keys(query).length > 0 ? query : null,
    body: body === '' ? null : body,
    isBase64Encoded: false,
  };
}

async function main(): Promise<void> {
  const name = serviceSchema.parse(process.argv[2]);
  const port = portSchema.parse(process.env['PORT']);
  const { handler, store } = await loadService(name);

  const server = http.createServer((req, res) => {
    toEvent(req)
      .then(handler)
      .then((result) => {
        const headers = Object.fromEntries(Object.entries(result.headers ?? {}).map(([key, value]) => [key, String(value)]));
        res.writeHead(result.statusCode, headers);
        res.end(result.body);
      })
      .catch((err: unknown) => {
        log({ level: 'error', action: 'dev_server.error', error: errorMessage(err) });
        res.writeHead(500, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'INTERNAL_ERROR', message: 'An unexpected error occurred' }));
      });
  });

  const shutdown = (): void => {
    server.close(() => {
      store.close();
      log({ level: 'info', action: 'dev_server.stop', service: name });
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  server.listen(port, () => {
    log({ level: 'info', action: 'dev_server.start', service: name, port });
  });
}

main().catch((err: unknown) => {
  log({ level: 'error', action: 'dev_server.fatal', error: errorMessage(err) });
  process.exitCode = 1;
});
