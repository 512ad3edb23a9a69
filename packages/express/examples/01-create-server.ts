/**
 * Example 01 — Serving routes and a front end
 *
 * Demonstrates:
 * - Registering API routes through the route configurator
 * - Serving a built front end with client-side routing
 * - Waiting for the server to shut down
 */

import type { Request, Response } from 'express';
import { createHttpServer } from '@database-common/express';

// ── 1. Handlers ─────────────────────────────────────────────────

function hello(_req: Request, res: Response): void {
  res.type('text/plain').send('Hello, world!');
}

function echo(req: Request, res: Response): void {
  res.type('text/plain').send(`You said: ${req.params.message}`);
}

function healthCheck(_req: Request, res: Response): void {
  res.json({ status: 'ok' });
}

// ── 2. Start the server ─────────────────────────────────────────
//
// API routes are registered before the asset service, so
// /api/health is never shadowed by a file of the same name.

const server = await createHttpServer(
  (router) => {
    router.get('/api/hello', hello);
    router.get('/api/echo/:message', echo);
    router.get('/api/health', healthCheck);
  },
  'target/wwwroot',
  8080
);

console.log(`Server running at http://localhost:${server.port}`);

process.once('SIGINT', () => {
  server.close().catch((err: unknown) => {
    console.error('Shutdown failed:', err);
    process.exitCode = 1;
  });
});

await server.closed;
