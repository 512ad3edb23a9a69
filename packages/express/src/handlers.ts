/**
 * Ready-made route handlers.
 */

import type { Router, Request, Response } from 'express';
import { Routes } from './routes';
import { ServiceTokens } from './tokens';
import { asyncHandler, requireServiceContext } from './middleware';

/**
 * GET /api/health - run `SELECT 1` against the shared pool.
 *
 * Responds 200 when the query succeeds and 503 when it fails or no pool is
 * registered.
 */
export const healthHandler = asyncHandler(async (req: Request, res: Response) => {
  requireServiceContext(req);
  const pool = req.services.container.tryResolve(ServiceTokens.DatabasePool);

  if (!pool) {
    res.status(503).json({ status: 'unhealthy', database: 'unconfigured' });
    return;
  }

  try {
    await pool.query('SELECT 1');
    res.json({ status: 'healthy', database: 'connected' });
  } catch (err) {
    console.warn(`[Http] Health check query failed: ${err instanceof Error ? err.message : String(err)}`);
    res.status(503).json({ status: 'unhealthy', database: 'disconnected' });
  }
});

/**
 * Register the health route on a router.
 */
export function registerHealthRoutes(router: Router, path: string = Routes.Health): void {
  router.get(path, healthHandler);
}
