/**
 * @database-common/express - Express server bootstrap for database-common.
 *
 * @example
 * ```typescript
 * import type { Pool } from 'mysql2/promise';
 * import { fetchConnectionData, createPool } from '@database-common/core';
 * import {
 *   createHttpServer,
 *   asyncHandler,
 *   registerHealthRoutes,
 *   requireServiceContext,
 *   serviceKey,
 * } from '@database-common/express';
 *
 * const Pricing = serviceKey<Pool>('app:Pricing');
 * const data = await fetchConnectionData();
 * const pool = await createPool(data);
 *
 * const server = await createHttpServer(
 *   (router, { container }) => {
 *     container.registerInstance(Pricing, pool);
 *     registerHealthRoutes(router);
 *     router.get('/api/items', asyncHandler(async (req, res) => {
 *       requireServiceContext(req);
 *       const [rows] = await req.services.container.resolve(Pricing).query('SELECT id, name FROM items LIMIT 10');
 *       res.json(rows);
 *     }));
 *   },
 *   'target/wwwroot',
 *   8080,
 *   { pool }
 * );
 *
 * await server.closed;
 * ```
 */

// Server
export { createHttpServer, createApp } from './server';
export type { HttpServerOptions, RouteConfigurator, RouteContext, ServerHandle } from './server';

// Static assets
export { createAssetService } from './assets';
export type { AssetServiceOptions } from './assets';

// Service container
export { ServiceContainer, type ServiceFactory } from './container';
export { ServiceTokens, serviceKey, type ServiceKey } from './tokens';

// Routes
export { Routes } from './routes';
export type { RouteName, RoutePath } from './routes';

// Middleware
export {
  createContextMiddleware,
  createCorsMiddleware,
  createRequestLogger,
  createJsonBodyErrorHandler,
  createErrorHandler,
  asyncHandler,
  requireServiceContext,
  readHeader,
} from './middleware';
export type { ServiceContext, ErrorHandlerOptions } from './middleware';

// Route handlers
export { healthHandler, registerHealthRoutes } from './handlers';
