/**
 * HTTP server bootstrap.
 *
 * Stands up an Express application with request logging, permissive CORS,
 * JSON body handling, the caller's routes, the static asset service and the
 * JSON error handler, in that order. Caller routes are registered before the
 * asset service, so an API route always wins over a file at the same path.
 */

import { createServer, type Server } from 'node:http';
import express, { type Application, type Router } from 'express';
import { isProduction, toHttpError, type DatabaseConnectionData, type SqlPool } from '@database-common/core';
import { ServiceContainer } from './container';
import { ServiceTokens } from './tokens';
import {
  createContextMiddleware,
  createCorsMiddleware,
  createErrorHandler,
  createJsonBodyErrorHandler,
  createRequestLogger,
} from './middleware';
import { createAssetService, type AssetServiceOptions } from './assets';

/**
 * What a route configurator receives besides the router.
 */
export interface RouteContext {
  /** Shared services; register anything handlers need here */
  container: ServiceContainer;
  app: Application;
}

/**
 * Registers API routes and shared state.
 */
export type RouteConfigurator = (router: Router, context: RouteContext) => void;

export interface HttpServerOptions {
  /** Connection pool made available to handlers through the container */
  pool?: SqlPool;
  /** Connection data made available to handlers through the container */
  connectionData?: DatabaseConnectionData;
  /** Interface to bind (default: 0.0.0.0) */
  host?: string;
  /** Hide stack traces in error responses (default: NODE_ENV === 'production') */
  production?: boolean;
  /** Maximum JSON body size (default: 4096 bytes) */
  jsonLimit?: number | string;
  /** Log one line per request (default: true) */
  logRequests?: boolean;
  /** End the pool when the server is closed (default: true) */
  closePoolOnShutdown?: boolean;
  /** Static asset service options */
  assets?: AssetServiceOptions;
}

/**
 * A listening server.
 */
export interface ServerHandle {
  app: Application;
  server: Server;
  /** Port actually bound (differs from the requested one when 0 was passed) */
  port: number;
  /** Resolves once the server has shut down */
  closed: Promise<void>;
  /** Stop accepting connections, then end the pool */
  close(): Promise<void>;
}

/**
 * Build the Express application without binding a socket.
 */
export function createApp(
  configure: RouteConfigurator,
  wwwroot: string,
  options: HttpServerOptions = {}
): Application {
  const app = express();
  const container = new ServiceContainer();

  container.registerInstance(ServiceTokens.ExpressApp, app);
  if (options.pool) {
    container.registerInstance(ServiceTokens.DatabasePool, options.pool);
  }
  if (options.connectionData) {
    container.registerInstance(ServiceTokens.ConnectionData, options.connectionData);
  }

  if (options.logRequests ?? true) {
    app.use(createRequestLogger());
  }
  app.use(createCorsMiddleware());
  app.use(express.json({ limit: options.jsonLimit ?? 4096 }));
  app.use(createJsonBodyErrorHandler());
  app.use(createContextMiddleware(container));

  const router = express.Router();
  configure(router, { container, app });
  app.use(router);

  app.use(createAssetService(wwwroot, options.assets));
  app.use(createErrorHandler({ production: options.production ?? isProduction() }));

  return app;
}

/**
 * Create the application and start listening on `port`.
 *
 * @example
 * ```typescript
 * const data = await fetchConnectionData();
 * const pool = await createPool(data);
 *
 * const handle = await createHttpServer(
 *   (router) => {
 *     router.get('/api/health', healthHandler);
 *   },
 *   'target/wwwroot',
 *   8080,
 *   { pool }
 * );
 * await handle.closed;
 * ```
 *
 * @throws IoError when the port cannot be bound
 * @throws ApplicationError when the port is out of range
 */
export async function createHttpServer(
  configure: RouteConfigurator,
  wwwroot: string,
  port: number,
  options: HttpServerOptions = {}
): Promise<ServerHandle> {
  const host = options.host ?? '0.0.0.0';
  const app = createApp(configure, wwwroot, options);
  const server = createServer(app);
  const closed = new Promise<void>((resolve) => {
    server.once('close', () => resolve());
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      server.off('listening', onListening);
      reject(toHttpError(err));
    };
    const onListening = () => {
      server.off('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
    try {
      server.listen(port, host);
    } catch (err) {
      // Out-of-range ports throw synchronously instead of emitting 'error'
      server.off('error', onError);
      server.off('listening', onListening);
      reject(toHttpError(err));
    }
  });

  const address = server.address();
  const boundPort = address !== null && typeof address === 'object' ? address.port : port;
  console.info(`[Server] Listening on http://${host}:${boundPort}`);

  return {
    app,
    server,
    port: boundPort,
    closed,
    async close() {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(toHttpError(err)) : resolve()));
        server.closeIdleConnections();
      });
      console.info('[Server] Stopped');

      if (options.pool && (options.closePoolOnShutdown ?? true)) {
        await options.pool.end();
      }
    },
  };
}
