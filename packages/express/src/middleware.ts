/**
 * Express middleware for database-common servers.
 */

import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import cors from 'cors';
import { ApplicationError, HeaderParseError, isProduction, toErrorBody, toHttpError } from '@database-common/core';
import type { ServiceContainer } from './container';

/**
 * Context attached to Express requests.
 */
export interface ServiceContext {
  /** Shared services (connection pool, caller registrations) */
  container: ServiceContainer;
}

// Extend Express Request type
declare global {
  namespace Express {
    interface Request {
      services?: ServiceContext;
    }
  }
}

/**
 * Attach the service container to every request.
 */
export function createContextMiddleware(container: ServiceContainer): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    req.services = { container };
    next();
  };
}

/**
 * Narrow a request to one that passed through the context middleware.
 */
export function requireServiceContext(
  req: Request
): asserts req is Request & { services: ServiceContext } {
  if (!req.services) {
    throw new ApplicationError('Service context not attached. Did you forget the middleware?', 500);
  }
}

/**
 * Allow any origin and any request header.
 *
 * `cors` only sends Access-Control-Allow-Headers on preflight responses; it is
 * set on every response here.
 */
export function createCorsMiddleware(): RequestHandler {
  const handler = cors({ origin: '*', allowedHeaders: '*' });

  return (req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Access-Control-Allow-Headers', '*');
    handler(req, res, next);
  };
}

/**
 * Log one line per finished request.
 */
export function createRequestLogger(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      console.info(`[Http] ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - start}ms`);
    });
    next();
  };
}

/**
 * Error shape produced by body-parser.
 */
interface BodyParserError extends Error {
  type: string;
  status: number;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

/**
 * Turn malformed or oversized JSON bodies into 400 responses.
 * Mount directly after express.json().
 */
export function createJsonBodyErrorHandler(): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (!isBodyParserError(err) || !err.type.startsWith('entity.')) {
      next(err);
      return;
    }

    console.error(`[Http] Failed to parse JSON: ${err.message}`);
    res.status(400).json({ error: err.message });
  };
}

export interface ErrorHandlerOptions {
  /** Hide stack traces from responses (default: NODE_ENV === 'production') */
  production?: boolean;
}

/**
 * Convert any error reaching the end of the chain into a JSON error response.
 */
export function createErrorHandler(options: ErrorHandlerOptions = {}): ErrorRequestHandler {
  const production = options.production ?? isProduction();

  return (err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const httpError = toHttpError(err);
    console.error(`[Http] ${httpError.name}: ${httpError.message}`);
    res.status(httpError.status).json(toErrorBody(httpError, { production }));
  };
}

/**
 * Async handler wrapper to catch errors.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Read a single request header as a string.
 *
 * @throws HeaderParseError when the header is repeated or missing and required
 */
export function readHeader(req: Request, name: string, required: true): string;
export function readHeader(req: Request, name: string, required?: false): string | undefined;
export function readHeader(req: Request, name: string, required = false): string | undefined {
  const value = req.headers[name.toLowerCase()];
  if (Array.isArray(value)) {
    throw new HeaderParseError(name);
  }
  if (value === undefined && required) {
    throw new HeaderParseError(name);
  }
  return value;
}
