/**
 * Static web asset service.
 *
 * Serves a built front-end directory: real files by path, a 404 for missing
 * files under /assets, and index.html for every other GET so client-side
 * routing works. Mount it after all API routes.
 */

import { resolve } from 'node:path';
import express, { type Request, type Response, type NextFunction, type Router } from 'express';
import { ApplicationError, InternalError, toHttpError } from '@database-common/core';
import { Routes } from './routes';

export interface AssetServiceOptions {
  /** Cache lifetime for files, passed to express.static (default: 0) */
  maxAge?: number | string;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR');
}

/**
 * Build the router serving `wwwroot`.
 */
export function createAssetService(wwwroot: string, options: AssetServiceOptions = {}): Router {
  const root = resolve(wwwroot);
  const indexFile = resolve(root, 'index.html');
  const router = express.Router();

  router.use(express.static(root, { index: false, maxAge: options.maxAge ?? 0 }));

  router.use(Routes.Assets, (req: Request, _res: Response, next: NextFunction) => {
    const file = req.path.replace(/^\//, '');
    next(new ApplicationError(`Failed to find ${file || `${req.baseUrl}${req.path}`}`, 404));
  });

  router.use((req: Request, res: Response, next: NextFunction) => {
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      next();
      return;
    }

    res.sendFile(indexFile, { headers: { 'Content-Type': 'text/html; charset=utf-8' } }, (err?: Error) => {
      if (!err) return;
      next(isMissingFile(err) ? new InternalError('Failed to find index.html', err) : toHttpError(err));
    });
  });

  return router;
}
