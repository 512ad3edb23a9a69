/**
 * Tests for Express middleware.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import express, { type Express, type Request, type Response } from 'express';
import request from 'supertest';
import { ApplicationError, InternalError } from '@database-common/core';
import {
  createContextMiddleware,
  createCorsMiddleware,
  createErrorHandler,
  createJsonBodyErrorHandler,
  createRequestLogger,
  asyncHandler,
  readHeader,
  requireServiceContext,
} from '../src/middleware';
import { ServiceContainer } from '../src/container';
import { ServiceTokens } from '../src/tokens';
import { createMockPool } from './fixtures';

function createTestApp(): Express {
  const app = express();
  app.use(express.json({ limit: 64 }));
  app.use(createJsonBodyErrorHandler());
  return app;
}

describe('Middleware', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createContextMiddleware', () => {
    it('attaches the service container to the request', async () => {
      const app = createTestApp();
      const container = new ServiceContainer();
      const pool = createMockPool();
      container.registerInstance(ServiceTokens.DatabasePool, pool);

      app.use(createContextMiddleware(container));
      app.get('/test', (req: Request, res: Response) => {
        res.json({
          hasContext: req.services !== undefined,
          hasPool: req.services?.container.has(ServiceTokens.DatabasePool) ?? false,
        });
      });

      const response = await request(app).get('/test');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ hasContext: true, hasPool: true });
    });
  });

  describe('requireServiceContext', () => {
    it('rejects requests that skipped the context middleware', async () => {
      const app = createTestApp();
      app.get('/test', (req: Request, res: Response) => {
        requireServiceContext(req);
        res.json({ ok: true });
      });
      app.use(createErrorHandler({ production: true }));

      const response = await request(app).get('/test');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        message: 'Service context not attached. Did you forget the middleware?',
      });
    });
  });

  describe('createCorsMiddleware', () => {
    it('allows any origin', async () => {
      const app = createTestApp();
      app.use(createCorsMiddleware());
      app.get('/test', (_req: Request, res: Response) => {
        res.json({ ok: true });
      });

      const response = await request(app).get('/test').set('Origin', 'https://pricing.example.test');

      expect(response.status).toBe(200);
      expect(response.headers['access-control-allow-origin']).toBe('*');
      expect(response.headers['access-control-allow-headers']).toBe('*');
    });

    it('answers preflight requests with any header allowed', async () => {
      const app = createTestApp();
      app.use(createCorsMiddleware());

      const response = await request(app)
        .options('/test')
        .set('Origin', 'https://pricing.example.test')
        .set('Access-Control-Request-Method', 'POST')
        .set('Access-Control-Request-Headers', 'x-custom-header');

      expect(response.status).toBe(204);
      expect(response.headers['access-control-allow-origin']).toBe('*');
      expect(response.headers['access-control-allow-headers']).toBe('*');
    });
  });

  describe('createJsonBodyErrorHandler', () => {
    it('rejects malformed JSON with 400', async () => {
      const app = createTestApp();
      app.post('/test', (req: Request, res: Response) => {
        res.json({ received: req.body });
      });

      const response = await request(app)
        .post('/test')
        .set('Content-Type', 'application/json')
        .send('{"name": ');

      expect(response.status).toBe(400);
      expect(typeof response.body.error).toBe('string');
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it('rejects oversized bodies with 400', async () => {
      const app = createTestApp();
      app.post('/test', (req: Request, res: Response) => {
        res.json({ received: req.body });
      });

      const response = await request(app)
        .post('/test')
        .send({ payload: 'x'.repeat(200) });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'request entity too large' });
    });

    it('passes valid JSON through', async () => {
      const app = createTestApp();
      app.post('/test', (req: Request, res: Response) => {
        res.json({ received: req.body });
      });

      const response = await request(app).post('/test').send({ name: 'widget' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ received: { name: 'widget' } });
    });
  });

  describe('createErrorHandler', () => {
    it('uses the status of library errors', async () => {
      const app = createTestApp();
      app.get('/test', () => {
        throw new ApplicationError('price list locked', 409);
      });
      app.use(createErrorHandler({ production: true }));

      const response = await request(app).get('/test');

      expect(response.status).toBe(409);
      expect(response.body).toEqual({ message: 'price list locked' });
    });

    it('maps plain errors to 400', async () => {
      const app = createTestApp();
      app.get('/test', () => {
        throw new Error('Something went wrong');
      });
      app.use(createErrorHandler({ production: true }));

      const response = await request(app).get('/test');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ message: 'Something went wrong' });
    });

    it('includes the stack trace outside production', async () => {
      const app = createTestApp();
      app.get('/test', () => {
        throw new InternalError('lookup table missing');
      });
      app.use(createErrorHandler({ production: false }));

      const response = await request(app).get('/test');

      expect(response.status).toBe(500);
      expect(response.body.message).toBe('lookup table missing');
      expect(response.body.stacktrace).toContain('lookup table missing');
      expect(response.body.stacktrace).toContain('middleware.test.ts');
    });

    it('logs the error name and message', async () => {
      const app = createTestApp();
      app.get('/test', () => {
        throw new InternalError('lookup table missing');
      });
      app.use(createErrorHandler({ production: true }));

      await request(app).get('/test');

      expect(console.error).toHaveBeenCalledWith('[Http] InternalError: lookup table missing');
    });
  });

  describe('createRequestLogger', () => {
    it('logs method, path and status', async () => {
      const app = express();
      app.use(createRequestLogger());
      app.get('/test', (_req: Request, res: Response) => {
        res.status(201).json({ ok: true });
      });

      await request(app).get('/test?page=2');

      expect(console.info).toHaveBeenCalledWith(expect.stringMatching(/^\[Http\] GET \/test\?page=2 201 \d+ms$/));
    });
  });

  describe('asyncHandler', () => {
    it('passes resolved handlers through', async () => {
      const app = createTestApp();
      app.get(
        '/test',
        asyncHandler(async (_req, res) => {
          await new Promise((resolve) => setTimeout(resolve, 10));
          res.json({ async: true });
        })
      );

      const response = await request(app).get('/test');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ async: true });
    });

    it('forwards rejections to the error handler', async () => {
      const app = createTestApp();
      app.get(
        '/test',
        asyncHandler(async () => {
          throw new ApplicationError('quote not found', 404);
        })
      );
      app.use(createErrorHandler({ production: true }));

      const response = await request(app).get('/test');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ message: 'quote not found' });
    });
  });

  describe('readHeader', () => {
    function createHeaderApp(): Express {
      const app = createTestApp();
      app.get('/required', (req: Request, res: Response) => {
        res.json({ value: readHeader(req, 'X-Api-Key', true) });
      });
      app.get('/optional', (req: Request, res: Response) => {
        res.json({ present: readHeader(req, 'X-Api-Key') !== undefined });
      });
      app.use(createErrorHandler({ production: true }));
      return app;
    }

    it('reads a header case-insensitively', async () => {
      const response = await request(createHeaderApp()).get('/required').set('x-api-key', 'test-key');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ value: 'test-key' });
    });

    it('rejects a missing required header with 400', async () => {
      const response = await request(createHeaderApp()).get('/required');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ message: 'unable to parse headers: X-Api-Key' });
    });

    it('returns undefined for a missing optional header', async () => {
      const response = await request(createHeaderApp()).get('/optional');

      expect(response.body).toEqual({ present: false });
    });
  });
});
