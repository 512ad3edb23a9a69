/**
 * Test fixtures for @database-common/express tests.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { SqlPool } from '@database-common/core';

export const INDEX_HTML = '<!doctype html><html><body><div id="root"></div></body></html>';
export const APP_JS = 'console.log("app");';

/**
 * Create a mock pool whose probe query succeeds.
 */
export function createMockPool() {
  return {
    query: vi.fn(async (_sql: string, _values?: unknown): Promise<unknown> => [[{ 1: 1 }], []]),
    end: vi.fn(async (): Promise<void> => {}),
  } satisfies SqlPool;
}

/**
 * Create a mock pool whose probe query fails.
 */
export function createFailingPool(message = 'connect ECONNREFUSED 127.0.0.1:3306') {
  return {
    query: vi.fn(async (_sql: string, _values?: unknown): Promise<unknown> => {
      throw new Error(message);
    }),
    end: vi.fn(async (): Promise<void> => {}),
  } satisfies SqlPool;
}

export interface Wwwroot {
  root: string;
  cleanup(): void;
}

/**
 * Build a throwaway front-end directory:
 *
 *   index.html
 *   assets/app.js
 *   api/health        (a file shadowed by the health route)
 */
export function createWwwroot(options: { withIndex?: boolean } = {}): Wwwroot {
  const root = mkdtempSync(join(tmpdir(), 'dbc-wwwroot-'));
  if (options.withIndex ?? true) {
    writeFileSync(join(root, 'index.html'), INDEX_HTML);
  }
  mkdirSync(join(root, 'assets'));
  writeFileSync(join(root, 'assets', 'app.js'), APP_JS);
  mkdirSync(join(root, 'api'));
  writeFileSync(join(root, 'api', 'health'), 'static file');

  return {
    root,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}
