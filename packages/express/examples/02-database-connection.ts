/**
 * Example 02 — Database-backed routes
 *
 * Demonstrates:
 * - Fetching connection data from the configuration endpoint
 * - Creating a verified MySQL pool
 * - Sharing a typed pool with handlers through the service container
 * - The built-in health route
 *
 * Reads DATABASE_NAME, DATABASE_CONFIG_URL and DATABASE_CONFIG_TOKEN from
 * the environment.
 */

import type { Pool, RowDataPacket } from 'mysql2/promise';
import { createPool, fetchConnectionData } from '@database-common/core';
import {
  asyncHandler,
  createHttpServer,
  registerHealthRoutes,
  requireServiceContext,
  serviceKey,
} from '@database-common/express';

// ── 1. Connect ──────────────────────────────────────────────────

const connectionData = await fetchConnectionData();
const pool = await createPool(connectionData);

// ── 2. Typed access to the pool ─────────────────────────────────
//
// The built-in DatabasePool key only promises a probe query. Register
// the full mysql2 pool under an application key to run real queries.

const Pricing = serviceKey<Pool>('example:Pricing');

interface UserRow extends RowDataPacket {
  id: number;
  name: string;
}

const getUsers = asyncHandler(async (req, res) => {
  requireServiceContext(req);
  const db = req.services.container.resolve(Pricing);

  try {
    const [users] = await db.query<UserRow[]>('SELECT id, name FROM users LIMIT 10');
    res.json(users.map(({ id, name }) => ({ id, name })));
  } catch (err) {
    console.error('Database query error:', err);
    res.status(500).json({ error: 'Failed to fetch users from database' });
  }
});

// ── 3. Serve ────────────────────────────────────────────────────

const server = await createHttpServer(
  (router, { container }) => {
    container.registerInstance(Pricing, pool);
    router.get('/api/users', getUsers);
    registerHealthRoutes(router);
  },
  'target/wwwroot',
  8080,
  { pool, connectionData }
);

console.log(`Server running at http://localhost:${server.port}`);
await server.closed;
