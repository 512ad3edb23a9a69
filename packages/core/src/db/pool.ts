/**
 * MySQL connection pool construction.
 */

import mysql from 'mysql2/promise';
import type { Pool, PoolOptions } from 'mysql2/promise';
import type { DatabaseConnectionData } from '../types/connection';
import { PoolCreationError } from '../types/errors';
import { DEFAULT_DATABASE_NAME } from '../config/environment';

export const DEFAULT_MYSQL_PORT = 3306;

/**
 * The part of a pool that pool construction touches.
 */
export interface PoolHandle {
  getConnection(): Promise<{ release(): void }>;
  end(): Promise<void>;
}

/**
 * What the server needs from a shared pool: a probe query and shutdown.
 * A mysql2 Pool satisfies it.
 */
export interface SqlPool {
  query(sql: string, values?: unknown): Promise<unknown>;
  end(): Promise<void>;
}

export type PoolDriver<P extends PoolHandle> = (config: PoolOptions) => P;

/**
 * - `preferred`: try TLS, fall back to plain text when the server offers none
 * - `required`: fail unless the server speaks TLS
 * - `disabled`: plain text only
 */
export type TlsMode = 'preferred' | 'required' | 'disabled';

export interface CreatePoolOptions<P extends PoolHandle = Pool> {
  /** Schema to connect to (default: "pricing") */
  database?: string;
  /** Transport security (default: "preferred") */
  tls?: TlsMode;
  /**
   * Accept self-signed or otherwise untrusted server certificates when TLS is
   * on (default: true). Internal database hosts commonly present self-signed
   * certificates.
   */
  acceptInvalidCertificates?: boolean;
  /** Maximum open connections (default: 10) */
  connectionLimit?: number;
  /** Handshake timeout in ms (default: 10000) */
  connectTimeout?: number;
  /** Pool factory (default: mysql2's createPool) */
  driver?: PoolDriver<P>;
}

/**
 * Split "host:port" into its parts. Bare hosts get the MySQL default port.
 */
export function splitHost(host: string): { host: string; port: number } {
  const match = /^([^:]+):(\d+)$/.exec(host.trim());
  if (match) {
    return { host: match[1], port: Number(match[2]) };
  }
  return { host: host.trim(), port: DEFAULT_MYSQL_PORT };
}

/**
 * Translate connection data into mysql2 pool options.
 */
export function buildPoolOptions(
  data: DatabaseConnectionData,
  options: Omit<CreatePoolOptions<PoolHandle>, 'driver'> = {}
): PoolOptions {
  const { host, port } = splitHost(data.host);
  const tls = (options.tls ?? 'preferred') !== 'disabled';
  const acceptInvalidCertificates = options.acceptInvalidCertificates ?? true;

  return {
    host,
    port,
    user: data.user,
    password: data.password,
    database: options.database ?? DEFAULT_DATABASE_NAME,
    waitForConnections: true,
    connectionLimit: options.connectionLimit ?? 10,
    connectTimeout: options.connectTimeout ?? 10_000,
    ...(tls ? { ssl: { rejectUnauthorized: !acceptInvalidCertificates } } : {}),
  };
}

const createMysqlPool: PoolDriver<Pool> = (config) => mysql.createPool(config);

/**
 * Create a MySQL pool and prove it works by checking out one connection.
 *
 * @throws PoolCreationError when the driver cannot connect (bad credentials,
 * unreachable host, protocol mismatch); the half-built pool is closed first
 */
export function createPool(data: DatabaseConnectionData, options?: CreatePoolOptions): Promise<Pool>;
export function createPool<P extends PoolHandle>(
  data: DatabaseConnectionData,
  options: CreatePoolOptions<P> & { driver: PoolDriver<P> }
): Promise<P>;
export async function createPool(
  data: DatabaseConnectionData,
  options: CreatePoolOptions<PoolHandle> = {}
): Promise<PoolHandle> {
  const { driver = createMysqlPool, ...rest } = options;
  const config = buildPoolOptions(data, rest);
  const target = `${config.host}:${config.port}/${config.database}`;

  if (config.ssl && rest.acceptInvalidCertificates !== false) {
    console.warn(`[Pool] TLS certificate verification disabled for ${target}`);
  }
  console.debug(`[Pool] Creating MySQL connection to ${target}`);

  try {
    return await openPool(driver, config, target);
  } catch (err) {
    const plainTextAllowed = (rest.tls ?? 'preferred') === 'preferred';
    if (!plainTextAllowed || !(err instanceof PoolCreationError) || !isNoTlsSupport(err.cause)) {
      throw err;
    }
    console.warn(`[Pool] ${target} does not offer TLS, connecting without it`);
    const { ssl: _ssl, ...plain } = config;
    return openPool(driver, plain, target);
  }
}

/**
 * Build a pool and check out one connection. The pool is closed again when
 * the check-out fails.
 */
async function openPool(
  driver: PoolDriver<PoolHandle>,
  config: PoolOptions,
  target: string
): Promise<PoolHandle> {
  let pool: PoolHandle;
  try {
    pool = driver(config);
  } catch (err) {
    throw new PoolCreationError(`unable to create pool for ${target}: ${describe(err)}`, err);
  }

  try {
    const connection = await pool.getConnection();
    connection.release();
  } catch (err) {
    await pool.end().catch((endErr: unknown) => {
      console.warn(`[Pool] Failed to close pool for ${target}: ${describe(endErr)}`);
    });
    throw new PoolCreationError(`unable to connect to ${target}: ${describe(err)}`, err);
  }

  console.info(`[Pool] Connected to ${target}${config.ssl ? ' over TLS' : ''}`);
  return pool;
}

function isNoTlsSupport(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'HANDSHAKE_NO_SSL_SUPPORT';
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
