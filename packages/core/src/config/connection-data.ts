/**
 * Remote connection data retrieval.
 *
 * Fetches the credentials document once, validates it against a JSON Schema and
 * returns a frozen copy. No retries, no caching: every call re-fetches.
 */

import Ajv, { type JSONSchemaType } from 'ajv';
import { Agent, fetch as undiciFetch, type Dispatcher } from 'undici';
import type { DatabaseConnectionData } from '../types/connection';
import { ConfigFetchError } from '../types/errors';
import { resolveEnvironment } from './environment';

/**
 * Subset of a fetch Response the fetcher reads.
 */
export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export interface FetchInit {
  method: 'GET';
  headers: Record<string, string>;
  dispatcher?: Dispatcher;
}

export type FetchFn = (url: string, init: FetchInit) => Promise<FetchResponse>;

export interface ConnectionDataFetcherOptions {
  /** Database name (default: DATABASE_NAME, then "pricing") */
  database?: string;
  /** Config endpoint base URL (default: DATABASE_CONFIG_URL, then the built-in endpoint) */
  endpoint?: string;
  /** Bearer token for the endpoint (default: DATABASE_CONFIG_TOKEN) */
  authToken?: string;
  /**
   * Accept self-signed or otherwise untrusted certificates on the config
   * endpoint (default: DATABASE_CONFIG_ACCEPT_INVALID_CERTS, then true).
   */
  acceptInvalidCertificates?: boolean;
  /** Fetch implementation (default: undici) */
  fetch?: FetchFn;
}

const connectionDataSchema: JSONSchemaType<DatabaseConnectionData> = {
  type: 'object',
  properties: {
    host: { type: 'string', minLength: 1 },
    user: { type: 'string' },
    password: { type: 'string' },
    filemaker: {
      type: 'object',
      properties: {
        username: { type: 'string' },
        password: { type: 'string' },
      },
      required: ['username', 'password'],
    },
    hash: { type: 'string' },
  },
  required: ['host', 'user', 'password', 'filemaker', 'hash'],
};

const ajv = new Ajv({ allErrors: true });
const validateConnectionData = ajv.compile(connectionDataSchema);

/**
 * Validate an already-parsed payload.
 *
 * @throws ConfigFetchError listing every schema violation
 */
export function parseConnectionData(payload: unknown, url?: string): DatabaseConnectionData {
  if (!validateConnectionData(payload)) {
    const issues = (validateConnectionData.errors ?? [])
      .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ');
    throw new ConfigFetchError(`invalid connection data: ${issues}`, url);
  }

  return Object.freeze({
    host: payload.host,
    user: payload.user,
    password: payload.password,
    filemaker: Object.freeze({
      username: payload.filemaker.username,
      password: payload.filemaker.password,
    }),
    hash: payload.hash,
  });
}

/**
 * Build the endpoint URL for a database name.
 */
export function buildConfigUrl(endpoint: string, database: string): string {
  const url = new URL(endpoint);
  url.searchParams.set('database', database);
  return url.toString();
}

/**
 * Fetches DatabaseConnectionData from the remote configuration endpoint.
 *
 * @example
 * ```typescript
 * const fetcher = new ConnectionDataFetcher({ database: 'pricing' });
 * const data = await fetcher.get();
 * const pool = await createPool(data);
 * ```
 */
export class ConnectionDataFetcher {
  readonly url: string;
  readonly database: string;
  private readonly authToken?: string;
  private readonly acceptInvalidCertificates: boolean;
  private readonly fetchFn: FetchFn;

  constructor(options: ConnectionDataFetcherOptions = {}) {
    const env = resolveEnvironment();
    this.database = options.database ?? env.database;
    this.url = buildConfigUrl(options.endpoint ?? env.endpoint, this.database);
    this.authToken = options.authToken ?? env.authToken;
    this.acceptInvalidCertificates = options.acceptInvalidCertificates ?? env.acceptInvalidCertificates;
    this.fetchFn = options.fetch ?? undiciFetch;
  }

  /**
   * Fetch and validate the connection data.
   *
   * @throws ConfigFetchError on network failure, non-2xx status, bad JSON or schema mismatch
   */
  async get(): Promise<DatabaseConnectionData> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.authToken) {
      headers.Authorization = `Bearer ${this.authToken}`;
    }

    const agent = this.acceptInvalidCertificates
      ? new Agent({ connect: { rejectUnauthorized: false } })
      : undefined;

    try {
      let response: FetchResponse;
      try {
        response = await this.fetchFn(this.url, { method: 'GET', headers, dispatcher: agent });
      } catch (err) {
        throw new ConfigFetchError(`request to ${this.url} failed: ${describe(err)}`, this.url, err);
      }

      if (!response.ok) {
        throw new ConfigFetchError(
          `config endpoint responded ${response.status} ${response.statusText}`.trimEnd(),
          this.url
        );
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (err) {
        throw new ConfigFetchError(`unable to parse JSON: ${describe(err)}`, this.url, err);
      }

      const data = parseConnectionData(payload, this.url);
      console.debug(`[Config] Loaded connection data for "${this.database}" (host ${data.host})`);
      return data;
    } finally {
      await agent?.destroy();
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Fetch connection data once with the given options.
 */
export function fetchConnectionData(options?: ConnectionDataFetcherOptions): Promise<DatabaseConnectionData> {
  return new ConnectionDataFetcher(options).get();
}
