/**
 * Environment-backed defaults.
 *
 * This is the only place the library reads process.env; everything else takes
 * explicit options.
 */

export const DEFAULT_DATABASE_NAME = 'pricing';
export const DEFAULT_CONFIG_ENDPOINT = 'https://lib.mardens.com/config.json';

export const EnvironmentVariables = {
  DatabaseName: 'DATABASE_NAME',
  ConfigEndpoint: 'DATABASE_CONFIG_URL',
  ConfigToken: 'DATABASE_CONFIG_TOKEN',
  AcceptInvalidCerts: 'DATABASE_CONFIG_ACCEPT_INVALID_CERTS',
} as const;

export interface DatabaseEnvironment {
  /** Database selected on the config endpoint and used as the MySQL schema */
  database: string;
  /** Base URL of the config endpoint */
  endpoint: string;
  /** Bearer token for the config endpoint */
  authToken?: string;
  /** Skip TLS certificate verification when fetching the config */
  acceptInvalidCertificates: boolean;
}

function parseFlag(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  if (/^(1|true|yes)$/i.test(value.trim())) return true;
  if (/^(0|false|no)$/i.test(value.trim())) return false;
  console.warn(`[Config] Ignoring ${name}=${value}, expected true or false`);
  return fallback;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Resolve connection settings from environment variables, falling back to the
 * documented defaults for anything unset.
 */
export function resolveEnvironment(env: NodeJS.ProcessEnv = process.env): DatabaseEnvironment {
  return {
    database: nonEmpty(env[EnvironmentVariables.DatabaseName]) ?? DEFAULT_DATABASE_NAME,
    endpoint: nonEmpty(env[EnvironmentVariables.ConfigEndpoint]) ?? DEFAULT_CONFIG_ENDPOINT,
    authToken: nonEmpty(env[EnvironmentVariables.ConfigToken]),
    acceptInvalidCertificates: parseFlag(
      EnvironmentVariables.AcceptInvalidCerts,
      env[EnvironmentVariables.AcceptInvalidCerts],
      true
    ),
  };
}
