/**
 * @database-common/core - connection data, MySQL pools and HTTP error types.
 */

// Types
export type { DatabaseConnectionData, FilemakerCredentials } from './types/connection';
export {
  HttpError,
  ConfigFetchError,
  PoolCreationError,
  SqlError,
  IoError,
  HeaderParseError,
  ApplicationError,
  InternalError,
  toHttpError,
  fromResponse,
  isSqlDriverError,
  isSystemError,
} from './types/errors';
export type { HttpErrorKind, DatabaseCommonError, ResponseStatus, SqlDriverError } from './types/errors';

// Configuration
export {
  resolveEnvironment,
  EnvironmentVariables,
  DEFAULT_DATABASE_NAME,
  DEFAULT_CONFIG_ENDPOINT,
} from './config/environment';
export type { DatabaseEnvironment } from './config/environment';
export {
  ConnectionDataFetcher,
  fetchConnectionData,
  parseConnectionData,
  buildConfigUrl,
} from './config/connection-data';
export type {
  ConnectionDataFetcherOptions,
  FetchFn,
  FetchInit,
  FetchResponse,
} from './config/connection-data';

// Database
export { createPool, buildPoolOptions, splitHost, DEFAULT_MYSQL_PORT } from './db/pool';
export type { CreatePoolOptions, PoolDriver, PoolHandle, SqlPool, TlsMode } from './db/pool';

// Error rendering
export { toErrorBody, isProduction } from './utils/error-body';
export type { ErrorBody, ErrorBodyOptions } from './utils/error-body';
export { renderStackTrace, resolveStackTrace, resolveFramePath } from './utils/stacktrace';
