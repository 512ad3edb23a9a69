import { STATUS_CODES } from 'node:http';

/**
 * Discriminator shared by every error the library raises.
 */
export type HttpErrorKind =
  | 'config-fetch'
  | 'pool-creation'
  | 'sql'
  | 'io'
  | 'header-parse'
  | 'application'
  | 'internal';

/**
 * Shape of errors raised by the mysql2 driver for failed statements.
 */
export interface SqlDriverError extends Error {
  code: string;
  errno?: number;
  sqlState?: string;
  sqlMessage?: string;
  fatal?: boolean;
}

/**
 * Base error for all database-common errors.
 *
 * The stack trace is captured when the error is constructed, so it points at
 * the failure site rather than at the HTTP boundary that eventually reports it.
 */
export abstract class HttpError extends Error {
  abstract readonly kind: HttpErrorKind;

  constructor(
    message: string,
    public readonly status: number,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    Error.captureStackTrace(this, new.target);
  }
}

/**
 * Remote connection data could not be fetched, parsed or validated.
 */
export class ConfigFetchError extends HttpError {
  readonly kind = 'config-fetch' as const;

  constructor(
    message: string,
    public readonly url?: string,
    cause?: unknown
  ) {
    super(message, 500, cause);
    this.name = 'ConfigFetchError';
  }
}

/**
 * The driver could not establish the connection pool.
 */
export class PoolCreationError extends HttpError {
  readonly kind = 'pool-creation' as const;

  constructor(message: string, cause?: unknown) {
    super(message, 500, cause);
    this.name = 'PoolCreationError';
  }
}

/**
 * A query failed inside the SQL driver.
 */
export class SqlError extends HttpError {
  readonly kind = 'sql' as const;
  readonly code: string;
  readonly sqlState?: string;

  constructor(cause: SqlDriverError) {
    super(cause.sqlMessage ?? cause.message, 500, cause);
    this.name = 'SqlError';
    this.code = cause.code;
    this.sqlState = cause.sqlState;
  }
}

/**
 * Operating-system level failure (sockets, files).
 */
export class IoError extends HttpError {
  readonly kind = 'io' as const;
  readonly code?: string;

  constructor(cause: NodeJS.ErrnoException) {
    super(cause.message, 500, cause);
    this.name = 'IoError';
    this.code = cause.code;
  }
}

/**
 * A request header could not be read as a string.
 */
export class HeaderParseError extends HttpError {
  readonly kind = 'header-parse' as const;

  constructor(
    public readonly header: string,
    cause?: unknown
  ) {
    super(`unable to parse headers: ${header}`, 400, cause);
    this.name = 'HeaderParseError';
  }
}

/**
 * Caller-raised failure carrying its own status code.
 */
export class ApplicationError extends HttpError {
  readonly kind = 'application' as const;

  constructor(message: string, status = 400, cause?: unknown) {
    super(message, status, cause);
    this.name = 'ApplicationError';
  }
}

/**
 * Unspecified internal failure.
 */
export class InternalError extends HttpError {
  readonly kind = 'internal' as const;

  constructor(message: string, cause?: unknown) {
    super(message, 500, cause);
    this.name = 'InternalError';
  }
}

/**
 * Closed set of errors produced by the library.
 */
export type DatabaseCommonError =
  | ConfigFetchError
  | PoolCreationError
  | SqlError
  | IoError
  | HeaderParseError
  | ApplicationError
  | InternalError;

// === Source conversions ===

export function isSqlDriverError(err: unknown): err is SqlDriverError {
  return (
    err instanceof Error &&
    'code' in err &&
    typeof err.code === 'string' &&
    ('sqlState' in err || 'sqlMessage' in err)
  );
}

export function isSystemError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'syscall' in err && 'code' in err && typeof err.code === 'string';
}

/**
 * Convert anything thrown by a handler or a dependency into an HttpError.
 */
export function toHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) {
    return err;
  }
  if (isSqlDriverError(err)) {
    return new SqlError(err);
  }
  if (isSystemError(err)) {
    return new IoError(err);
  }
  if (err instanceof SyntaxError) {
    return new ConfigFetchError(`unable to parse JSON: ${err.message}`, undefined, err);
  }
  if (err instanceof Error) {
    return new ApplicationError(err.message, 400, err);
  }
  return new ApplicationError(String(err));
}

/**
 * Minimal view of a fetch Response.
 */
export interface ResponseStatus {
  status: number;
  statusText: string;
}

/**
 * Convert an unsuccessful HTTP response into an ApplicationError with the same status.
 * Responses without a status text (HTTP/2, most fetch clients) use the standard reason phrase.
 */
export function fromResponse(res: ResponseStatus): ApplicationError {
  const reason = res.statusText || STATUS_CODES[res.status] || `status ${res.status}`;
  return new ApplicationError(`HTTP response error: ${reason}`, res.status);
}
