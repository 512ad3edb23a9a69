import { toHttpError } from '../types/errors';
import { renderStackTrace } from './stacktrace';

/**
 * JSON body sent for every failed request.
 */
export interface ErrorBody {
  message: string;
  /** Present outside production only */
  stacktrace?: string;
}

export interface ErrorBodyOptions {
  /** Omit the stack trace (default: derived from NODE_ENV) */
  production?: boolean;
  /** Directory relative frame paths are resolved against */
  cwd?: string;
}

export function isProduction(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NODE_ENV === 'production';
}

/**
 * Build the response body for an error.
 */
export function toErrorBody(err: unknown, options: ErrorBodyOptions = {}): ErrorBody {
  const httpError = toHttpError(err);
  const production = options.production ?? isProduction();
  const body: ErrorBody = { message: httpError.message };

  if (!production) {
    body.stacktrace = renderStackTrace(httpError, options.cwd);
  }

  return body;
}
