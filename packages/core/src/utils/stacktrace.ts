/**
 * Stack trace rendering for error responses.
 */

import { isAbsolute, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

// "    at fn (location:line:col)" or "    at location:line:col"
const FRAME_PATTERN = /^(\s+at (?:.*? \()?)(.+?):(\d+):(\d+)(\)?)$/;

/**
 * Turn a frame location into an absolute file path where it names a file.
 */
export function resolveFramePath(location: string, cwd: string = process.cwd()): string {
  if (location.startsWith('file://')) {
    return fileURLToPath(location);
  }
  if (location.startsWith('node:') || location.includes('://') || isAbsolute(location)) {
    return location;
  }
  return resolve(cwd, location);
}

/**
 * Rewrite every frame of a V8 stack trace so file locations are absolute.
 * Lines that are not frames (the header, "<anonymous>" frames) pass through.
 */
export function resolveStackTrace(stack: string, cwd?: string): string {
  return stack
    .split('\n')
    .map((line) => {
      const match = FRAME_PATTERN.exec(line);
      if (!match) return line;
      const [, prefix, location, row, column, suffix] = match;
      return `${prefix}${resolveFramePath(location, cwd)}:${row}:${column}${suffix}`;
    })
    .join('\n');
}

/**
 * Render an error's own stack followed by the stacks of its cause chain.
 */
export function renderStackTrace(err: Error, cwd?: string): string {
  const parts: string[] = [];
  const seen = new Set<Error>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);
    parts.push(resolveStackTrace(current.stack ?? `${current.name}: ${current.message}`, cwd));
    current = current.cause;
  }

  return parts.join('\nCaused by: ');
}
