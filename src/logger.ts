/**
 * Logging
 *
 * Server and CLI messages go through a small Logger interface. The
 * default writes with @clack/prompts so server output matches the rest
 * of the CLI; tests pass their own.
 */

import * as p from '@clack/prompts';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function stamp(message: string): string {
  return `${new Date().toISOString()} ${message}`;
}

export const clackLogger: Logger = {
  info: message => p.log.info(stamp(message)),
  warn: message => p.log.warn(stamp(message)),
  error: message => p.log.error(stamp(message)),
};

/**
 * Human-readable duration: `850ms`, `12.5s`, `3m4.2s`, `1h2m3s`
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;

  const totalSeconds = ms / 1000;
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) return `${hours}h${minutes}m${Math.floor(seconds)}s`;
  const secs = `${Math.round(seconds * 10) / 10}s`;
  return minutes > 0 ? `${minutes}m${secs}` : secs;
}

/**
 * Message of anything thrown
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
