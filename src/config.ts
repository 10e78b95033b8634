/**
 * Configuration
 *
 * Flags win over environment variables, environment variables win over
 * the defaults below.
 */

import { DEFAULT_THEME, type PhosphorMode, getThemeModes, isValidThemeMode } from './themes';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ServeConfig {
  host: string;
  port: number;
  hostKeyPath: string;
  theme: PhosphorMode;
  /** How long in-flight sessions get to finish on shutdown, in ms */
  shutdownTimeout: number;
}

export const DEFAULT_SERVE_CONFIG: ServeConfig = {
  host: '0.0.0.0',
  port: 2222,
  hostKeyPath: '.ssh/term_info_ed25519',
  theme: DEFAULT_THEME,
  shutdownTimeout: 30_000,
};

export type Env = Record<string, string | undefined>;

const SERVE_FLAGS = ['--host', '--port', '--host-key', '--theme'];

/**
 * Value of `--name value` or `--name=value`, if present
 */
export function readFlag(args: readonly string[], name: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === name) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigError(`Missing value for ${name}`);
      }
      return value;
    }
    if (arg.startsWith(`${name}=`)) {
      return arg.slice(name.length + 1);
    }
  }
  return undefined;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid port: ${value} (expected an integer between 1 and 65535)`);
  }
  return port;
}

export function parseTheme(value: string): PhosphorMode {
  if (!isValidThemeMode(value)) {
    throw new ConfigError(`Unknown theme: ${value} (available: ${getThemeModes().join(', ')})`);
  }
  return value;
}

/**
 * Theme for local play: --theme, then NIMM_THEME, then the default
 */
export function resolveTheme(args: readonly string[], env: Env): PhosphorMode {
  const value = readFlag(args, '--theme') ?? env.NIMM_THEME;
  return value === undefined ? DEFAULT_THEME : parseTheme(value);
}

function checkUnknownFlags(args: readonly string[], known: readonly string[]): void {
  for (const arg of args) {
    if (!arg.startsWith('--')) continue;
    const name = arg.split('=')[0];
    if (!known.includes(name)) {
      throw new ConfigError(`Unknown option: ${name}`);
    }
  }
}

export function parseServeConfig(args: readonly string[], env: Env = {}): ServeConfig {
  checkUnknownFlags(args, SERVE_FLAGS);

  const host = readFlag(args, '--host') ?? env.NIMM_HOST ?? DEFAULT_SERVE_CONFIG.host;
  const portValue = readFlag(args, '--port') ?? env.NIMM_PORT;
  const hostKeyPath = readFlag(args, '--host-key') ?? env.NIMM_HOST_KEY ?? DEFAULT_SERVE_CONFIG.hostKeyPath;

  return {
    host,
    port: portValue === undefined ? DEFAULT_SERVE_CONFIG.port : parsePort(portValue),
    hostKeyPath,
    theme: resolveTheme(args, env),
    shutdownTimeout: DEFAULT_SERVE_CONFIG.shutdownTimeout,
  };
}
