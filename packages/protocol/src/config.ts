/**
 * Settings shared by the MCP server and the headless executor.
 *
 * Each setting comes from a `--flag=value` argument, then a `CADLINK_*`
 * environment variable, then the default. Values that do not parse fall
 * back to the default.
 */

import { isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';

export type ServerMode = 'socket' | 'script';

export interface CadLinkConfig {
  host: string;
  port: number;
  mode: ServerMode;
  timeoutMs: number;
  connectTimeoutMs: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<CadLinkConfig> = {
  host: 'localhost',
  port: 9876,
  mode: 'socket',
  timeoutMs: 15_000,
  connectTimeoutMs: 3_000,
  logLevel: 'info',
};

type Env = Readonly<Record<string, string | undefined>>;

function flagValue(argv: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = argv.find((a) => a.startsWith(prefix));
  return arg?.slice(prefix.length);
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) return fallback;
  return value;
}

export function loadConfig(env: Env = process.env, argv: readonly string[] = process.argv.slice(2)): CadLinkConfig {
  const setting = (flag: string | null, name: string) =>
    (flag === null ? undefined : flagValue(argv, flag)) ?? env[name];

  const mode = setting('mode', 'CADLINK_MODE');
  const logLevel = setting('log-level', 'CADLINK_LOG_LEVEL');

  return {
    host: setting('host', 'CADLINK_HOST') || DEFAULT_CONFIG.host,
    port: parsePositiveInt(setting('port', 'CADLINK_PORT'), DEFAULT_CONFIG.port),
    mode: mode === 'script' || mode === 'socket' ? mode : DEFAULT_CONFIG.mode,
    timeoutMs: parsePositiveInt(setting('timeout', 'CADLINK_TIMEOUT_MS'), DEFAULT_CONFIG.timeoutMs),
    connectTimeoutMs: parsePositiveInt(setting(null, 'CADLINK_CONNECT_TIMEOUT_MS'), DEFAULT_CONFIG.connectTimeoutMs),
    logLevel: logLevel && isLogLevel(logLevel) ? logLevel : DEFAULT_CONFIG.logLevel,
  };
}
