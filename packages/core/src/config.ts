import { ConfigError } from './errors.js';
import type { LinearConfig, LogLevelName } from './types.js';

export const DEFAULT_API_URL = 'https://api.linear.app/graphql';
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_LOG_LEVEL: LogLevelName = 'warn';

const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === 'string' && LOG_LEVEL_NAMES.some(name => name === value);
}

/**
 * Builds the client configuration from environment variables.
 *
 * LINEAR_API_KEY is required; LINEAR_API_URL, LINEAR_TIMEOUT_MS and
 * LINEAR_LOG_LEVEL fall back to defaults when missing or unparseable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LinearConfig {
  const apiKey = env.LINEAR_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigError('LINEAR_API_KEY is not set; create a personal API key in Linear and export it');
  }

  const timeout = Number(env.LINEAR_TIMEOUT_MS);
  const logLevel = env.LINEAR_LOG_LEVEL?.trim().toLowerCase();

  return {
    apiKey,
    apiUrl: env.LINEAR_API_URL?.trim() || DEFAULT_API_URL,
    timeoutMs: Number.isInteger(timeout) && timeout > 0 ? timeout : DEFAULT_TIMEOUT_MS,
    logLevel: isLogLevelName(logLevel) ? logLevel : DEFAULT_LOG_LEVEL,
  };
}
