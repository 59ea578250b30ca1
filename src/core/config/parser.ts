import { ConfigError, ConfigErrorCode } from '../errors/index.js';
import type { LogLevelName } from '../../utils/logger.js';
import { LOG_LEVELS } from './types.js';

/** Raw configuration object as read from a file, before validation */
export type RawConfig = Record<string, unknown>;

export type Environment = Record<string, string | undefined>;

const ENV_PREFIX = 'FLOWHOOK_';

/**
 * Environment variables that override `dispatch.*` settings
 */
const DISPATCH_ENV: Record<string, string> = {
  [`${ENV_PREFIX}HOOK_TIMEOUT_MS`]: 'hookTimeoutMs',
  [`${ENV_PREFIX}FAILURE_THRESHOLD`]: 'failureThreshold',
  [`${ENV_PREFIX}FAILURE_WINDOW_MS`]: 'failureWindowMs',
  [`${ENV_PREFIX}REACTION_TIMEOUT_MS`]: 'reactionTimeoutMs',
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a positive integer from an environment variable
 * @throws ConfigError when the value is not a positive integer
 */
export function parseIntegerEnv(name: string, value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) <= 0) {
    throw new ConfigError(
      `Environment variable ${name} must be a positive integer, got "${value}"`,
      ConfigErrorCode.ENV_VAR_INVALID,
      `Unset ${name} or give it a whole number of milliseconds or failures`,
    );
  }
  return Number(trimmed);
}

function isLogLevel(value: string): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Apply FLOWHOOK_* environment variables on top of a raw configuration
 */
export function applyEnvOverrides(config: RawConfig, env: Environment): RawConfig {
  const dispatch: RawConfig = isRecord(config.dispatch) ? { ...config.dispatch } : {};
  let touched = false;

  for (const [name, key] of Object.entries(DISPATCH_ENV)) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    dispatch[key] = parseIntegerEnv(name, value);
    touched = true;
  }

  const result: RawConfig = touched ? { ...config, dispatch } : { ...config };

  const level = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (level !== undefined && level !== '') {
    const normalized = level.trim().toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new ConfigError(
        `Invalid ${ENV_PREFIX}LOG_LEVEL: "${level}"`,
        ConfigErrorCode.ENV_VAR_INVALID,
        `Use one of: ${LOG_LEVELS.join(', ')}`,
      );
    }
    result.logLevel = normalized;
  }

  return result;
}

/**
 * Resolves environment variables in path settings
 * Supports:
 * - $VAR
 * - ${VAR}
 * - ${VAR:-default}
 * References may be followed by more path, e.g. `${HOME}/.flowhook/addons`.
 *
 * @throws ConfigError if a variable is not set and has no default
 */
export function resolveEnvVar(value: string, env: Environment): string {
  return value.replace(
    /\$\{([a-zA-Z_][a-zA-Z0-9_]*)(?::-([^}]*))?\}|\$([a-zA-Z_][a-zA-Z0-9_]*)/g,
    (_match: string, braced: string | undefined, fallback: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare ?? '';
      const resolved = env[name];
      if (resolved !== undefined && resolved !== '') {
        return resolved;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      throw new ConfigError(
        `Environment variable ${name} is not set (referenced by "${value}")`,
        ConfigErrorCode.ENV_VAR_NOT_SET,
        `Please set ${name} in your environment or use \${${name}:-default}`,
      );
    },
  );
}
