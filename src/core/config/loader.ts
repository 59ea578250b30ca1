import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { EngineConfigSchema, type EngineConfig } from './types.js';
import { ConfigError, ConfigErrorCode } from '../errors/index.js';
import { applyEnvOverrides, isRecord, resolveEnvVar, type Environment, type RawConfig } from './parser.js';

const CONFIG_DIR_NAME = '.flowhook';
const CONFIG_FILE_NAME = 'config.json';

/** Nested sections merged key by key instead of replaced */
const NESTED_SECTIONS = ['dispatch', 'lifecycle'] as const;

export interface LoadConfigOptions {
  cwd?: string;
  env?: Environment;
}

/**
 * Get the home directory at runtime (not at module load time)
 * This allows for proper mocking in tests
 */
function getHomeDir(): string {
  return os.homedir();
}

export function getGlobalConfigPath(): string {
  return path.join(getHomeDir(), CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

export function getProjectConfigPath(cwd: string): string {
  return path.join(cwd, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

/**
 * Load and merge configuration from all sources
 *
 * Loading order (priority):
 * 1. Defaults
 * 2. Global config (~/.flowhook/config.json)
 * 3. Project config (./.flowhook/config.json) - Overrides global
 * 4. FLOWHOOK_* environment variables - Override both files
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<EngineConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let raw: RawConfig = {};

  const globalConfig = await readConfigFile(getGlobalConfigPath());
  if (globalConfig) {
    raw = mergeConfigs(raw, globalConfig);
  }

  const projectConfig = await readConfigFile(getProjectConfigPath(cwd));
  if (projectConfig) {
    raw = mergeConfigs(raw, projectConfig);
  }

  return resolveConfig(applyEnvOverrides(raw, env), { cwd, env });
}

/**
 * Validate a raw configuration, fill defaults and resolve paths
 * @throws ConfigError on the first invalid value
 */
export function resolveConfig(raw: unknown, options: LoadConfigOptions = {}): EngineConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const parsed = EngineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(
      `Invalid configuration at ${where}: ${issue?.message ?? 'unknown problem'}`,
      ConfigErrorCode.INVALID_VALUE,
      'Check the configuration file against the documented settings.',
    );
  }

  const config = parsed.data;
  const resolvePath = (value: string) => path.resolve(cwd, resolveEnvVar(value, env));
  return {
    ...config,
    storePath: config.storePath === undefined ? undefined : resolvePath(config.storePath),
    addonDirs: config.addonDirs.map(resolvePath),
  };
}

/**
 * Merge two raw configurations
 * - dispatch / lifecycle: Shallow merge per section (local overrides global)
 * - everything else: Replaced by local
 */
export function mergeConfigs(global: RawConfig, local: RawConfig): RawConfig {
  const result: RawConfig = { ...global, ...local };

  for (const section of NESTED_SECTIONS) {
    const fromGlobal = global[section];
    const fromLocal = local[section];
    if (isRecord(fromGlobal) && isRecord(fromLocal)) {
      result[section] = { ...fromGlobal, ...fromLocal };
    }
  }

  return result;
}

/**
 * Get the default configuration
 */
export function getDefaultConfig(): EngineConfig {
  return EngineConfigSchema.parse({});
}

// Helper functions

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readConfigFile(filePath: string): Promise<RawConfig | null> {
  let content: string;
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) return null;
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new ConfigError(
      `Invalid JSON in config file: ${filePath}`,
      ConfigErrorCode.INVALID_JSON,
      'Check the configuration file syntax.',
    );
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(
      `Config file ${filePath} must contain a JSON object`,
      ConfigErrorCode.INVALID_VALUE,
      'Wrap the settings in { ... }.',
    );
  }
  return parsed;
}
