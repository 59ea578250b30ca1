export * from './types.js';
export * from './loader.js';
export { applyEnvOverrides, parseIntegerEnv, resolveEnvVar } from './parser.js';
export type { Environment, RawConfig } from './parser.js';
