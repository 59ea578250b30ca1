/**
 * Logging
 *
 * Every component logs through a consola instance tagged with its scope,
 * e.g. `[flowhook:dispatcher]`.
 */

import consola, { type ConsolaInstance } from 'consola';

export type LogLevelName = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVELS: Record<LogLevelName, number> = {
  silent: -999,
  error: 0,
  warn: 1,
  info: 3,
  debug: 4,
  trace: 5,
};

const root: ConsolaInstance = consola.withTag('flowhook');
// withTag copies options, so derived instances are tracked to keep levels in sync
const scoped: Map<string, ConsolaInstance> = new Map([['', root]]);
let currentLevel: number | undefined;

export type Logger = ConsolaInstance;

export function createLogger(scope: string): Logger {
  let instance = scoped.get(scope);
  if (!instance) {
    instance = root.withTag(scope);
    if (currentLevel !== undefined) instance.level = currentLevel;
    scoped.set(scope, instance);
  }
  return instance;
}

/**
 * Set the level for the root logger and every logger derived from it
 */
export function setLogLevel(level: LogLevelName): void {
  currentLevel = LEVELS[level];
  for (const instance of scoped.values()) {
    instance.level = currentLevel;
  }
}
