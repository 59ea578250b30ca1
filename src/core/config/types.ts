/**
 * Engine Config Types
 */

import { z } from 'zod';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug', 'trace'] as const;

/**
 * Dispatch behavior
 */
export const DispatchConfigSchema = z
  .object({
    /** Budget for a single hook invocation */
    hookTimeoutMs: z.number().int().positive().default(5000),

    /** Consecutive failures that isolate an addon */
    failureThreshold: z.number().int().positive().default(5),

    /** Window the failures must fall in */
    failureWindowMs: z.number().int().positive().default(60_000),

    /** Longest the proxy engine waits for a verdict before continuing */
    reactionTimeoutMs: z.number().int().positive().optional(),
  })
  .strict();

/**
 * Addon lifecycle behavior
 */
export const LifecycleConfigSchema = z
  .object({
    /** Activate addons as soon as they are installed */
    enableOnInstall: z.boolean().default(false),

    /** Longest teardown waits for in-flight invocations */
    teardownTimeoutMs: z.number().int().nonnegative().default(30_000),
  })
  .strict();

export const EngineConfigSchema = z
  .object({
    dispatch: DispatchConfigSchema.default({}),
    lifecycle: LifecycleConfigSchema.default({}),

    /** JSON file remembering installed addons; in-memory when absent */
    storePath: z.string().min(1).optional(),

    /** Directories scanned for addon directories */
    addonDirs: z.array(z.string().min(1)).default([]),

    logLevel: z.enum(LOG_LEVELS).default('info'),
  })
  .strict();

/**
 * Main engine configuration
 */
export type EngineConfig = z.output<typeof EngineConfigSchema>;

/**
 * Configuration as written in a file; every key optional
 */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export type DispatchConfig = z.output<typeof DispatchConfigSchema>;
export type LifecycleConfig = z.output<typeof LifecycleConfigSchema>;
