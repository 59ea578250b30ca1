import { z } from 'zod';
import type { HookHandler } from '../hooks/types.js';
import type { Logger } from '../utils/logger.js';
import { InvalidAddonError } from '../core/errors/index.js';

export const ADDON_STATES = ['Installed', 'Loaded', 'Active', 'Disabled', 'Error', 'Unloaded'] as const;

export type AddonState = (typeof ADDON_STATES)[number];

export const AddonManifestSchema = z
  .object({
    /** Stable addon id */
    name: z
      .string()
      .min(1)
      .max(64)
      .regex(/^[a-z0-9][a-z0-9._-]*$/, 'Use lower-case letters, digits, ".", "_" or "-"'),
    displayName: z.string().optional(),
    version: z.string().min(1),
    description: z.string().optional(),
    author: z.string().optional(),
    /** Default priority for hooks that declare none */
    order: z.number().int().optional(),

    // Entry module, relative to the addon directory
    main: z.string().optional(),

    /** Hook name -> rule declaration, validated by the rule matcher */
    hooks: z.record(z.string().min(1), z.unknown()).default({}),

    /** Condition strings telling the proxy which traffic to route through the engine */
    interceptRules: z.array(z.string().min(1)).default([]),

    /** Configuration defaults */
    config: z.record(z.unknown()).optional(),
  })
  .strict();

export type AddonManifest = z.input<typeof AddonManifestSchema>;
export type ParsedManifest = z.output<typeof AddonManifestSchema>;

export type AddonConfig = Record<string, unknown>;

export interface AddonSetupContext {
  addonId: string;
  /** Unique per setup; an upgrade sets the new code up under a fresh one */
  instanceId: string;
  config: Readonly<AddonConfig>;
  logger: Logger;
}

/**
 * A running addon: one handler per declared hook name
 */
export interface AddonInstance {
  handlers: Record<string, HookHandler>;
  dispose?: () => void | Promise<void>;
}

/**
 * The capability interface every addon implements
 */
export interface AddonModule {
  manifest: AddonManifest;
  /** Validates the configuration blob at install and reconfigure time */
  configSchema?: z.ZodType<AddonConfig, z.ZodTypeDef, unknown>;
  setup(context: AddonSetupContext): AddonInstance | Promise<AddonInstance>;
}

export interface AddonErrorInfo {
  code: string;
  message: string;
  at: Date;
}

/**
 * Read-only view of an addon for the management boundary
 */
export interface AddonSummary {
  id: string;
  name: string;
  version: string;
  description?: string;
  state: AddonState;
  installOrder: number;
  hooks: string[];
  inFlight: number;
  error?: AddonErrorInfo;
}

export interface AddonStatus {
  state: AddonState;
  error?: AddonErrorInfo;
  errorHistory: AddonErrorInfo[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check a value returned by untyped addon code and wrap it as an AddonInstance
 */
export function toAddonInstance(value: unknown, addonId: string): AddonInstance {
  if (!isRecord(value) || !isRecord(value.handlers)) {
    throw new InvalidAddonError(`Addon "${addonId}" setup() must return an object with a "handlers" map`);
  }

  const handlers: Record<string, HookHandler> = {};
  for (const [name, handler] of Object.entries(value.handlers)) {
    if (typeof handler !== 'function') {
      throw new InvalidAddonError(`Handler "${name}" of addon "${addonId}" is not a function`, [
        { path: `handlers.${name}`, message: 'Expected a function' },
      ]);
    }
    handlers[name] = (event, context) => handler(event, context);
  }

  const rawDispose = value.dispose;
  let dispose: AddonInstance['dispose'];
  if (typeof rawDispose === 'function') {
    dispose = () => rawDispose();
  } else if (rawDispose !== undefined) {
    throw new InvalidAddonError(`Addon "${addonId}" dispose must be a function`);
  }

  return { handlers, dispose };
}
