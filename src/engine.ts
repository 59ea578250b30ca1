/**
 * Hook Engine
 *
 * Wires the registry, lifecycle manager, dispatcher and event adapter
 * together and exposes the management boundary.
 *
 * Usage:
 * ```typescript
 * import { createEngine } from './engine.js';
 *
 * const engine = await createEngine();
 * await engine.start();
 *
 * const id = await engine.installAddon('builtin:host-blocker', { hosts: ['*.ads.example'] });
 * await engine.enableAddon(id);
 *
 * const action = await engine.adapter.onRequest(flow);
 * ```
 */

import { EventAdapter } from './adapter/event-adapter.js';
import { AddonCatalog } from './addons/catalog.js';
import { discoverAddons } from './addons/loader.js';
import { LifecycleManager, type UninstallOptions } from './addons/manager.js';
import { JsonFileAddonStore, MemoryAddonStore, type AddonStore } from './addons/store.js';
import type { AddonConfig, AddonModule, AddonState, AddonStatus, AddonSummary } from './addons/types.js';
import { getDefaultConfig, loadConfig, type LoadConfigOptions } from './core/config/loader.js';
import type { EngineConfig } from './core/config/types.js';
import { errorMessage } from './core/errors/index.js';
import { AddonRegistry } from './core/registry/registry.js';
import { Dispatcher, type TrafficOccurrence } from './hooks/dispatcher.js';
import type { Verdict } from './hooks/types.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const logger = createLogger('engine');

/**
 * An addon module, a `builtin:<name>` reference or an addon directory
 */
export type AddonSource = AddonModule | string;

export interface HookEngineOptions {
  config?: EngineConfig;
  store?: AddonStore;
  catalog?: AddonCatalog;
  /** Clock used for failure windows */
  now?: () => number;
}

export interface InstallAddonOptions {
  /** Set up right away (default true) */
  load?: boolean;
  /** Activate after setup; defaults to `lifecycle.enableOnInstall` */
  enable?: boolean;
}

export interface StartResult {
  restored: string[];
  discovered: string[];
  failed: Array<{ source: string; error: string }>;
}

export class HookEngine {
  readonly config: EngineConfig;
  readonly registry: AddonRegistry;
  readonly lifecycle: LifecycleManager;
  readonly dispatcher: Dispatcher;
  readonly adapter: EventAdapter;
  readonly store: AddonStore;
  readonly catalog: AddonCatalog;
  private started = false;

  constructor(options: HookEngineOptions = {}) {
    this.config = options.config ?? getDefaultConfig();
    setLogLevel(this.config.logLevel);

    this.store =
      options.store ??
      (this.config.storePath ? new JsonFileAddonStore(this.config.storePath) : new MemoryAddonStore());
    this.catalog = options.catalog ?? new AddonCatalog();
    this.registry = new AddonRegistry();
    this.lifecycle = new LifecycleManager({
      registry: this.registry,
      store: this.store,
      teardownTimeoutMs: this.config.lifecycle.teardownTimeoutMs,
      enableOnInstall: this.config.lifecycle.enableOnInstall,
    });

    const { dispatch } = this.config;
    this.dispatcher = new Dispatcher({
      snapshots: this.registry,
      hookTimeoutMs: dispatch.hookTimeoutMs,
      failureThreshold: dispatch.failureThreshold,
      failureWindowMs: dispatch.failureWindowMs,
      onIsolate: (addonId, reason, instanceId) => this.lifecycle.isolate(addonId, reason, instanceId),
      now: options.now,
    });
    this.adapter = new EventAdapter(this.dispatcher, { reactionTimeoutMs: dispatch.reactionTimeoutMs });
  }

  // ==========================================================================
  // Startup / Shutdown
  // ==========================================================================

  /**
   * Restore persisted addons with their enabled state, then install addons
   * found in `addonDirs` that are not installed yet
   */
  async start(): Promise<StartResult> {
    const result: StartResult = { restored: [], discovered: [], failed: [] };
    if (this.started) {
      return result;
    }
    this.started = true;

    for (const entry of await this.store.load()) {
      try {
        const module = await this.catalog.resolve(entry.source);
        const id = await this.lifecycle.install(module, entry.config, {
          enable: entry.enabled,
          installOrder: entry.installOrder,
          sourceRef: entry.source,
        });
        result.restored.push(id);
      } catch (error) {
        logger.error(`Could not restore ${entry.id} from ${entry.source}: ${errorMessage(error)}`);
        result.failed.push({ source: entry.source, error: errorMessage(error) });
      }
    }

    for (const found of await discoverAddons(this.config.addonDirs)) {
      if (this.registry.has(found.manifest.name)) continue;
      try {
        result.discovered.push(await this.installAddon(found.dir));
      } catch (error) {
        logger.error(`Could not install ${found.dir}: ${errorMessage(error)}`);
        result.failed.push({ source: found.dir, error: errorMessage(error) });
      }
    }

    logger.info(
      `Started with ${result.restored.length} restored and ${result.discovered.length} discovered addon(s)`,
    );
    return result;
  }

  /**
   * Uninstall every addon and wait until all instances are released.
   * Persisted state is kept for the next start.
   */
  async stop(): Promise<void> {
    await this.lifecycle.shutdown();
    this.started = false;
    logger.info('Stopped');
  }

  // ==========================================================================
  // Management boundary
  // ==========================================================================

  async installAddon(source: AddonSource, config: AddonConfig = {}, options: InstallAddonOptions = {}): Promise<string> {
    const { module, sourceRef } = await this.resolveSource(source);
    return this.lifecycle.install(module, config, { ...options, sourceRef });
  }

  loadAddon(addonId: string): Promise<AddonState> {
    return this.lifecycle.load(addonId);
  }

  async enableAddon(addonId: string): Promise<void> {
    await this.lifecycle.enable(addonId);
    this.dispatcher.resetFailures(addonId);
  }

  disableAddon(addonId: string): Promise<void> {
    return this.lifecycle.disable(addonId);
  }

  async upgradeAddon(addonId: string, source: AddonSource): Promise<AddonState> {
    const { module, sourceRef } = await this.resolveSource(source);
    const state = await this.lifecycle.upgrade(addonId, module, { sourceRef });
    this.dispatcher.resetFailures(addonId);
    return state;
  }

  uninstallAddon(addonId: string, options: UninstallOptions = {}): Promise<void> {
    return this.lifecycle.uninstall(addonId, options);
  }

  listAddons(): AddonSummary[] {
    return this.lifecycle.list();
  }

  getAddonState(addonId: string): AddonStatus {
    return this.lifecycle.getState(addonId);
  }

  getAddonConfig(addonId: string): AddonConfig {
    return this.lifecycle.getConfig(addonId);
  }

  updateAddonConfig(addonId: string, config: AddonConfig): Promise<AddonState> {
    return this.lifecycle.reconfigure(addonId, config);
  }

  listInterceptRules(): string[] {
    return this.lifecycle.interceptRules();
  }

  /**
   * Dispatch one occurrence directly, bypassing the adapter
   */
  handle(occurrence: TrafficOccurrence): Promise<Verdict> {
    return this.dispatcher.handle(occurrence);
  }

  private async resolveSource(source: AddonSource): Promise<{ module: AddonModule; sourceRef?: string }> {
    if (typeof source !== 'string') {
      return { module: source };
    }
    const sourceRef = this.catalog.normalize(source);
    return { module: await this.catalog.resolve(sourceRef), sourceRef };
  }
}

/**
 * Load configuration and build an engine
 */
export async function createEngine(
  options: LoadConfigOptions & Omit<HookEngineOptions, 'config'> = {},
): Promise<HookEngine> {
  const { cwd, env, ...rest } = options;
  const config = await loadConfig({ cwd, env });
  return new HookEngine({ ...rest, config });
}

// Global engine instance
let globalEngine: HookEngine | null = null;

/**
 * Get or create the global engine
 */
export function getEngine(): HookEngine {
  if (!globalEngine) {
    globalEngine = new HookEngine();
  }
  return globalEngine;
}

/**
 * Initialize the global engine with options
 */
export function initializeEngine(options?: HookEngineOptions): HookEngine {
  globalEngine = new HookEngine(options);
  return globalEngine;
}

/**
 * Reset the global engine
 */
export function resetEngine(): void {
  globalEngine = null;
}

export * from './adapter/index.js';
export * from './addons/index.js';
export * from './core/config/index.js';
export * from './core/errors/index.js';
export * from './core/registry/index.js';
export * from './core/rules/index.js';
export * from './hooks/index.js';
