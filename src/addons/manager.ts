/**
 * Lifecycle Manager
 *
 * Drives each addon through its states and is the only writer of the
 * registry. Operations run one at a time; each resolves after the snapshot
 * it produces (if any) is published.
 *
 * States:
 * - Installed: manifest, config and hook rules validated
 * - Loaded: instance set up, not dispatched to
 * - Active: part of the current snapshot
 * - Disabled: out of the snapshot, instance kept
 * - Error: out of the snapshot, holds the failure; leaves only by upgrade
 * - Unloaded: uninstalled; the id is freed once teardown finishes
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AddonInitError,
  AddonNotFoundError,
  EngineError,
  EngineErrorCode,
  InvalidAddonError,
  InvalidRuleError,
  LifecycleConflictError,
  errorMessage,
  type ValidationIssue,
} from '../core/errors/index.js';
import { AddonHandle } from '../core/registry/handle.js';
import { AddonRegistry, type AddonRecord } from '../core/registry/registry.js';
import type { ActiveAddon, CompiledHook } from '../core/registry/snapshot.js';
import { parseCondition } from '../core/rules/condition-parser.js';
import { DEFAULT_PRIORITY, RuleMatcher, formatIssues, ruleMatcher } from '../core/rules/matcher.js';
import { createLogger } from '../utils/logger.js';
import type { AddonStore } from './store.js';
import {
  AddonManifestSchema,
  toAddonInstance,
  type AddonConfig,
  type AddonModule,
  type AddonState,
  type AddonStatus,
  type AddonSummary,
  type ParsedManifest,
} from './types.js';

const logger = createLogger('lifecycle');

export const DEFAULT_TEARDOWN_TIMEOUT_MS = 30_000;

type Operation = 'load' | 'enable' | 'disable' | 'upgrade' | 'reconfigure' | 'isolate' | 'uninstall';

const ALLOWED_FROM: Record<Operation, readonly AddonState[]> = {
  load: ['Installed'],
  enable: ['Loaded', 'Disabled'],
  disable: ['Active'],
  upgrade: ['Loaded', 'Active', 'Disabled', 'Error'],
  reconfigure: ['Loaded', 'Active', 'Disabled'],
  isolate: ['Active'],
  uninstall: ['Installed', 'Loaded', 'Active', 'Disabled', 'Error'],
};

export interface LifecycleManagerOptions {
  registry?: AddonRegistry;
  store?: AddonStore;
  matcher?: RuleMatcher;
  /** Longest teardown waits for in-flight invocations before disposing anyway */
  teardownTimeoutMs?: number;
  /** Enable addons right after install unless the call says otherwise */
  enableOnInstall?: boolean;
}

export interface InstallOptions {
  /** Set the addon up right away (default true) */
  load?: boolean;
  /** Activate after loading; defaults to the manager's enableOnInstall */
  enable?: boolean;
  /** Where the module came from; addons with a source are persisted */
  sourceRef?: string;
  /** Reuse a persisted installation order */
  installOrder?: number;
}

export interface UpgradeOptions {
  sourceRef?: string;
}

export interface UninstallOptions {
  /** Resolve only once the instance has been disposed */
  waitForRelease?: boolean;
}

/**
 * Validated, compiled form of a module, ready to be set up
 */
interface Prepared {
  manifest: ParsedManifest;
  hooks: CompiledHook[];
  config: AddonConfig;
}

export class LifecycleManager {
  readonly registry: AddonRegistry;
  private readonly store?: AddonStore;
  private readonly matcher: RuleMatcher;
  private readonly teardownTimeoutMs: number;
  private readonly enableOnInstall: boolean;
  private queue: Promise<void> = Promise.resolve();
  private readonly teardowns: Set<Promise<void>> = new Set();

  constructor(options: LifecycleManagerOptions = {}) {
    this.registry = options.registry ?? new AddonRegistry();
    this.store = options.store;
    this.matcher = options.matcher ?? ruleMatcher;
    this.teardownTimeoutMs = options.teardownTimeoutMs ?? DEFAULT_TEARDOWN_TIMEOUT_MS;
    this.enableOnInstall = options.enableOnInstall ?? false;
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /**
   * Validate, register and (by default) set up an addon
   * @returns the addon id
   */
  install(module: AddonModule, config: AddonConfig = {}, options: InstallOptions = {}): Promise<string> {
    return this.serialize(async () => {
      const prepared = this.prepare(module, config);
      const id = prepared.manifest.name;

      const existing = this.registry.get(id);
      if (existing) {
        throw new LifecycleConflictError(id, existing.state, 'install');
      }

      let installOrder: number;
      if (options.installOrder !== undefined) {
        this.registry.reserveInstallOrder(options.installOrder);
        installOrder = options.installOrder;
      } else {
        installOrder = this.registry.nextInstallOrder();
      }

      const now = new Date();
      const record: AddonRecord = {
        id,
        installOrder,
        state: 'Installed',
        module,
        manifest: prepared.manifest,
        sourceRef: options.sourceRef,
        config: prepared.config,
        hooks: prepared.hooks,
        errorHistory: [],
        installedAt: now,
        updatedAt: now,
      };
      this.registry.add(record);
      logger.info(`Installed ${id} v${prepared.manifest.version}`);

      if (options.load ?? true) {
        await this.setupRecord(record);
        if (options.enable ?? this.enableOnInstall) {
          this.activate(record);
        }
      }

      await this.persist(record);
      return id;
    });
  }

  /**
   * Set up an Installed addon
   */
  load(addonId: string): Promise<AddonState> {
    return this.serialize(async () => {
      const record = this.require(addonId, 'load');
      await this.setupRecord(record);
      return record.state;
    });
  }

  enable(addonId: string): Promise<void> {
    return this.serialize(async () => {
      const record = this.require(addonId, 'enable');
      this.activate(record);
      await this.persist(record);
    });
  }

  disable(addonId: string): Promise<void> {
    return this.serialize(async () => {
      const record = this.require(addonId, 'disable');
      this.registry.publish((prior) => prior.withoutAddon(record.id));
      this.transition(record, 'Disabled');
      await this.persist(record);
    });
  }

  /**
   * Replace an addon's code, keeping its id, configuration and install order.
   * Invalid rules or configuration leave the addon untouched; a failing
   * setup moves it to Error.
   */
  upgrade(addonId: string, module: AddonModule, options: UpgradeOptions = {}): Promise<AddonState> {
    return this.serialize(async () => {
      const record = this.require(addonId, 'upgrade');
      const prepared = this.prepare(module, record.config);
      if (prepared.manifest.name !== record.id) {
        throw new InvalidAddonError(
          `Upgrade for "${record.id}" declares name "${prepared.manifest.name}"`,
          [{ path: 'manifest.name', message: `Expected "${record.id}"` }],
        );
      }

      const handle = await this.setupOrFail(record, module, prepared);
      const previous = record.manifest.version;
      record.module = module;
      record.manifest = prepared.manifest;
      record.hooks = prepared.hooks;
      record.config = prepared.config;
      if (options.sourceRef !== undefined) {
        record.sourceRef = options.sourceRef;
      }
      this.swap(record, handle);
      if (record.state === 'Error') {
        record.error = undefined;
        this.transition(record, 'Loaded');
      }

      logger.info(`Upgraded ${record.id} ${previous} -> ${prepared.manifest.version}`);
      await this.persist(record);
      return record.state;
    });
  }

  /**
   * Apply a new configuration by setting up a fresh instance with it
   */
  reconfigure(addonId: string, config: AddonConfig): Promise<AddonState> {
    return this.serialize(async () => {
      const record = this.require(addonId, 'reconfigure');
      const prepared: Prepared = {
        manifest: record.manifest,
        hooks: record.hooks,
        config: this.validateConfig(record.module, record.manifest, config),
      };

      const handle = await this.setupOrFail(record, record.module, prepared);
      record.config = prepared.config;
      this.swap(record, handle);

      logger.info(`Reconfigured ${record.id}`);
      await this.persist(record);
      return record.state;
    });
  }

  /**
   * Pull a misbehaving Active addon out of dispatch. Does nothing when the
   * addon has already left the Active state, or when `instanceId` names an
   * instance that an upgrade or reconfigure has since replaced.
   */
  isolate(addonId: string, reason: string, instanceId?: string): Promise<void> {
    return this.serialize(async () => {
      const record = this.registry.get(addonId);
      if (!record || record.state !== 'Active') {
        logger.debug(`Skipping isolation of ${addonId}: ${record ? record.state : 'not installed'}`);
        return;
      }
      if (instanceId !== undefined && record.handle?.instanceId !== instanceId) {
        logger.debug(`Skipping isolation of ${addonId}: instance ${instanceId} was replaced`);
        return;
      }
      this.registry.publish((prior) => prior.withoutAddon(record.id));
      this.fail(record, EngineErrorCode.ADDON_RUNTIME_FAILURE, reason);
      logger.warn(`Isolated ${record.id}: ${reason}`);
    });
  }

  /**
   * Remove an addon. It stops receiving events at once; its instance is
   * disposed once no invocation holds it, and only then is the id free.
   */
  uninstall(addonId: string, options: UninstallOptions = {}): Promise<void> {
    let released: Promise<void> = Promise.resolve();
    const done = this.serialize(async () => {
      ({ released } = await this.remove(addonId));
    });
    if (!options.waitForRelease) {
      return done;
    }
    return done.then(() => released);
  }

  /**
   * Uninstall everything and wait for every teardown to finish
   */
  async shutdown(): Promise<void> {
    const pending = await this.serialize(async () => {
      const releases: Promise<void>[] = [];
      for (const record of this.registry.list().reverse()) {
        if (record.state !== 'Unloaded') {
          releases.push((await this.remove(record.id, false)).released);
        }
      }
      return releases;
    });
    await Promise.all(pending);
    await this.drain();
  }

  /**
   * Resolve once every pending teardown has finished
   */
  async drain(): Promise<void> {
    while (this.teardowns.size > 0) {
      await Promise.all([...this.teardowns]);
    }
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  list(): AddonSummary[] {
    return this.registry.list().map((record) => ({
      id: record.id,
      name: record.manifest.displayName ?? record.id,
      version: record.manifest.version,
      description: record.manifest.description,
      state: record.state,
      installOrder: record.installOrder,
      hooks: record.hooks.map((hook) => hook.hookName),
      inFlight: record.handle?.inFlight ?? 0,
      error: record.error,
    }));
  }

  getState(addonId: string): AddonStatus {
    const record = this.registry.get(addonId);
    if (!record) {
      throw new AddonNotFoundError(addonId);
    }
    return { state: record.state, error: record.error, errorHistory: [...record.errorHistory] };
  }

  getConfig(addonId: string): AddonConfig {
    const record = this.registry.get(addonId);
    if (!record) {
      throw new AddonNotFoundError(addonId);
    }
    return { ...record.config };
  }

  /**
   * Condition strings declared by active addons, in installation order
   */
  interceptRules(): string[] {
    return [...this.registry.current().interceptRules];
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.queue.then(operation);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private require(addonId: string, operation: Operation): AddonRecord {
    const record = this.registry.get(addonId);
    if (!record) {
      throw new AddonNotFoundError(addonId);
    }
    const allowed = ALLOWED_FROM[operation];
    if (!allowed.includes(record.state)) {
      throw new LifecycleConflictError(addonId, record.state, operation, allowed);
    }
    return record;
  }

  /**
   * Validate the manifest, compile every hook rule and check the config.
   * Throws before anything is registered.
   */
  private prepare(module: AddonModule, config: AddonConfig): Prepared {
    const parsed = AddonManifestSchema.safeParse(module.manifest);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error.issues, 'manifest');
      throw new InvalidAddonError(`Invalid addon manifest: ${issues[0]?.path}: ${issues[0]?.message}`, issues);
    }
    const manifest = parsed.data;

    const issues: ValidationIssue[] = [];
    const hooks: CompiledHook[] = [];
    const defaultPriority = manifest.order ?? DEFAULT_PRIORITY;
    Object.entries(manifest.hooks).forEach(([hookName, declaration], declarationIndex) => {
      try {
        const rule = this.matcher.compile(declaration, `hooks.${hookName}`, defaultPriority);
        hooks.push({ hookName, rule, declarationIndex });
      } catch (error) {
        if (!(error instanceof InvalidRuleError)) throw error;
        issues.push(...error.issues);
      }
    });
    manifest.interceptRules.forEach((condition, index) => {
      try {
        parseCondition(condition, `interceptRules[${index}]`);
      } catch (error) {
        if (!(error instanceof InvalidRuleError)) throw error;
        issues.push(...error.issues);
      }
    });
    if (issues.length > 0) {
      throw new InvalidRuleError(issues, manifest.name);
    }

    return { manifest, hooks, config: this.validateConfig(module, manifest, config) };
  }

  private validateConfig(module: AddonModule, manifest: ParsedManifest, config: AddonConfig): AddonConfig {
    const merged: AddonConfig = { ...(manifest.config ?? {}), ...config };
    if (!module.configSchema) {
      return merged;
    }
    const parsed = module.configSchema.safeParse(merged);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error.issues, 'config');
      throw new InvalidAddonError(
        `Invalid configuration for "${manifest.name}": ${issues[0]?.path}: ${issues[0]?.message}`,
        issues,
      );
    }
    return parsed.data;
  }

  /**
   * Run setup() and check that every declared hook got a handler
   */
  private async createHandle(addonId: string, module: AddonModule, prepared: Prepared): Promise<AddonHandle> {
    const instanceId = `${addonId}~${uuidv4()}`;
    const config = Object.freeze({ ...prepared.config });

    let handle: AddonHandle;
    try {
      const produced: unknown = await module.setup({ addonId, instanceId, config, logger: createLogger(addonId) });
      handle = new AddonHandle(addonId, instanceId, toAddonInstance(produced, addonId), config);
    } catch (error) {
      throw new AddonInitError(addonId, errorMessage(error), error);
    }

    const missing = prepared.hooks.filter((hook) => !handle.handler(hook.hookName)).map((hook) => hook.hookName);
    if (missing.length > 0) {
      await this.dispose(handle);
      throw new AddonInitError(addonId, `setup() returned no handler for ${missing.join(', ')}`);
    }
    logger.debug(`Set up ${instanceId}`);
    return handle;
  }

  /**
   * Installed -> Loaded, or Error when setup fails
   */
  private async setupRecord(record: AddonRecord): Promise<void> {
    try {
      record.handle = await this.createHandle(record.id, record.module, {
        manifest: record.manifest,
        hooks: record.hooks,
        config: record.config,
      });
    } catch (error) {
      this.fail(record, EngineErrorCode.ADDON_INIT_FAILURE, errorMessage(error));
      throw error;
    }
    this.transition(record, 'Loaded');
  }

  /**
   * Set up a replacement instance; on failure pull the addon into Error
   */
  private async setupOrFail(record: AddonRecord, module: AddonModule, prepared: Prepared): Promise<AddonHandle> {
    try {
      return await this.createHandle(record.id, module, prepared);
    } catch (error) {
      if (record.state === 'Active') {
        this.registry.publish((prior) => prior.withoutAddon(record.id));
      }
      this.fail(record, EngineErrorCode.ADDON_INIT_FAILURE, errorMessage(error));
      throw error;
    }
  }

  private activate(record: AddonRecord): void {
    const handle = record.handle;
    if (!handle) {
      throw new EngineError(`Addon "${record.id}" has no instance to activate`, EngineErrorCode.LIFECYCLE_CONFLICT);
    }
    this.registry.publish((prior) => prior.withAddon(toActiveAddon(record, handle)));
    this.transition(record, 'Active');
  }

  /**
   * Put a new instance in place of the current one. Active addons switch
   * over in a single publish; the old instance is torn down after it drains.
   */
  private swap(record: AddonRecord, handle: AddonHandle): void {
    const previous = record.handle;
    record.handle = handle;
    if (record.state === 'Active') {
      this.registry.publish((prior) => prior.withAddon(toActiveAddon(record, handle)));
    }
    if (previous) {
      void this.retire(previous);
    }
  }

  private fail(record: AddonRecord, code: EngineErrorCode, message: string): void {
    this.registry.recordError(record, code, message);
    this.transition(record, 'Error');
    const handle = record.handle;
    record.handle = undefined;
    if (handle) {
      void this.retire(handle);
    }
  }

  /**
   * `released` settles once the record's resources are released
   */
  private async remove(addonId: string, persist = true): Promise<{ released: Promise<void> }> {
    const record = this.require(addonId, 'uninstall');
    if (record.state === 'Active') {
      this.registry.publish((prior) => prior.withoutAddon(record.id));
    }
    this.transition(record, 'Unloaded');
    if (persist && this.store) {
      await this.store.delete(record.id).catch((error: unknown) => {
        logger.error(`Failed to forget ${record.id} in the addon store: ${errorMessage(error)}`);
      });
    }

    const handle = record.handle;
    record.handle = undefined;
    const released = handle ? this.retire(handle) : Promise.resolve();
    logger.info(`Uninstalled ${record.id}`);

    return {
      released: released.then(() => {
        if (this.registry.get(record.id) === record) {
          this.registry.remove(record.id);
        }
      }),
    };
  }

  /**
   * Wait for in-flight invocations (bounded), then dispose
   */
  private retire(handle: AddonHandle): Promise<void> {
    const task: Promise<void> = this.teardown(handle).finally(() => {
      this.teardowns.delete(task);
    });
    this.teardowns.add(task);
    return task;
  }

  private async teardown(handle: AddonHandle): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), this.teardownTimeoutMs);
    });
    const drained = await Promise.race([handle.retire().then(() => true), expired]);
    clearTimeout(timer);

    if (!drained) {
      logger.warn(
        `${handle.instanceId} still has ${handle.inFlight} invocation(s) after ${this.teardownTimeoutMs}ms; disposing anyway`,
      );
    }
    await this.dispose(handle);
  }

  private async dispose(handle: AddonHandle): Promise<void> {
    try {
      await handle.instance.dispose?.();
      logger.debug(`Disposed ${handle.instanceId}`);
    } catch (error) {
      logger.warn(`dispose() of ${handle.instanceId} failed: ${errorMessage(error)}`);
    }
  }

  private transition(record: AddonRecord, state: AddonState): void {
    logger.debug(`${record.id}: ${record.state} -> ${state}`);
    record.state = state;
    record.updatedAt = new Date();
  }

  private async persist(record: AddonRecord): Promise<void> {
    if (!this.store || record.sourceRef === undefined) {
      return;
    }
    try {
      await this.store.put({
        id: record.id,
        source: record.sourceRef,
        enabled: record.state === 'Active',
        config: record.config,
        installOrder: record.installOrder,
      });
    } catch (error) {
      logger.error(`Failed to save ${record.id} to the addon store: ${errorMessage(error)}`);
    }
  }
}

function toActiveAddon(record: AddonRecord, handle: AddonHandle): ActiveAddon {
  return {
    addonId: record.id,
    installOrder: record.installOrder,
    handle,
    hooks: record.hooks,
    interceptRules: record.manifest.interceptRules,
  };
}
