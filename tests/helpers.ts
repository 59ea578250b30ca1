/**
 * Shared test fixtures
 */

import type { AddonModule, AddonManifest, AddonConfig } from '../src/addons/types.js';
import { AddonHandle } from '../src/core/registry/handle.js';
import { RegistrySnapshot, type ActiveAddon } from '../src/core/registry/snapshot.js';
import type { SnapshotSource } from '../src/core/registry/registry.js';
import { ruleMatcher } from '../src/core/rules/matcher.js';
import type { HookDeclaration } from '../src/core/rules/types.js';
import type { TrafficOccurrence } from '../src/hooks/dispatcher.js';
import type { EventKind, HookHandler, TrafficAttributes, TrafficEvent } from '../src/hooks/types.js';
import { passThrough } from '../src/hooks/verdict.js';

export function occurrence(
  kind: EventKind,
  attributes: TrafficAttributes = {},
  flowId = 'flow-1',
): TrafficOccurrence {
  return { kind, flowId, attributes: Object.freeze({ ...attributes }) };
}

export function trafficEvent(kind: EventKind, attributes: TrafficAttributes = {}): TrafficEvent {
  return { ...occurrence(kind, attributes), verdict: passThrough(0) };
}

export interface TestHook {
  rule: HookDeclaration;
  handler: HookHandler;
}

/**
 * Build the snapshot input for one addon from inline hooks
 */
export function activeAddon(
  addonId: string,
  installOrder: number,
  hooks: Record<string, TestHook>,
  interceptRules: string[] = [],
): ActiveAddon {
  const handlers: Record<string, HookHandler> = {};
  const compiled = Object.entries(hooks).map(([hookName, hook], declarationIndex) => {
    handlers[hookName] = hook.handler;
    return { hookName, rule: ruleMatcher.compile(hook.rule, `hooks.${hookName}`), declarationIndex };
  });
  return {
    addonId,
    installOrder,
    handle: new AddonHandle(addonId, `${addonId}~test`, { handlers }, {}),
    hooks: compiled,
    interceptRules,
  };
}

export function snapshotOf(...addons: ActiveAddon[]): RegistrySnapshot {
  return addons.reduce((snapshot, addon) => snapshot.withAddon(addon), RegistrySnapshot.empty());
}

/**
 * Snapshot source whose current snapshot the test can swap
 */
export class StaticSource implements SnapshotSource {
  constructor(public snapshot: RegistrySnapshot) {}

  current(): RegistrySnapshot {
    return this.snapshot;
  }
}

export interface TestAddonOptions {
  version?: string;
  order?: number;
  interceptRules?: string[];
  config?: AddonConfig;
  configSchema?: AddonModule['configSchema'];
  dispose?: () => void | Promise<void>;
  /** Called with the config setup() received */
  onSetup?: (config: Readonly<AddonConfig>) => void;
}

/**
 * An addon module whose hooks and handlers are given inline
 */
export function testAddon(name: string, hooks: Record<string, TestHook>, options: TestAddonOptions = {}): AddonModule {
  const declarations: Record<string, HookDeclaration> = {};
  const handlers: Record<string, HookHandler> = {};
  for (const [hookName, hook] of Object.entries(hooks)) {
    declarations[hookName] = hook.rule;
    handlers[hookName] = hook.handler;
  }

  const manifest: AddonManifest = {
    name,
    version: options.version ?? '1.0.0',
    order: options.order,
    hooks: declarations,
    interceptRules: options.interceptRules,
    config: options.config,
  };

  return {
    manifest,
    configSchema: options.configSchema,
    setup({ config }) {
      options.onSetup?.(config);
      return { handlers, dispose: options.dispose };
    },
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
