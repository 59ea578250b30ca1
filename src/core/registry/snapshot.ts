/**
 * RegistrySnapshot
 *
 * Immutable view of every Active addon's hooks for one registry generation.
 * Deltas produce a new snapshot; a published snapshot is never edited.
 */

import type { EventKind, HookHandler } from '../../hooks/types.js';
import type { CompiledRule } from '../rules/types.js';
import type { AddonHandle } from './handle.js';

export interface SnapshotEntry {
  readonly addonId: string;
  readonly hookName: string;
  readonly rule: CompiledRule;
  readonly handler: HookHandler;
  readonly handle: AddonHandle;
  readonly installOrder: number;
  /** Position of the hook inside its addon's declarations */
  readonly declarationIndex: number;
}

export interface CompiledHook {
  readonly hookName: string;
  readonly rule: CompiledRule;
  readonly declarationIndex: number;
}

/**
 * Everything a snapshot needs to include one addon
 */
export interface ActiveAddon {
  readonly addonId: string;
  readonly installOrder: number;
  readonly handle: AddonHandle;
  readonly hooks: readonly CompiledHook[];
  readonly interceptRules: readonly string[];
}

const NO_ENTRIES: readonly SnapshotEntry[] = Object.freeze([]);

/**
 * Priority first, then installation order, then declaration order
 */
export function compareEntries(a: SnapshotEntry, b: SnapshotEntry): number {
  return (
    a.rule.priority - b.rule.priority ||
    a.installOrder - b.installOrder ||
    a.declarationIndex - b.declarationIndex
  );
}

export class RegistrySnapshot {
  private constructor(
    readonly generation: number,
    private readonly addons: ReadonlyMap<string, ActiveAddon>,
    private readonly byKind: ReadonlyMap<EventKind, readonly SnapshotEntry[]>,
    readonly interceptRules: readonly string[],
  ) {
    Object.freeze(this);
  }

  static empty(): RegistrySnapshot {
    return new RegistrySnapshot(0, new Map(), new Map(), Object.freeze([]));
  }

  /**
   * Ordered hooks for an event kind
   */
  hooksFor(kind: EventKind): readonly SnapshotEntry[] {
    return this.byKind.get(kind) ?? NO_ENTRIES;
  }

  hasAddon(addonId: string): boolean {
    return this.addons.has(addonId);
  }

  get addonIds(): string[] {
    return [...this.addons.keys()];
  }

  get size(): number {
    let total = 0;
    for (const entries of this.byKind.values()) total += entries.length;
    return total;
  }

  /**
   * Copy with `addon` added, replacing any earlier entries of the same id
   */
  withAddon(addon: ActiveAddon): RegistrySnapshot {
    const addons = new Map(this.addons);
    addons.set(addon.addonId, addon);
    const byKind = new Map<EventKind, SnapshotEntry[]>();
    for (const [kind, entries] of this.byKind) {
      byKind.set(
        kind,
        entries.filter((entry) => entry.addonId !== addon.addonId),
      );
    }

    for (const hook of addon.hooks) {
      const handler = addon.handle.handler(hook.hookName);
      if (!handler) continue;
      const list = byKind.get(hook.rule.event) ?? [];
      list.push(
        Object.freeze({
          addonId: addon.addonId,
          hookName: hook.hookName,
          rule: hook.rule,
          handler,
          handle: addon.handle,
          installOrder: addon.installOrder,
          declarationIndex: hook.declarationIndex,
        }),
      );
      byKind.set(hook.rule.event, list);
    }

    return RegistrySnapshot.build(this.generation + 1, addons, byKind);
  }

  /**
   * Copy without `addonId`; a copy with a new generation even when it was absent
   */
  withoutAddon(addonId: string): RegistrySnapshot {
    const addons = new Map(this.addons);
    addons.delete(addonId);
    const byKind = new Map<EventKind, SnapshotEntry[]>();
    for (const [kind, entries] of this.byKind) {
      byKind.set(
        kind,
        entries.filter((entry) => entry.addonId !== addonId),
      );
    }
    return RegistrySnapshot.build(this.generation + 1, addons, byKind);
  }

  private static build(
    generation: number,
    addons: Map<string, ActiveAddon>,
    byKind: Map<EventKind, SnapshotEntry[]>,
  ): RegistrySnapshot {
    const frozen = new Map<EventKind, readonly SnapshotEntry[]>();
    for (const [kind, entries] of byKind) {
      if (entries.length === 0) continue;
      frozen.set(kind, Object.freeze([...entries].sort(compareEntries)));
    }

    const ordered = [...addons.values()].sort((a, b) => a.installOrder - b.installOrder);
    const rules = new Set<string>();
    for (const addon of ordered) {
      for (const rule of addon.interceptRules) rules.add(rule);
    }

    return new RegistrySnapshot(generation, addons, frozen, Object.freeze([...rules]));
  }
}
