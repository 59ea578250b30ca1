/**
 * AddonRegistry
 *
 * Holds addon records and the current snapshot pointer. The lifecycle
 * manager is the only writer; the dispatcher sees the registry through
 * `SnapshotSource` and reads `current()` once per cycle.
 */

import { RegistryConsistencyError } from '../errors/index.js';
import { createLogger } from '../../utils/logger.js';
import { EVENT_KINDS } from '../../hooks/types.js';
import type { AddonConfig, AddonErrorInfo, AddonModule, AddonState, ParsedManifest } from '../../addons/types.js';
import type { AddonHandle } from './handle.js';
import { RegistrySnapshot, compareEntries, type CompiledHook } from './snapshot.js';

const logger = createLogger('registry');

/** Error reasons kept per addon */
const ERROR_HISTORY_LIMIT = 20;

export interface SnapshotSource {
  current(): RegistrySnapshot;
}

/**
 * Mutable lifecycle state of one addon, owned by the registry
 */
export interface AddonRecord {
  readonly id: string;
  readonly installOrder: number;
  state: AddonState;
  module: AddonModule;
  manifest: ParsedManifest;
  /** Catalog reference or directory the module came from, if any */
  sourceRef?: string;
  config: AddonConfig;
  hooks: CompiledHook[];
  handle?: AddonHandle;
  error?: AddonErrorInfo;
  errorHistory: AddonErrorInfo[];
  installedAt: Date;
  updatedAt: Date;
}

export class AddonRegistry implements SnapshotSource {
  private readonly records: Map<string, AddonRecord> = new Map();
  private snapshot: RegistrySnapshot = RegistrySnapshot.empty();
  private installCounter = 0;

  current(): RegistrySnapshot {
    return this.snapshot;
  }

  get(addonId: string): AddonRecord | undefined {
    return this.records.get(addonId);
  }

  has(addonId: string): boolean {
    return this.records.has(addonId);
  }

  /**
   * Records in installation order
   */
  list(): AddonRecord[] {
    return [...this.records.values()].sort((a, b) => a.installOrder - b.installOrder);
  }

  nextInstallOrder(): number {
    return ++this.installCounter;
  }

  /**
   * Keep restored install orders ahead of the counter
   */
  reserveInstallOrder(order: number): void {
    this.installCounter = Math.max(this.installCounter, order);
  }

  add(record: AddonRecord): void {
    this.records.set(record.id, record);
  }

  remove(addonId: string): boolean {
    return this.records.delete(addonId);
  }

  recordError(record: AddonRecord, code: string, message: string): AddonErrorInfo {
    const info: AddonErrorInfo = { code, message, at: new Date() };
    record.error = info;
    record.errorHistory.push(info);
    if (record.errorHistory.length > ERROR_HISTORY_LIMIT) {
      record.errorHistory.splice(0, record.errorHistory.length - ERROR_HISTORY_LIMIT);
    }
    return info;
  }

  /**
   * Derive the next snapshot from the current one and swap it in.
   * @throws RegistryConsistencyError when the derived snapshot does not
   *   follow the one it was copied from, or violates ordering
   */
  publish(derive: (prior: RegistrySnapshot) => RegistrySnapshot): RegistrySnapshot {
    const prior = this.snapshot;
    const next = derive(prior);

    if (this.snapshot !== prior) {
      throw new RegistryConsistencyError(`Snapshot ${prior.generation} was replaced while deriving its successor`);
    }
    if (next.generation !== prior.generation + 1) {
      throw new RegistryConsistencyError(
        `Snapshot generation ${next.generation} does not follow ${prior.generation}`,
      );
    }
    this.verify(next);

    this.snapshot = next;
    logger.debug(`Published snapshot ${next.generation} (${next.addonIds.length} active addon(s), ${next.size} hook(s))`);
    return next;
  }

  private verify(snapshot: RegistrySnapshot): void {
    for (const addonId of snapshot.addonIds) {
      const record = this.records.get(addonId);
      if (!record) {
        throw new RegistryConsistencyError(`Snapshot ${snapshot.generation} references unknown addon "${addonId}"`);
      }
    }
    for (const kind of EVENT_KINDS) {
      const entries = snapshot.hooksFor(kind);
      for (let i = 1; i < entries.length; i++) {
        const previous = entries[i - 1];
        const entry = entries[i];
        if (previous && entry && compareEntries(previous, entry) > 0) {
          throw new RegistryConsistencyError(`Snapshot ${snapshot.generation} has unordered ${kind} hooks`);
        }
      }
    }
  }
}
