/**
 * Addon persistence
 *
 * Remembers which addons are installed, where they came from, whether they
 * were enabled and their configuration, so `start()` can rebuild the set.
 */

import fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, ConfigErrorCode } from '../core/errors/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('store');

export const StoredAddonSchema = z.object({
  id: z.string().min(1),
  /** Catalog reference or addon directory */
  source: z.string().min(1),
  enabled: z.boolean(),
  config: z.record(z.unknown()).default({}),
  installOrder: z.number().int().nonnegative(),
});

export const StoreFileSchema = z.object({
  version: z.literal(1),
  addons: z.array(StoredAddonSchema).default([]),
});

export type StoredAddon = z.output<typeof StoredAddonSchema>;

export interface AddonStore {
  /** Entries in installation order */
  load(): Promise<StoredAddon[]>;
  put(entry: StoredAddon): Promise<void>;
  delete(addonId: string): Promise<void>;
}

function byInstallOrder(a: StoredAddon, b: StoredAddon): number {
  return a.installOrder - b.installOrder;
}

export class MemoryAddonStore implements AddonStore {
  private readonly entries: Map<string, StoredAddon> = new Map();

  constructor(initial: StoredAddon[] = []) {
    for (const entry of initial) this.entries.set(entry.id, entry);
  }

  async load(): Promise<StoredAddon[]> {
    return [...this.entries.values()].map((entry) => ({ ...entry })).sort(byInstallOrder);
  }

  async put(entry: StoredAddon): Promise<void> {
    this.entries.set(entry.id, { ...entry, config: { ...entry.config } });
  }

  async delete(addonId: string): Promise<void> {
    this.entries.delete(addonId);
  }
}

export class JsonFileAddonStore implements AddonStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<StoredAddon[]> {
    if (!(await fs.pathExists(this.filePath))) {
      return [];
    }

    let raw: unknown;
    try {
      raw = await fs.readJSON(this.filePath);
    } catch (error) {
      throw new ConfigError(
        `Addon store ${this.filePath} is not valid JSON`,
        ConfigErrorCode.INVALID_JSON,
        'Fix or delete the file; it is rewritten on the next install',
        { cause: error },
      );
    }

    const parsed = StoreFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigError(
        `Addon store ${this.filePath} is malformed at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'unknown'}`,
        ConfigErrorCode.INVALID_VALUE,
      );
    }
    return parsed.data.addons.sort(byInstallOrder);
  }

  async put(entry: StoredAddon): Promise<void> {
    const entries = (await this.load()).filter((existing) => existing.id !== entry.id);
    entries.push(entry);
    await this.write(entries);
  }

  async delete(addonId: string): Promise<void> {
    const entries = await this.load();
    const remaining = entries.filter((entry) => entry.id !== addonId);
    if (remaining.length !== entries.length) {
      await this.write(remaining);
    }
  }

  private async write(entries: StoredAddon[]): Promise<void> {
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.writeJSON(this.filePath, { version: 1, addons: entries.sort(byInstallOrder) }, { spaces: 2 });
    logger.debug(`Saved ${entries.length} addon(s) to ${this.filePath}`);
  }
}
