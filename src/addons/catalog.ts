/**
 * Addon Catalog
 *
 * Resolves an addon source reference to a module:
 * - `builtin:<name>` for addons shipped with the engine
 * - anything else is an addon directory on disk
 */

import * as path from 'path';
import { AddonNotFoundError } from '../core/errors/index.js';
import { headerInjector, hostBlocker, requestLogger } from './builtin/index.js';
import { loadAddonFromDirectory } from './loader.js';
import type { AddonModule } from './types.js';

export const BUILTIN_PREFIX = 'builtin:';

export class AddonCatalog {
  private readonly builtins: Map<string, AddonModule> = new Map();

  constructor(modules: AddonModule[] = [hostBlocker, headerInjector, requestLogger]) {
    for (const module of modules) {
      this.register(module);
    }
  }

  register(module: AddonModule): void {
    this.builtins.set(module.manifest.name, module);
  }

  /**
   * References of every registered built-in, e.g. `builtin:host-blocker`
   */
  builtinRefs(): string[] {
    return [...this.builtins.keys()].map((name) => `${BUILTIN_PREFIX}${name}`);
  }

  /**
   * Normalize a reference so the same addon always persists the same way
   */
  normalize(ref: string): string {
    return ref.startsWith(BUILTIN_PREFIX) ? ref : path.resolve(ref);
  }

  async resolve(ref: string): Promise<AddonModule> {
    if (ref.startsWith(BUILTIN_PREFIX)) {
      const name = ref.slice(BUILTIN_PREFIX.length);
      const module = this.builtins.get(name);
      if (!module) {
        throw new AddonNotFoundError(ref);
      }
      return module;
    }
    return loadAddonFromDirectory(ref);
  }
}
