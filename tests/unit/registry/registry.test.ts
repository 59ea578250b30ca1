import { describe, it, expect, beforeEach } from 'vitest';
import { AddonManifestSchema } from '../../../src/addons/types.js';
import { RegistryConsistencyError } from '../../../src/core/errors/index.js';
import { AddonRegistry, type AddonRecord } from '../../../src/core/registry/registry.js';
import { activeAddon, testAddon } from '../../helpers.js';

function record(id: string, installOrder: number): AddonRecord {
  const module = testAddon(id, {});
  return {
    id,
    installOrder,
    state: 'Active',
    module,
    manifest: AddonManifestSchema.parse(module.manifest),
    config: {},
    hooks: [],
    errorHistory: [],
    installedAt: new Date(),
    updatedAt: new Date(),
  };
}

describe('AddonRegistry', () => {
  let registry: AddonRegistry;

  beforeEach(() => {
    registry = new AddonRegistry();
    registry.add(record('a', 1));
  });

  describe('publish()', () => {
    it('should swap in the derived snapshot', () => {
      const next = registry.publish((prior) =>
        prior.withAddon(activeAddon('a', 1, { h: { rule: { event: 'request-received' }, handler: () => undefined } })),
      );
      expect(registry.current()).toBe(next);
      expect(next.generation).toBe(1);
    });

    it('should reject a snapshot naming an unknown addon', () => {
      const before = registry.current();
      expect(() => registry.publish((prior) => prior.withAddon(activeAddon('ghost', 9, {})))).toThrow(
        new RegistryConsistencyError('Snapshot 1 references unknown addon "ghost"'),
      );
      expect(registry.current()).toBe(before);
    });

    it('should reject a snapshot that skips or repeats a generation', () => {
      expect(() => registry.publish((prior) => prior)).toThrow('Snapshot generation 0 does not follow 0');
      expect(() => registry.publish((prior) => prior.withoutAddon('a').withoutAddon('a'))).toThrow(
        'Snapshot generation 2 does not follow 0',
      );
    });

    it('should reject a derivation that raced another publish', () => {
      expect(() =>
        registry.publish((prior) => {
          registry.publish((inner) => inner.withoutAddon('a'));
          return prior.withoutAddon('a');
        }),
      ).toThrow('Snapshot 0 was replaced while deriving its successor');
      expect(registry.current().generation).toBe(1);
    });
  });

  describe('install order', () => {
    it('should hand out increasing numbers above reserved ones', () => {
      expect(registry.nextInstallOrder()).toBe(1);
      registry.reserveInstallOrder(5);
      expect(registry.nextInstallOrder()).toBe(6);
      registry.reserveInstallOrder(2);
      expect(registry.nextInstallOrder()).toBe(7);
    });

    it('should list records in installation order', () => {
      registry.add(record('c', 3));
      registry.add(record('b', 2));
      expect(registry.list().map((entry) => entry.id)).toEqual(['a', 'b', 'c']);
    });
  });

  describe('recordError()', () => {
    it('should keep a bounded history', () => {
      const entry = record('x', 4);
      for (let i = 0; i < 25; i++) {
        registry.recordError(entry, 'ADDON_RUNTIME_FAILURE', `failure ${i}`);
      }
      expect(entry.errorHistory).toHaveLength(20);
      expect(entry.errorHistory[0]?.message).toBe('failure 5');
      expect(entry.error?.message).toBe('failure 24');
    });
  });
});
