import { describe, it, expect } from 'vitest';
import { RegistrySnapshot } from '../../../src/core/registry/snapshot.js';
import { activeAddon, snapshotOf } from '../../helpers.js';

const noop = () => undefined;

describe('RegistrySnapshot', () => {
  describe('empty()', () => {
    it('should start at generation 0 with no hooks', () => {
      const snapshot = RegistrySnapshot.empty();
      expect(snapshot.generation).toBe(0);
      expect(snapshot.size).toBe(0);
      expect(snapshot.hooksFor('request-received')).toEqual([]);
      expect(snapshot.interceptRules).toEqual([]);
    });
  });

  describe('withAddon()', () => {
    it('should order by priority, then installation order, then declaration order', () => {
      const first = activeAddon('first', 1, {
        late: { rule: { event: 'request-received', priority: 10 }, handler: noop },
        early: { rule: { event: 'request-received', priority: 5 }, handler: noop },
        alsoLate: { rule: { event: 'request-received', priority: 10 }, handler: noop },
      });
      const second = activeAddon('second', 2, {
        mid: { rule: { event: 'request-received', priority: 5 }, handler: noop },
      });

      // install order decides, not the order the snapshot saw them
      const snapshot = snapshotOf(second, first);

      expect(snapshot.hooksFor('request-received').map((entry) => `${entry.addonId}/${entry.hookName}`)).toEqual([
        'first/early',
        'second/mid',
        'first/late',
        'first/alsoLate',
      ]);
    });

    it('should group hooks by event kind', () => {
      const snapshot = snapshotOf(
        activeAddon('a', 1, {
          onRequest: { rule: { event: 'request-received' }, handler: noop },
          onResponse: { rule: { event: 'response-received' }, handler: noop },
        }),
      );
      expect(snapshot.hooksFor('response-received').map((entry) => entry.hookName)).toEqual(['onResponse']);
      expect(snapshot.hooksFor('tls-established')).toEqual([]);
      expect(snapshot.size).toBe(2);
    });

    it('should leave the prior snapshot untouched', () => {
      const prior = snapshotOf(activeAddon('a', 1, { h: { rule: { event: 'request-received' }, handler: noop } }));
      const next = prior.withAddon(activeAddon('b', 2, { h: { rule: { event: 'request-received' }, handler: noop } }));

      expect(prior.generation).toBe(1);
      expect(next.generation).toBe(2);
      expect(prior.addonIds).toEqual(['a']);
      expect(prior.hooksFor('request-received')).toHaveLength(1);
      expect(next.hooksFor('request-received')).toHaveLength(2);
      expect(Object.isFrozen(next.hooksFor('request-received'))).toBe(true);
    });

    it('should replace the entries of an addon added again', () => {
      const prior = snapshotOf(activeAddon('a', 1, { old: { rule: { event: 'request-received' }, handler: noop } }));
      const next = prior.withAddon(activeAddon('a', 1, { fresh: { rule: { event: 'request-received' }, handler: noop } }));
      expect(next.hooksFor('request-received').map((entry) => entry.hookName)).toEqual(['fresh']);
    });
  });

  describe('withoutAddon()', () => {
    it('should drop every entry of the addon and bump the generation', () => {
      const prior = snapshotOf(
        activeAddon('a', 1, { h: { rule: { event: 'request-received' }, handler: noop } }),
        activeAddon('b', 2, { h: { rule: { event: 'request-received' }, handler: noop } }),
      );
      const next = prior.withoutAddon('a');

      expect(next.generation).toBe(3);
      expect(next.hasAddon('a')).toBe(false);
      expect(next.hooksFor('request-received').map((entry) => entry.addonId)).toEqual(['b']);
      expect(prior.hasAddon('a')).toBe(true);
    });
  });

  describe('interceptRules', () => {
    it('should dedupe rules in installation order', () => {
      const snapshot = snapshotOf(
        activeAddon('b', 2, {}, ['MATCH', 'DOMAIN,b.com']),
        activeAddon('a', 1, {}, ['DOMAIN,a.com', 'MATCH']),
      );
      expect(snapshot.interceptRules).toEqual(['DOMAIN,a.com', 'MATCH', 'DOMAIN,b.com']);
    });
  });
});
