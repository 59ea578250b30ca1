import { describe, it, expect } from 'vitest';
import { AddonHandle } from '../../../src/core/registry/handle.js';

describe('AddonHandle', () => {
  function createHandle(): AddonHandle {
    return new AddonHandle('sample', 'sample~1', { handlers: { h: () => undefined } }, { level: 1 });
  }

  describe('acquire()', () => {
    it('should count leases and release each once', () => {
      const handle = createHandle();
      const releaseA = handle.acquire();
      const releaseB = handle.acquire();
      expect(handle.inFlight).toBe(2);

      releaseA();
      releaseA();
      expect(handle.inFlight).toBe(1);

      releaseB();
      expect(handle.inFlight).toBe(0);
    });
  });

  describe('retire()', () => {
    it('should resolve at once with no lease held', async () => {
      const handle = createHandle();
      await handle.retire();
      expect(handle.retired).toBe(true);
    });

    it('should wait for the last lease', async () => {
      const handle = createHandle();
      const release = handle.acquire();
      let drained = false;
      const retiring = handle.retire().then(() => {
        drained = true;
      });

      await Promise.resolve();
      expect(drained).toBe(false);

      release();
      await retiring;
      expect(drained).toBe(true);
    });
  });

  describe('handler()', () => {
    it('should look up handlers by hook name', () => {
      const handle = createHandle();
      expect(handle.handler('h')).toBeTypeOf('function');
      expect(handle.handler('missing')).toBeUndefined();
      expect(handle.config).toEqual({ level: 1 });
    });
  });
});
