/**
 * AddonHandle
 *
 * Owns one running addon instance and counts the invocations holding it.
 * Teardown waits on `retire()` before the instance is disposed.
 */

import type { AddonConfig, AddonInstance } from '../../addons/types.js';
import type { HookHandler } from '../../hooks/types.js';

export class AddonHandle {
  private leases = 0;
  private waiters: Array<() => void> = [];
  private retiredFlag = false;

  constructor(
    readonly addonId: string,
    /** Id this instance was set up under (differs from addonId during an upgrade) */
    readonly instanceId: string,
    readonly instance: AddonInstance,
    readonly config: Readonly<AddonConfig>,
  ) {}

  handler(hookName: string): HookHandler | undefined {
    return this.instance.handlers[hookName];
  }

  get inFlight(): number {
    return this.leases;
  }

  get retired(): boolean {
    return this.retiredFlag;
  }

  /**
   * Take a lease; the returned function releases it (idempotent)
   */
  acquire(): () => void {
    this.leases++;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.leases--;
      if (this.leases === 0) {
        const waiters = this.waiters;
        this.waiters = [];
        for (const resolve of waiters) resolve();
      }
    };
  }

  /**
   * Mark the handle as leaving service and resolve once no lease remains
   */
  retire(): Promise<void> {
    this.retiredFlag = true;
    if (this.leases === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
