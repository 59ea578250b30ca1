import { describe, it, expect, afterEach, vi } from 'vitest';
import { executeHook } from '../../../src/hooks/executor.js';
import type { HookHandler, HookInvocationContext } from '../../../src/hooks/types.js';
import { createLogger } from '../../../src/utils/logger.js';
import { activeAddon, deferred, snapshotOf, trafficEvent } from '../../helpers.js';

function entryFor(handler: HookHandler) {
  const snapshot = snapshotOf(activeAddon('sample', 1, { run: { rule: { event: 'request-received' }, handler } }));
  const [entry] = snapshot.hooksFor('request-received');
  if (!entry) throw new Error('entry missing');
  return entry;
}

const options = { timeoutMs: 50, logger: createLogger('test') };

describe('executeHook()', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return a validated contribution', async () => {
    const entry = entryFor(() => ({ setHeaders: { 'x-a': '1' } }));
    const result = await executeHook(entry, trafficEvent('request-received'), options);

    expect(result.outcome).toBe('ok');
    expect(result.contribution).toEqual({ setHeaders: { 'x-a': '1' } });
    expect(result.record.addonId).toBe('sample');
    expect(result.record.hookName).toBe('run');
    expect(result.record.error).toBeUndefined();
  });

  it('should accept a handler that returns nothing', async () => {
    const result = await executeHook(entryFor(() => undefined), trafficEvent('request-received'), options);
    expect(result.outcome).toBe('ok');
    expect(result.contribution).toBeUndefined();
  });

  it('should contain a synchronous throw', async () => {
    const entry = entryFor(() => {
      throw new Error('boom');
    });
    const result = await executeHook(entry, trafficEvent('request-received'), options);

    expect(result.outcome).toBe('error');
    expect(result.record.error).toBe('boom');
    expect(entry.handle.inFlight).toBe(0);
  });

  it('should contain a rejection', async () => {
    const entry = entryFor(async () => {
      throw new Error('async boom');
    });
    const result = await executeHook(entry, trafficEvent('request-received'), options);
    expect(result.outcome).toBe('error');
    expect(result.record.error).toBe('async boom');
  });

  it('should reject a malformed contribution', async () => {
    const entry = entryFor(() => ({ block: { statusCode: 42 } }));
    const result = await executeHook(entry, trafficEvent('request-received'), options);

    expect(result.outcome).toBe('error');
    expect(result.record.error).toMatch(/^Invalid contribution: block\.statusCode: /);
  });

  it('should time out, abort the signal and keep the lease until the handler settles', async () => {
    vi.useFakeTimers();
    const gate = deferred();
    let context: HookInvocationContext | undefined;
    const entry = entryFor((_event, ctx) => {
      context = ctx;
      return gate.promise;
    });

    const pending = executeHook(entry, trafficEvent('request-received'), options);
    await vi.advanceTimersByTimeAsync(50);
    const result = await pending;

    expect(result.outcome).toBe('timeout');
    expect(result.record.error).toBe('Timed out after 50ms');
    expect(context?.signal.aborted).toBe(true);
    expect(entry.handle.inFlight).toBe(1);

    gate.resolve();
    await gate.promise;
    await Promise.resolve();
    expect(entry.handle.inFlight).toBe(0);
  });

  it('should hand the addon config to the handler', async () => {
    let seen: Readonly<Record<string, unknown>> | undefined;
    await executeHook(
      entryFor((_event, ctx) => {
        seen = ctx.config;
      }),
      trafficEvent('request-received'),
      options,
    );
    expect(seen).toEqual({});
  });
});
