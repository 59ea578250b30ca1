/**
 * Hook Executor
 *
 * Runs one handler inside a failure boundary with a time budget. Every call
 * resolves to an outcome; nothing thrown by addon code escapes.
 *
 * Outcomes:
 * - ok: handler settled in time with a valid contribution (or nothing)
 * - error: handler threw, rejected, or returned an invalid contribution
 * - timeout: budget ran out; the handler's signal is aborted
 */

import { AddonRuntimeError, errorMessage } from '../core/errors/index.js';
import type { SnapshotEntry } from '../core/registry/snapshot.js';
import type { Logger } from '../utils/logger.js';
import type { HookContribution, InvocationOutcome, InvocationRecord, TrafficEvent } from './types.js';
import { HookContributionSchema } from './verdict.js';

export interface HookExecutorOptions {
  /** Budget in milliseconds */
  timeoutMs: number;
  /** Logger handed to the handler */
  logger: Logger;
}

export interface HookExecutionResult {
  outcome: InvocationOutcome;
  contribution?: HookContribution;
  record: InvocationRecord;
}

const TIMED_OUT: unique symbol = Symbol('timed-out');

export async function executeHook(
  entry: SnapshotEntry,
  event: TrafficEvent,
  options: HookExecutorOptions,
): Promise<HookExecutionResult> {
  const { addonId, hookName } = entry;
  const startTime = Date.now();
  const controller = new AbortController();

  const finish = (outcome: InvocationOutcome, error?: string, contribution?: HookContribution): HookExecutionResult => ({
    outcome,
    contribution,
    record: {
      addonId,
      hookName,
      outcome,
      durationMs: Date.now() - startTime,
      ...(error !== undefined ? { error } : {}),
    },
  });

  // Held until the handler really settles, even past its budget
  const release = entry.handle.acquire();

  let pending: Promise<HookContribution | void>;
  try {
    pending = Promise.resolve(
      entry.handler(event, {
        addonId,
        hookName,
        signal: controller.signal,
        config: entry.handle.config,
        logger: options.logger,
      }),
    );
  } catch (error) {
    release();
    return finish('error', errorMessage(error));
  }
  void pending.then(release, release);

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), options.timeoutMs);
  });

  try {
    const value = await Promise.race([pending, deadline]);
    if (value === TIMED_OUT) {
      controller.abort(new AddonRuntimeError(addonId, hookName, `timed out after ${options.timeoutMs}ms`, true));
      return finish('timeout', `Timed out after ${options.timeoutMs}ms`);
    }
    if (value === undefined) {
      return finish('ok');
    }

    const parsed = HookContributionSchema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return finish('error', `Invalid contribution: ${where}${issue?.message ?? 'unknown shape'}`);
    }
    return finish('ok', undefined, parsed.data);
  } catch (error) {
    return finish('error', errorMessage(error));
  } finally {
    clearTimeout(timer);
  }
}
