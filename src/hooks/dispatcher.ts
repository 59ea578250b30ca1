/**
 * Dispatcher
 *
 * Routes one traffic event through the matching hooks of a single registry
 * snapshot and merges their contributions into a verdict.
 *
 * Cycle:
 * 1. read the current snapshot once
 * 2. select the entries of the event's kind whose rules match
 * 3. lease every selected addon so teardown waits for this cycle
 * 4. invoke hooks in order, each inside its own failure boundary
 * 5. stop after a short-circuiting hook that produced a terminal verdict
 *
 * Rules only read the event's frozen attributes, so matching the whole list
 * up front selects the same hooks as matching each one just before its turn.
 */

import type { SnapshotEntry } from '../core/registry/snapshot.js';
import type { SnapshotSource } from '../core/registry/registry.js';
import type { AddonHandle } from '../core/registry/handle.js';
import { RuleMatcher, ruleMatcher } from '../core/rules/matcher.js';
import { errorMessage } from '../core/errors/index.js';
import { createLogger } from '../utils/logger.js';
import { executeHook } from './executor.js';
import { FailureTracker } from './failure-tracker.js';
import { VerdictAccumulator, isTerminal, passThrough } from './verdict.js';
import type { TrafficAttributes, TrafficEvent, Verdict } from './types.js';

const logger = createLogger('dispatcher');
const addonLogger = createLogger('addon');

export const DEFAULT_HOOK_TIMEOUT_MS = 5000;
export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_FAILURE_WINDOW_MS = 60_000;

/**
 * A traffic event before the dispatcher attaches its verdict view
 */
export type TrafficOccurrence = Omit<TrafficEvent, 'verdict'>;

/**
 * Called when an addon crosses the failure threshold. `instanceId` names the
 * instance the failures were counted against.
 */
export type IsolationRequest = (addonId: string, reason: string, instanceId: string) => Promise<unknown>;

/**
 * Freeze attributes together with the header map they carry
 */
export function freezeAttributes(attributes: Readonly<TrafficAttributes>): Readonly<TrafficAttributes> {
  const { headers } = attributes;
  if (Object.isFrozen(attributes) && (headers === undefined || Object.isFrozen(headers))) {
    return attributes;
  }
  return Object.freeze({
    ...attributes,
    ...(headers === undefined ? {} : { headers: Object.freeze({ ...headers }) }),
  });
}

export interface DispatcherOptions {
  snapshots: SnapshotSource;
  matcher?: RuleMatcher;
  hookTimeoutMs?: number;
  failureThreshold?: number;
  failureWindowMs?: number;
  onIsolate?: IsolationRequest;
  now?: () => number;
}

export class Dispatcher {
  private readonly snapshots: SnapshotSource;
  private readonly matcher: RuleMatcher;
  private readonly hookTimeoutMs: number;
  private readonly failures: FailureTracker;
  private onIsolate?: IsolationRequest;

  constructor(options: DispatcherOptions) {
    this.snapshots = options.snapshots;
    this.matcher = options.matcher ?? ruleMatcher;
    this.hookTimeoutMs = options.hookTimeoutMs ?? DEFAULT_HOOK_TIMEOUT_MS;
    this.failures = new FailureTracker(
      options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD,
      options.failureWindowMs ?? DEFAULT_FAILURE_WINDOW_MS,
      options.now,
    );
    this.onIsolate = options.onIsolate;
  }

  /**
   * Set the callback used for self-healing isolation
   */
  setIsolationHandler(handler: IsolationRequest): void {
    this.onIsolate = handler;
  }

  /**
   * Consecutive failures currently counted against an addon
   */
  failureCount(addonId: string): number {
    return this.failures.count(addonId);
  }

  resetFailures(addonId: string): void {
    this.failures.reset(addonId);
  }

  /**
   * Hooks that would run for an event, in order, without invoking them
   */
  plan(occurrence: TrafficOccurrence): SnapshotEntry[] {
    return this.select(this.snapshots.current().hooksFor(occurrence.kind), occurrence);
  }

  async handle(received: TrafficOccurrence): Promise<Verdict> {
    const occurrence: TrafficOccurrence = { ...received, attributes: freezeAttributes(received.attributes) };
    const snapshot = this.snapshots.current();
    const selected = this.select(snapshot.hooksFor(occurrence.kind), occurrence);
    if (selected.length === 0) {
      return passThrough(snapshot.generation);
    }

    const releases = leaseAll(selected);
    const accumulator = new VerdictAccumulator(snapshot.generation);

    try {
      for (const entry of selected) {
        const event: TrafficEvent = { ...occurrence, verdict: accumulator.view() };
        const result = await executeHook(entry, event, {
          timeoutMs: entry.rule.timeoutMs ?? this.hookTimeoutMs,
          logger: addonLogger,
        });
        accumulator.record(result.record);

        if (result.outcome !== 'ok') {
          this.recordFailure(entry, result.record.error ?? result.outcome);
          continue;
        }

        this.failures.recordSuccess(entry.addonId);
        if (!result.contribution) {
          continue;
        }
        accumulator.apply(entry.addonId, result.contribution);
        if (entry.rule.shortCircuit && isTerminal(result.contribution)) {
          accumulator.terminate(entry.addonId, entry.hookName);
          break;
        }
      }
    } finally {
      for (const release of releases) release();
    }

    return accumulator.result();
  }

  private select(entries: readonly SnapshotEntry[], occurrence: TrafficOccurrence): SnapshotEntry[] {
    const probe: TrafficEvent = { ...occurrence, verdict: passThrough(0) };
    return entries.filter((entry) => this.matcher.matches(entry.rule, probe));
  }

  private recordFailure(entry: SnapshotEntry, reason: string): void {
    logger.warn(`Hook ${entry.addonId}/${entry.hookName} failed: ${reason}`);

    if (!this.failures.recordFailure(entry.addonId)) {
      return;
    }

    logger.error(`Addon ${entry.addonId} crossed the failure threshold; requesting isolation`);
    if (!this.onIsolate) {
      return;
    }
    const reasonText = `Repeated hook failures, last: ${reason}`;
    this.onIsolate(entry.addonId, reasonText, entry.handle.instanceId).catch((error: unknown) => {
      logger.error(`Isolating addon ${entry.addonId} failed: ${errorMessage(error)}`);
    });
  }
}

function leaseAll(entries: SnapshotEntry[]): Array<() => void> {
  const handles = new Set<AddonHandle>();
  for (const entry of entries) handles.add(entry.handle);
  return [...handles].map((handle) => handle.acquire());
}
