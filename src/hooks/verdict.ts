/**
 * Verdict accumulation
 *
 * Contributions merge in invocation order: header edits append, body is
 * last-write-wins, annotations merge, and the first terminal contribution
 * (block or respond) sticks for the rest of the cycle.
 */

import { z } from 'zod';
import type {
  HookContribution,
  InvocationRecord,
  Verdict,
  VerdictAction,
} from './types.js';

export const DEFAULT_BLOCK_STATUS = 403;

export const HookContributionSchema = z
  .object({
    setHeaders: z.record(z.string().min(1), z.string()).optional(),
    removeHeaders: z.array(z.string().min(1)).optional(),
    body: z.string().optional(),
    block: z
      .object({
        statusCode: z.number().int().min(100).max(599).optional(),
        reason: z.string().optional(),
      })
      .strict()
      .optional(),
    respond: z
      .object({
        statusCode: z.number().int().min(100).max(599),
        headers: z.record(z.string()).optional(),
        body: z.string().optional(),
      })
      .strict()
      .optional(),
    annotations: z.record(z.string()).optional(),
  })
  .strict()
  .refine((contribution) => !(contribution.block && contribution.respond), {
    message: 'A contribution cannot both block and respond',
  });

export function isTerminal(contribution: HookContribution): boolean {
  return contribution.block !== undefined || contribution.respond !== undefined;
}

export function passThrough(generation: number): Verdict {
  return {
    action: 'continue',
    headerEdits: [],
    annotations: {},
    invocations: [],
    generation,
  };
}

export class VerdictAccumulator {
  private readonly verdict: Verdict;

  constructor(generation: number) {
    this.verdict = passThrough(generation);
  }

  /**
   * Frozen copy for handlers to read
   */
  view(): Readonly<Verdict> {
    const { verdict } = this;
    return Object.freeze({
      ...verdict,
      action: resolveAction(verdict),
      headerEdits: [...verdict.headerEdits],
      annotations: { ...verdict.annotations },
      invocations: [...verdict.invocations],
    });
  }

  get terminal(): boolean {
    return this.verdict.block !== undefined || this.verdict.response !== undefined;
  }

  record(invocation: InvocationRecord): void {
    this.verdict.invocations.push(invocation);
  }

  /**
   * Merge one contribution.
   * @returns whether the contribution's terminal decision was accepted
   */
  apply(addonId: string, contribution: HookContribution): boolean {
    const { verdict } = this;

    for (const [name, value] of Object.entries(contribution.setHeaders ?? {})) {
      verdict.headerEdits.push({ op: 'set', name: name.toLowerCase(), value });
    }
    for (const name of contribution.removeHeaders ?? []) {
      verdict.headerEdits.push({ op: 'remove', name: name.toLowerCase() });
    }
    if (contribution.body !== undefined) {
      verdict.body = contribution.body;
    }
    if (contribution.annotations) {
      Object.assign(verdict.annotations, contribution.annotations);
    }

    if (!isTerminal(contribution) || this.terminal) {
      return false;
    }
    if (contribution.block) {
      verdict.block = {
        statusCode: contribution.block.statusCode ?? DEFAULT_BLOCK_STATUS,
        reason: contribution.block.reason ?? `Blocked by ${addonId}`,
      };
    } else if (contribution.respond) {
      verdict.response = { ...contribution.respond };
    }
    return true;
  }

  terminate(addonId: string, hookName: string): void {
    this.verdict.terminatedBy = { addonId, hookName };
  }

  result(): Verdict {
    return { ...this.verdict, action: resolveAction(this.verdict) };
  }
}

function resolveAction(verdict: Verdict): VerdictAction {
  if (verdict.response) return 'respond';
  if (verdict.block) return 'block';
  if (verdict.headerEdits.length > 0 || verdict.body !== undefined) return 'modify';
  return 'continue';
}
