/**
 * Traffic & Verdict Types
 *
 * Defines the normalized shapes that flow through a dispatch cycle: the
 * traffic event handed in by the event adapter, the contribution each hook
 * returns, and the verdict handed back to the proxy engine.
 */

import type { Logger } from '../utils/logger.js';

/**
 * All supported traffic event kinds
 */
export const EVENT_KINDS = [
  'request-received',
  'response-received',
  'tls-established',
  'websocket-message',
  'connection-closed',
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

/**
 * Header map, keys lower-cased
 */
export type HeaderMap = Readonly<Record<string, string>>;

/**
 * Attributes a rule can look at. Which ones are present depends on the event kind.
 */
export interface TrafficAttributes {
  host?: string;
  path?: string;
  url?: string;
  method?: string;
  scheme?: string;
  port?: number;
  headers?: HeaderMap;
  contentType?: string;
  statusCode?: number;
  clientIp?: string;
  clientPort?: number;
  serverIp?: string;
  sniHost?: string;
  wsDirection?: 'client' | 'server';
  /** Request or response body, or the websocket message payload */
  body?: string;
}

/**
 * One normalized proxy occurrence
 */
export interface TrafficEvent {
  kind: EventKind;
  flowId: string;
  attributes: Readonly<TrafficAttributes>;
  /** Verdict accumulated by earlier hooks in this cycle (read-only view) */
  verdict: Readonly<Verdict>;
}

export interface BlockDecision {
  statusCode: number;
  reason: string;
}

export interface ReplacementResponse {
  statusCode: number;
  headers?: Record<string, string>;
  body?: string;
}

/**
 * What a single hook invocation hands back to the dispatcher
 */
export interface HookContribution {
  setHeaders?: Record<string, string>;
  removeHeaders?: string[];
  /** Replace the body (last write wins) */
  body?: string;
  /** Terminal: refuse the flow */
  block?: Partial<BlockDecision>;
  /** Terminal: answer with this response instead of contacting upstream */
  respond?: ReplacementResponse;
  annotations?: Record<string, string>;
}

export type HeaderEdit = { op: 'set'; name: string; value: string } | { op: 'remove'; name: string };

export type InvocationOutcome = 'ok' | 'error' | 'timeout';

export interface InvocationRecord {
  addonId: string;
  hookName: string;
  outcome: InvocationOutcome;
  durationMs: number;
  error?: string;
}

export type VerdictAction = 'continue' | 'modify' | 'block' | 'respond';

/**
 * Accumulated decision for one event
 */
export interface Verdict {
  action: VerdictAction;
  headerEdits: HeaderEdit[];
  body?: string;
  block?: BlockDecision;
  response?: ReplacementResponse;
  annotations: Record<string, string>;
  invocations: InvocationRecord[];
  /** Hook that ended the cycle early */
  terminatedBy?: { addonId: string; hookName: string };
  /** Snapshot generation the cycle ran against */
  generation: number;
}

/**
 * Context handed to every handler invocation
 */
export interface HookInvocationContext {
  addonId: string;
  hookName: string;
  /** Aborted when the invocation's time budget runs out */
  signal: AbortSignal;
  config: Readonly<Record<string, unknown>>;
  logger: Logger;
}

export type HookHandler = (
  event: TrafficEvent,
  context: HookInvocationContext,
) => HookContribution | void | Promise<HookContribution | void>;
