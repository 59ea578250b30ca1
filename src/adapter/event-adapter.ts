/**
 * Event Adapter
 *
 * Turns proxy engine callbacks into traffic events and verdicts back into
 * engine actions. Holds no addon-visible state.
 *
 * Traffic never stalls on the engine: if dispatch fails or exceeds the
 * reaction budget the adapter answers `continue`.
 */

import { errorMessage } from '../core/errors/index.js';
import { freezeAttributes, type TrafficOccurrence } from '../hooks/dispatcher.js';
import type { EventKind, TrafficAttributes, Verdict } from '../hooks/types.js';
import { createLogger } from '../utils/logger.js';
import type {
  EngineAction,
  EngineConnection,
  EngineFlow,
  EngineHeaderChange,
  EngineHeaders,
  EngineRequest,
  EngineResponse,
  EngineWebSocketMessage,
} from './types.js';

const logger = createLogger('adapter');

const CONTINUE: EngineAction = Object.freeze({ type: 'continue' });

const DEFAULT_PORTS: Record<EngineRequest['scheme'], number> = {
  http: 80,
  ws: 80,
  https: 443,
  wss: 443,
};

export interface DispatchTarget {
  handle(occurrence: TrafficOccurrence): Promise<Verdict>;
}

export interface EventAdapterOptions {
  /** Longest the engine may wait for a verdict; unbounded when absent */
  reactionTimeoutMs?: number;
}

export class EventAdapter {
  constructor(
    private readonly target: DispatchTarget,
    private readonly options: EventAdapterOptions = {},
  ) {}

  onRequest(flow: EngineFlow): Promise<EngineAction> {
    return this.dispatch(requestOccurrence(flow));
  }

  onResponse(flow: EngineFlow): Promise<EngineAction> {
    return this.dispatch(toOccurrence('response-received', flow, {
      ...requestAttributes(flow.request),
      ...connectionAttributes(flow),
      ...responseAttributes(flow.response),
    }));
  }

  onTlsEstablished(flow: EngineFlow): Promise<EngineAction> {
    return this.dispatch(toOccurrence('tls-established', flow, {
      ...requestAttributes(flow.request),
      ...connectionAttributes(flow),
    }));
  }

  onWebSocketMessage(flow: EngineFlow, message: EngineWebSocketMessage): Promise<EngineAction> {
    return this.dispatch(toOccurrence('websocket-message', flow, {
      ...requestAttributes(flow.request),
      ...connectionAttributes(flow),
      wsDirection: message.fromClient ? 'client' : 'server',
      body: message.content,
    }));
  }

  onConnectionClosed(flow: EngineFlow): Promise<EngineAction> {
    return this.dispatch(toOccurrence('connection-closed', flow, {
      ...requestAttributes(flow.request),
      ...connectionAttributes(flow),
    }));
  }

  /**
   * Fold a verdict into the action the engine applies
   */
  static toAction(verdict: Verdict): EngineAction {
    switch (verdict.action) {
      case 'respond': {
        const response = verdict.response;
        if (!response) return CONTINUE;
        return {
          type: 'respond',
          statusCode: response.statusCode,
          headers: { ...(response.headers ?? {}) },
          body: response.body ?? '',
        };
      }
      case 'block': {
        const block = verdict.block;
        if (!block) return CONTINUE;
        return { type: 'block', statusCode: block.statusCode, reason: block.reason };
      }
      case 'modify':
        return {
          type: 'modify',
          headers: verdict.headerEdits.map((edit): EngineHeaderChange =>
            edit.op === 'set'
              ? { type: 'set', name: edit.name, value: edit.value }
              : { type: 'remove', name: edit.name },
          ),
          ...(verdict.body !== undefined ? { body: verdict.body } : {}),
        };
      default:
        return CONTINUE;
    }
  }

  private async dispatch(occurrence: TrafficOccurrence): Promise<EngineAction> {
    const { kind, flowId } = occurrence;
    try {
      const verdict = await this.withinBudget(this.target.handle(occurrence), kind, flowId);
      return verdict ? EventAdapter.toAction(verdict) : CONTINUE;
    } catch (error) {
      logger.error(`Dispatch of ${kind} for flow ${flowId} failed: ${errorMessage(error)}`);
      return CONTINUE;
    }
  }

  private async withinBudget(pending: Promise<Verdict>, kind: EventKind, flowId: string): Promise<Verdict | undefined> {
    const budget = this.options.reactionTimeoutMs;
    if (budget === undefined) {
      return pending;
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<undefined>((resolve) => {
      timer = setTimeout(() => {
        logger.warn(`No verdict for ${kind} of flow ${flowId} within ${budget}ms, continuing`);
        resolve(undefined);
      }, budget);
    });

    try {
      return await Promise.race([pending, expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Build a traffic occurrence with frozen attributes
 */
export function toOccurrence(kind: EventKind, flow: EngineFlow, attributes: TrafficAttributes): TrafficOccurrence {
  return {
    kind,
    flowId: flow.id,
    attributes: freezeAttributes(compact(attributes)),
  };
}

export function requestOccurrence(flow: EngineFlow): TrafficOccurrence {
  return toOccurrence('request-received', flow, {
    ...requestAttributes(flow.request),
    ...connectionAttributes(flow),
    body: flow.request?.body,
  });
}

/**
 * Lower-case header names and join repeated values
 */
export function normalizeHeaders(headers: EngineHeaders | undefined): Record<string, string> | undefined {
  if (!headers) return undefined;
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    normalized[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return normalized;
}

function requestAttributes(request: EngineRequest | undefined): TrafficAttributes {
  if (!request) return {};
  const host = request.host.toLowerCase();
  const headers = normalizeHeaders(request.headers);
  const portSuffix = request.port === DEFAULT_PORTS[request.scheme] ? '' : `:${request.port}`;
  return {
    host,
    path: request.path,
    url: `${request.scheme}://${host}${portSuffix}${request.path}`,
    method: request.method.toUpperCase(),
    scheme: request.scheme,
    port: request.port,
    headers,
    contentType: headers?.['content-type'],
  };
}

function responseAttributes(response: EngineResponse | undefined): TrafficAttributes {
  if (!response) return {};
  const headers = normalizeHeaders(response.headers);
  return {
    statusCode: response.statusCode,
    headers,
    contentType: headers?.['content-type'],
    body: response.body,
  };
}

function connectionAttributes(flow: EngineFlow): TrafficAttributes {
  const { client, server } = flow;
  return {
    clientIp: client?.address?.ip,
    clientPort: client?.address?.port,
    serverIp: server?.address?.ip,
    sniHost: sniOf(client) ?? sniOf(server),
  };
}

function sniOf(connection: EngineConnection | undefined): string | undefined {
  return connection?.sni?.toLowerCase();
}

/**
 * Drop absent attributes so `exists` sees only what the engine reported
 */
function compact(attributes: TrafficAttributes): TrafficAttributes {
  const result: TrafficAttributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}
