/**
 * Hook Dispatch
 *
 * Routes traffic events to the hooks of active addons and folds their
 * contributions into a verdict.
 *
 * Event Kinds:
 * - request-received: client request parsed, before upstream is contacted
 * - response-received: upstream response parsed, before it reaches the client
 * - tls-established: TLS handshake finished on either side
 * - websocket-message: one websocket frame in either direction
 * - connection-closed: client or server connection went away
 *
 * Usage:
 * ```typescript
 * import { Dispatcher } from './hooks';
 *
 * const dispatcher = new Dispatcher({ snapshots: registry, hookTimeoutMs: 2000 });
 * const verdict = await dispatcher.handle({
 *   kind: 'request-received',
 *   flowId: 'f-1',
 *   attributes: { host: 'api.example.com', path: '/v1/items', method: 'GET' },
 * });
 * if (verdict.action === 'block') {
 *   console.log('Blocked:', verdict.block?.reason);
 * }
 * ```
 */

export * from './types.js';
export * from './verdict.js';
export * from './executor.js';
export * from './failure-tracker.js';
export * from './dispatcher.js';
