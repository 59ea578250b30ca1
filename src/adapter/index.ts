export { EventAdapter, normalizeHeaders, requestOccurrence, toOccurrence } from './event-adapter.js';
export type { DispatchTarget, EventAdapterOptions } from './event-adapter.js';
export type * from './types.js';
