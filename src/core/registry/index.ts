export { AddonRegistry } from './registry.js';
export type { AddonRecord, SnapshotSource } from './registry.js';
export { RegistrySnapshot, compareEntries } from './snapshot.js';
export type { ActiveAddon, CompiledHook, SnapshotEntry } from './snapshot.js';
export { AddonHandle } from './handle.js';
