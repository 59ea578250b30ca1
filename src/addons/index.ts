export * from './types.js';
export * from './manager.js';
export * from './store.js';
export * from './loader.js';
export * from './catalog.js';
export * from './builtin/index.js';
