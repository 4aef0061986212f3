export * from './arbiter.js';
export * from './catalog.js';
export * from './entries.js';
export * from './errors.js';
export * from './memory-store.js';
export * from './messages.js';
export * from './outcome.js';
export * from './search.js';
export * from './service.js';
export * from './session.js';
export * from './store.js';
