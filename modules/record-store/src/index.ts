export * from './types.js';
export { merge, recordCommented } from './merge.js';
export { load, save, parseStore, withStoreLock } from './store.js';
export { rankUsers, compareUsers } from './ranking.js';
