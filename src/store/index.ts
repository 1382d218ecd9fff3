export type { DocumentStore } from './base.js';
export { MemoryStore } from './memory.js';
export { SqliteStore } from './sqlite.js';
export type { SqliteStoreOptions } from './sqlite.js';
export { DatastoreStore } from './datastore.js';
export type { DatastoreStoreOptions } from './datastore.js';
