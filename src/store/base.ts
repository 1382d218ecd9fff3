import type { Entity, EntityKey, Query } from '../types.js';

/**
 * Abstract hierarchical key-value document store.
 */
export interface DocumentStore {
  get(key: EntityKey): Promise<Entity | null>;
  /** Create or replace by key. Returns the key, completed if it was not. */
  put(entity: Entity): Promise<EntityKey>;
  query(query: Query): Promise<Entity[]>;
  close(): Promise<void>;
}
