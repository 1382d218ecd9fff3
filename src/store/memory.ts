import type { DocumentStore } from './base.js';
import type { Entity, EntityKey, Query } from '../types.js';
import { encodeKey, isComplete, keyKind, withId } from './key.js';
import { cloneEntity, runQuery } from './query.js';

/**
 * In-memory store for testing. Uses a Map keyed by encoded key path and
 * allocates ids per kind starting at 1.
 */
export class MemoryStore implements DocumentStore {
  private entities = new Map<string, Entity>();
  private nextIds = new Map<string, number>();

  async get(key: EntityKey): Promise<Entity | null> {
    const entity = this.entities.get(encodeKey(key));
    return entity ? cloneEntity(entity) : null;
  }

  async put(entity: Entity): Promise<EntityKey> {
    let key = entity.key;
    if (!isComplete(key)) {
      const kind = keyKind(key);
      const id = this.nextIds.get(kind) ?? 1;
      this.nextIds.set(kind, id + 1);
      key = withId(key, id);
    }
    const stored = cloneEntity({ ...entity, key });
    this.entities.set(encodeKey(key), stored);
    return cloneEntity(stored).key;
  }

  async query(query: Query): Promise<Entity[]> {
    return runQuery(this.entities.values(), query);
  }

  async close(): Promise<void> {
    this.entities.clear();
    this.nextIds.clear();
  }
}
