/**
 * In-process query evaluation shared by MemoryStore and SqliteStore.
 *
 * Semantics follow Cloud Datastore: a list property matches an equality
 * filter when any element matches, entities lacking an ordered property are
 * left out, unindexed properties can be neither filtered nor ordered on, and
 * results fall back to key order.
 */

import type { Entity, EntityKey, EqualityFilter, OrderBy, PropertyValue, Query } from '../types.js';
import {
  compareKeys,
  compareStrings,
  isAncestorOrSelf,
  isEntityKey,
  keyKind,
  keysEqual,
} from './key.js';

function cloneKey(key: EntityKey): EntityKey {
  return { path: key.path.map((e) => ({ ...e })) };
}

export function cloneValue(value: PropertyValue): PropertyValue {
  if (Array.isArray(value)) return value.map(cloneValue);
  if (isEntityKey(value)) return cloneKey(value);
  return value;
}

export function cloneEntity(entity: Entity): Entity {
  const properties: Record<string, PropertyValue> = {};
  for (const [name, value] of Object.entries(entity.properties)) {
    properties[name] = cloneValue(value);
  }
  const copy: Entity = { key: cloneKey(entity.key), properties };
  if (entity.excludeFromIndexes) {
    copy.excludeFromIndexes = [...entity.excludeFromIndexes];
  }
  return copy;
}

export function valuesEqual(a: PropertyValue, b: PropertyValue): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    const other = b;
    return a.every((v, i) => valuesEqual(v, other[i]));
  }
  if (isEntityKey(a) || isEntityKey(b)) {
    return isEntityKey(a) && isEntityKey(b) && keysEqual(a, b);
  }
  return a === b;
}

function rank(value: PropertyValue): number {
  if (value === null) return 0;
  if (typeof value === 'number') return 1;
  if (typeof value === 'boolean') return 2;
  if (typeof value === 'string') return 3;
  if (Array.isArray(value)) return 5;
  return 4;
}

/** Cross-type order: null < numbers < booleans < strings < keys. */
export function compareValues(a: PropertyValue, b: PropertyValue): number {
  const byRank = rank(a) - rank(b);
  if (byRank !== 0) return byRank;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  if (typeof a === 'string' && typeof b === 'string') return compareStrings(a, b);
  if (isEntityKey(a) && isEntityKey(b)) return compareKeys(a, b);
  if (Array.isArray(a) && Array.isArray(b)) return a.length - b.length;
  return 0;
}

function indexedValue(entity: Entity, property: string): PropertyValue | undefined {
  if (entity.excludeFromIndexes?.includes(property)) return undefined;
  if (!Object.hasOwn(entity.properties, property)) return undefined;
  return entity.properties[property];
}

function matchesFilter(entity: Entity, filter: EqualityFilter): boolean {
  const value = indexedValue(entity, filter.property);
  if (value === undefined) return false;
  if (Array.isArray(value)) return value.some((v) => valuesEqual(v, filter.value));
  return valuesEqual(value, filter.value);
}

// A list orders by its smallest element ascending, its largest descending.
function sortValue(entity: Entity, order: OrderBy): PropertyValue | undefined {
  const value = indexedValue(entity, order.property);
  if (!Array.isArray(value)) return value;
  if (value.length === 0) return undefined;
  const sorted = [...value].sort(compareValues);
  return order.direction === 'ascending' ? sorted[0] : sorted[sorted.length - 1];
}

interface Row {
  entity: Entity;
  sortValues: PropertyValue[];
}

/** Evaluate `query` over `entities`, returning copies in result order. */
export function runQuery(entities: Iterable<Entity>, query: Query): Entity[] {
  const filters = query.filters ?? [];
  const order = query.order ?? [];
  const rows: Row[] = [];

  for (const entity of entities) {
    if (keyKind(entity.key) !== query.kind) continue;
    if (query.ancestor && !isAncestorOrSelf(query.ancestor, entity.key)) continue;
    if (!filters.every((f) => matchesFilter(entity, f))) continue;

    const sortValues: PropertyValue[] = [];
    for (const o of order) {
      const value = sortValue(entity, o);
      if (value === undefined) break;
      sortValues.push(value);
    }
    if (sortValues.length < order.length) continue;

    rows.push({ entity, sortValues });
  }

  rows.sort((a, b) => {
    for (let i = 0; i < order.length; i++) {
      const c = compareValues(a.sortValues[i], b.sortValues[i]);
      if (c !== 0) return order[i].direction === 'descending' ? -c : c;
    }
    return compareKeys(a.entity.key, b.entity.key);
  });

  return rows.map((r) => cloneEntity(r.entity));
}
