/**
 * Hierarchical key helpers.
 *
 * A key is a path of `{ kind, id | name }` elements, root first. Children
 * embed their parent's path, so a lesson key carries its course key and the
 * course's lessons are found by ancestor rather than by a foreign-key field.
 */

import type { EntityKey, PathElement } from '../types.js';

/**
 * Build a key. A number becomes an id, a string a name; omit both for an
 * incomplete key that the store will complete on `put`.
 */
export function makeKey(
  kind: string,
  idOrName?: number | string,
  parent?: EntityKey | null,
): EntityKey {
  let element: PathElement;
  if (idOrName === undefined) {
    element = { kind };
  } else if (typeof idOrName === 'number') {
    element = { kind, id: idOrName };
  } else {
    element = { kind, name: idOrName };
  }
  return { path: [...(parent?.path ?? []), element] };
}

function leaf(key: EntityKey): PathElement {
  if (key.path.length === 0) {
    throw new Error('Key path is empty');
  }
  return key.path[key.path.length - 1];
}

export function keyKind(key: EntityKey): string {
  return leaf(key).kind;
}

export function keyId(key: EntityKey): number | undefined {
  return leaf(key).id;
}

export function keyName(key: EntityKey): string | undefined {
  return leaf(key).name;
}

/** True when every element, the last included, has an id or a name. */
export function isComplete(key: EntityKey): boolean {
  return key.path.length > 0 && key.path.every((e) => e.id !== undefined || e.name !== undefined);
}

export function parentKey(key: EntityKey): EntityKey | null {
  return key.path.length > 1 ? { path: key.path.slice(0, -1) } : null;
}

/** Complete an incomplete key with an allocated id. */
export function withId(key: EntityKey, id: number): EntityKey {
  const last = leaf(key);
  return { path: [...key.path.slice(0, -1), { kind: last.kind, id }] };
}

function elementsEqual(a: PathElement, b: PathElement): boolean {
  return a.kind === b.kind && a.id === b.id && a.name === b.name;
}

export function keysEqual(a: EntityKey, b: EntityKey): boolean {
  return a.path.length === b.path.length && a.path.every((e, i) => elementsEqual(e, b.path[i]));
}

/** True when `key` is `ancestor` or sits anywhere beneath it. */
export function isAncestorOrSelf(ancestor: EntityKey, key: EntityKey): boolean {
  if (ancestor.path.length > key.path.length) return false;
  return ancestor.path.every((e, i) => elementsEqual(e, key.path[i]));
}

/** Code-unit comparison, case-sensitive. */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareElements(a: PathElement, b: PathElement): number {
  const byKind = compareStrings(a.kind, b.kind);
  if (byKind !== 0) return byKind;
  // ids sort before names
  if (a.id !== undefined && b.id !== undefined) return a.id - b.id;
  if (a.id !== undefined) return -1;
  if (b.id !== undefined) return 1;
  return compareStrings(a.name ?? '', b.name ?? '');
}

/** Total order over keys; an ancestor sorts before its descendants. */
export function compareKeys(a: EntityKey, b: EntityKey): number {
  const n = Math.min(a.path.length, b.path.length);
  for (let i = 0; i < n; i++) {
    const c = compareElements(a.path[i], b.path[i]);
    if (c !== 0) return c;
  }
  return a.path.length - b.path.length;
}

/**
 * Encode a complete key as a string, e.g. `LmsCourse:sC1/LmsLesson:i3`.
 * Segments are URI-encoded, so `/` only ever separates elements and an
 * ancestor's encoding followed by `/` prefixes every descendant's.
 */
export function encodeKey(key: EntityKey): string {
  if (!isComplete(key)) {
    throw new Error('Cannot encode an incomplete key');
  }
  return key.path
    .map((e) => {
      const kind = encodeURIComponent(e.kind);
      return e.id !== undefined ? `${kind}:i${e.id}` : `${kind}:s${encodeURIComponent(e.name ?? '')}`;
    })
    .join('/');
}

export function decodeKey(encoded: string): EntityKey {
  const path = encoded.split('/').map((segment): PathElement => {
    const sep = segment.indexOf(':');
    if (sep < 0) throw new Error(`Invalid key segment: ${segment}`);
    const kind = decodeURIComponent(segment.slice(0, sep));
    const tag = segment.charAt(sep + 1);
    const body = segment.slice(sep + 2);
    if (tag === 'i') {
      const id = Number(body);
      if (!Number.isSafeInteger(id)) throw new Error(`Invalid key id: ${segment}`);
      return { kind, id };
    }
    if (tag === 's') return { kind, name: decodeURIComponent(body) };
    throw new Error(`Invalid key segment: ${segment}`);
  });
  return { path };
}

function isPathElement(value: unknown): value is PathElement {
  if (typeof value !== 'object' || value === null) return false;
  if (!('kind' in value) || typeof value.kind !== 'string') return false;
  if ('id' in value && value.id !== undefined && typeof value.id !== 'number') return false;
  if ('name' in value && value.name !== undefined && typeof value.name !== 'string') return false;
  return true;
}

export function isEntityKey(value: unknown): value is EntityKey {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (!('path' in value)) return false;
  const path = value.path;
  return Array.isArray(path) && path.every(isPathElement);
}
