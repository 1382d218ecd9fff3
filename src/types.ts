/** A lesson belonging to exactly one course. */
export interface Lesson {
  id: number;
  title: string;
  /** `null` when the lesson was loaded title-only. */
  content: string | null;
}

/**
 * A course, keyed by its caller-assigned code.
 * `lessons` is transient: filled by `loadCourse`, never written back.
 */
export interface Course {
  code: string;
  name: string;
  description: string;
  lessons: Lesson[];
}

/** A user as seen by callers. The password hash stays in the store. */
export interface User {
  username: string;
  email: string;
  about: string;
}

/** course code => lesson id => lesson title */
export type CompletionMap = Record<string, Record<number, string>>;

/** One element of a hierarchical key path. */
export interface PathElement {
  readonly kind: string;
  readonly id?: number;
  readonly name?: string;
}

/**
 * A hierarchical key. The path runs from the root ancestor to the entity
 * itself; a last element with neither id nor name is incomplete.
 */
export interface EntityKey {
  readonly path: readonly PathElement[];
}

export type PropertyScalar = string | number | boolean | null;

export type PropertyValue = PropertyScalar | EntityKey | PropertyValue[];

/** A store-native record: a key plus an open field map. */
export interface Entity {
  key: EntityKey;
  properties: Record<string, PropertyValue>;
  /** Properties queries cannot filter or order on. */
  excludeFromIndexes?: string[];
}

export interface EqualityFilter {
  property: string;
  value: PropertyValue;
}

export interface OrderBy {
  property: string;
  direction: 'ascending' | 'descending';
}

/** A single-kind query, optionally scoped to an ancestor. */
export interface Query {
  kind: string;
  ancestor?: EntityKey;
  filters?: EqualityFilter[];
  order?: OrderBy[];
}
