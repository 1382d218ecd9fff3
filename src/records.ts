/**
 * Typed records for each kind, and the mapping between them and the open
 * property maps the store holds. Nothing outside this module reads entity
 * properties by name.
 */

import type { Course, Entity, EntityKey, Lesson, PropertyValue, User } from './types.js';
import { MalformedEntityError } from './errors.js';
import { isEntityKey, keyId, keyName, makeKey } from './store/key.js';

export const USER_KIND = 'LmsUser';
export const COURSE_KIND = 'LmsCourse';
export const LESSON_KIND = 'LmsLesson';

export interface UserRecord {
  username: string;
  email: string;
  passwordhash: string;
  about: string;
  completions: EntityKey[];
}

export interface CourseRecord {
  code: string;
  name: string;
  description: string;
}

export interface LessonRecord {
  title: string;
  content: string;
}

export function userKey(username: string): EntityKey {
  return makeKey(USER_KIND, username);
}

export function courseKey(code: string): EntityKey {
  return makeKey(COURSE_KIND, code);
}

/** Omit `lessonId` for an incomplete key the store will complete. */
export function lessonKey(courseCode: string, lessonId?: number): EntityKey {
  return makeKey(LESSON_KIND, lessonId, courseKey(courseCode));
}

function read(entity: Entity, kind: string, property: string): PropertyValue {
  if (!Object.hasOwn(entity.properties, property)) {
    throw new MalformedEntityError(kind, property, 'missing');
  }
  return entity.properties[property];
}

function readString(entity: Entity, kind: string, property: string): string {
  const value = read(entity, kind, property);
  if (typeof value !== 'string') {
    throw new MalformedEntityError(kind, property, 'expected a string');
  }
  return value;
}

function readKeyList(entity: Entity, kind: string, property: string): EntityKey[] {
  const value = read(entity, kind, property);
  if (!Array.isArray(value)) {
    throw new MalformedEntityError(kind, property, 'expected a list');
  }
  return value.map((item) => {
    if (!isEntityKey(item)) {
      throw new MalformedEntityError(kind, property, 'expected a list of keys');
    }
    return item;
  });
}

// ─── User ───────────────────────────────────────────────────────────────────

export function userRecordFromEntity(entity: Entity): UserRecord {
  return {
    username: readString(entity, USER_KIND, 'username'),
    email: readString(entity, USER_KIND, 'email'),
    passwordhash: readString(entity, USER_KIND, 'passwordhash'),
    about: readString(entity, USER_KIND, 'about'),
    completions: readKeyList(entity, USER_KIND, 'completions'),
  };
}

export function userRecordToEntity(record: UserRecord): Entity {
  return {
    key: userKey(record.username),
    properties: {
      username: record.username,
      email: record.email,
      passwordhash: record.passwordhash,
      about: record.about,
      completions: [...record.completions],
    },
  };
}

/** Drops the password hash. */
export function userFromRecord(record: UserRecord): User {
  return { username: record.username, email: record.email, about: record.about };
}

// ─── Course ─────────────────────────────────────────────────────────────────

export function courseRecordFromEntity(entity: Entity): CourseRecord {
  return {
    code: keyName(entity.key) ?? readString(entity, COURSE_KIND, 'code'),
    name: readString(entity, COURSE_KIND, 'name'),
    description: readString(entity, COURSE_KIND, 'description'),
  };
}

export function courseRecordToEntity(record: CourseRecord): Entity {
  return {
    key: courseKey(record.code),
    properties: {
      code: record.code,
      name: record.name,
      description: record.description,
    },
    excludeFromIndexes: ['code', 'description'],
  };
}

/** A course with no lessons attached. */
export function courseFromRecord(record: CourseRecord): Course {
  return { code: record.code, name: record.name, description: record.description, lessons: [] };
}

// ─── Lesson ─────────────────────────────────────────────────────────────────

export function lessonRecordToEntity(key: EntityKey, record: LessonRecord): Entity {
  return {
    key,
    properties: { title: record.title, content: record.content },
    excludeFromIndexes: ['title', 'content'],
  };
}

/**
 * Build a Lesson from its entity. With `includeContent` false only the title
 * is read and `content` is null.
 */
export function lessonFromEntity(entity: Entity, includeContent = true): Lesson {
  const id = keyId(entity.key);
  if (id === undefined) {
    throw new MalformedEntityError(LESSON_KIND, '__key__', 'expected a numeric id');
  }
  return {
    id,
    title: readString(entity, LESSON_KIND, 'title'),
    content: includeContent ? readString(entity, LESSON_KIND, 'content') : null,
  };
}
