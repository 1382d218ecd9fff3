export { LmsRepository } from './lms.js';
export type { LmsRepositoryOptions } from './lms.js';
export type {
  Course,
  Lesson,
  User,
  CompletionMap,
  Entity,
  EntityKey,
  PathElement,
  PropertyValue,
  Query,
  EqualityFilter,
  OrderBy,
} from './types.js';
export type { DocumentStore, SqliteStoreOptions, DatastoreStoreOptions } from './store/index.js';
export { MemoryStore, SqliteStore, DatastoreStore } from './store/index.js';
export { makeKey, keysEqual, parentKey } from './store/key.js';
export { USER_KIND, COURSE_KIND, LESSON_KIND, courseKey, lessonKey, userKey } from './records.js';
export { createLesson, createSampleData } from './seed.js';
export { loadConfig } from './config.js';
export type { LmsConfig } from './config.js';
export { createLogger } from './logger.js';
export {
  EntityNotFoundError,
  MalformedEntityError,
  StoreConnectionError,
  StoreAuthError,
  StoreRequestError,
  ConfigValidationError,
} from './errors.js';
