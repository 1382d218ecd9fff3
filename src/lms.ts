import { homedir } from 'os';
import { join } from 'path';
import type { Logger } from 'pino';
import type { DocumentStore } from './store/base.js';
import { MemoryStore } from './store/memory.js';
import { SqliteStore } from './store/sqlite.js';
import { DatastoreStore } from './store/datastore.js';
import type { DatastoreStoreOptions } from './store/datastore.js';
import type { CompletionMap, Course, EntityKey, Lesson, User } from './types.js';
import type { LmsConfig } from './config.js';
import { EntityNotFoundError } from './errors.js';
import { createLogger } from './logger.js';
import { KeyedSerializer } from './serial.js';
import { keyId, keyName, keysEqual, parentKey } from './store/key.js';
import {
  COURSE_KIND,
  LESSON_KIND,
  USER_KIND,
  courseFromRecord,
  courseKey,
  courseRecordFromEntity,
  courseRecordToEntity,
  lessonFromEntity,
  lessonKey,
  userFromRecord,
  userKey,
  userRecordFromEntity,
  userRecordToEntity,
} from './records.js';
import type { UserRecord } from './records.js';

/** Options for constructing an LmsRepository. */
export interface LmsRepositoryOptions {
  store?: DocumentStore | 'memory' | 'datastore';
  dbPath?: string;
  datastore?: Omit<DatastoreStoreOptions, 'logger'>;
  logger?: Logger;
}

/**
 * Loads and saves users, courses, lessons and completions.
 *
 * Every operation is a short sequence of store round trips with no
 * transaction. User mutations are serialized per username inside this
 * instance; writers in other processes can still interleave with them.
 */
export class LmsRepository {
  private store: DocumentStore;
  private readonly log: Logger;
  private readonly userWrites = new KeyedSerializer();

  constructor(options?: LmsRepositoryOptions) {
    const logger = options?.logger ?? createLogger({ level: 'silent' });
    this.log = logger.child({ repo: 'LmsRepository' });

    if (options?.store === 'datastore') {
      if (!options.datastore) {
        throw new Error('datastore options are required when store is "datastore"');
      }
      this.store = new DatastoreStore({ ...options.datastore, logger });
    } else if (options?.store === 'memory') {
      this.store = new MemoryStore();
    } else if (options?.store) {
      this.store = options.store;
    } else {
      const dbPath = options?.dbPath ?? join(homedir(), '.lms', 'lms.db');
      this.store = new SqliteStore(dbPath, { logger });
    }
  }

  /** Build a repository from environment configuration. */
  static fromConfig(config: LmsConfig, logger?: Logger): LmsRepository {
    const log = logger ?? createLogger({ level: config.log.level });
    if (config.store === 'datastore') {
      const { projectId, apiUrl, namespace, accessToken, timeoutMs } = config.datastore;
      if (!projectId) {
        throw new Error('datastore.projectId is required when store is "datastore"');
      }
      return new LmsRepository({
        store: 'datastore',
        datastore: { projectId, apiUrl, namespace, accessToken, timeoutMs },
        logger: log,
      });
    }
    if (config.store === 'memory') {
      return new LmsRepository({ store: 'memory', logger: log });
    }
    return new LmsRepository({ dbPath: config.sqlite.path, logger: log });
  }

  private async requireUser(username: string): Promise<UserRecord> {
    const entity = await this.store.get(userKey(username));
    if (!entity) throw new EntityNotFoundError(USER_KIND, username);
    return userRecordFromEntity(entity);
  }

  // ─── Courses ──────────────────────────────────────────────────────────────

  /**
   * Load a course and its lessons, title only. Lessons come back in the
   * store's order, which is key order for every bundled store.
   */
  async loadCourse(code: string): Promise<Course> {
    this.log.debug({ code }, 'Loading course');
    const entity = await this.store.get(courseKey(code));
    if (!entity) throw new EntityNotFoundError(COURSE_KIND, code);

    const course = courseFromRecord(courseRecordFromEntity(entity));
    const lessons = await this.store.query({ kind: LESSON_KIND, ancestor: entity.key });
    for (const lesson of lessons) {
      course.lessons.push(lessonFromEntity(lesson, false));
    }
    this.log.debug({ code, lessons: course.lessons.length }, 'Loaded course');
    return course;
  }

  /** All courses by name, descending. Lessons are not loaded. */
  async loadCourses(): Promise<Course[]> {
    const entities = await this.store.query({
      kind: COURSE_KIND,
      order: [{ property: 'name', direction: 'descending' }],
    });
    return entities.map((e) => courseFromRecord(courseRecordFromEntity(e)));
  }

  async loadLesson(code: string, lessonId: number): Promise<Lesson> {
    this.log.debug({ code, lessonId }, 'Loading lesson');
    const entity = await this.store.get(lessonKey(code, lessonId));
    if (!entity) throw new EntityNotFoundError(LESSON_KIND, `${code}/${lessonId}`);
    return lessonFromEntity(entity);
  }

  /** Create or replace a course record. Attached lessons are not written. */
  async saveCourse(course: Course): Promise<void> {
    await this.store.put(
      courseRecordToEntity({ code: course.code, name: course.name, description: course.description }),
    );
    this.log.info({ code: course.code }, 'Saved course');
  }

  // ─── Users ────────────────────────────────────────────────────────────────

  /**
   * Look up a user by username and an already-hashed password.
   * Returns null unless both match exactly.
   */
  async loadUser(username: string, passwordhash: string): Promise<User | null> {
    const matches = await this.store.query({
      kind: USER_KIND,
      filters: [
        { property: 'username', value: username },
        { property: 'passwordhash', value: passwordhash },
      ],
    });
    if (matches.length === 0) {
      this.log.debug({ username }, 'No user matched credentials');
      return null;
    }
    return userFromRecord(userRecordFromEntity(matches[0]));
  }

  /** The user's about text, or '' when the user does not exist. */
  async loadAboutUser(username: string): Promise<string> {
    const entity = await this.store.get(userKey(username));
    return entity ? userRecordFromEntity(entity).about : '';
  }

  /**
   * course code => lesson id => lesson title for every completed lesson.
   * One lesson and one course fetch per completion.
   */
  async loadCompletions(username: string): Promise<CompletionMap> {
    const user = await this.requireUser(username);
    const courses: CompletionMap = {};

    for (const completion of user.completions) {
      const lesson = await this.store.get(completion);
      if (!lesson) throw new EntityNotFoundError(LESSON_KIND, describeLessonKey(completion));
      const parent = parentKey(completion);
      const course = parent ? await this.store.get(parent) : null;
      if (!course) throw new EntityNotFoundError(COURSE_KIND, describeLessonKey(completion));

      const code = courseRecordFromEntity(course).code;
      const { id, title } = lessonFromEntity(lesson, false);
      courses[code] ??= {};
      courses[code][id] = title;
    }
    return courses;
  }

  /**
   * Create or fully replace a user. About text and completions are reset.
   */
  async saveUser(user: User, passwordhash: string): Promise<void> {
    await this.userWrites.run(user.username, async () => {
      await this.store.put(
        userRecordToEntity({
          username: user.username,
          email: user.email,
          passwordhash,
          about: '',
          completions: [],
        }),
      );
    });
    this.log.info({ username: user.username }, 'Saved user');
  }

  async saveAboutUser(username: string, about: string): Promise<void> {
    await this.userWrites.run(username, async () => {
      const record = await this.requireUser(username);
      record.about = about;
      await this.store.put(userRecordToEntity(record));
    });
    this.log.info({ username }, 'Saved about text');
  }

  /**
   * Mark a lesson complete for a user. Recording the same lesson again is a
   * no-op on the list, though the record is still written back.
   */
  async saveCompletion(username: string, courseCode: string, lessonId: number): Promise<void> {
    const target = lessonKey(courseCode, lessonId);
    const appended = await this.userWrites.run(username, async () => {
      const record = await this.requireUser(username);
      const isNew = !record.completions.some((k) => keysEqual(k, target));
      if (isNew) {
        record.completions.push(target);
      }
      await this.store.put(userRecordToEntity(record));
      return isNew;
    });
    this.log.info({ username, courseCode, lessonId, appended }, 'Saved completion');
  }

  /** Close the underlying store. */
  async close(): Promise<void> {
    return this.store.close();
  }
}

function describeLessonKey(key: EntityKey): string {
  const parent = parentKey(key);
  const code = parent ? keyName(parent) : undefined;
  return `${code ?? '?'}/${keyId(key) ?? '?'}`;
}
