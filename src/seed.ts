/**
 * Seeding helpers. Lessons have no save path on the repository; they are
 * created here, under their course, with store-allocated ids.
 */

import type { DocumentStore } from './store/base.js';
import { keyId } from './store/key.js';
import {
  courseRecordToEntity,
  lessonKey,
  lessonRecordToEntity,
  userRecordToEntity,
} from './records.js';

/** Create a lesson under `courseCode` and return its allocated id. */
export async function createLesson(
  store: DocumentStore,
  courseCode: string,
  title: string,
  content: string,
): Promise<number> {
  const key = await store.put(lessonRecordToEntity(lessonKey(courseCode), { title, content }));
  const id = keyId(key);
  if (id === undefined) {
    throw new Error(`Store returned no id for a lesson under ${courseCode}`);
  }
  return id;
}

/** Populate a store with a test user, two courses and two lessons each. */
export async function createSampleData(store: DocumentStore): Promise<void> {
  await store.put(
    userRecordToEntity({
      username: 'testuser',
      passwordhash: '',
      email: '',
      about: '',
      completions: [],
    }),
  );

  await store.put(
    courseRecordToEntity({
      code: 'Course01',
      name: 'First Course',
      description:
        'This is a description for a test course.  In the future, real courses ' +
        'will have lots of other stuff here to see that will tell you more about their content.',
    }),
  );
  await store.put(
    courseRecordToEntity({
      code: 'Course02',
      name: 'Second Course',
      description: 'This is also a course description, but maybe less wordy than the previous one.',
    }),
  );

  await createLesson(
    store,
    'Course01',
    'Lesson 1: The First One',
    'Imagine there were lots of video content and cool things.',
  );
  await createLesson(
    store,
    'Course01',
    'Lesson 2: Another One',
    '1<br>2<br>3<br>4<br>5<br>6<br>7<br>8<br>9<br>10<br>11',
  );
  await createLesson(
    store,
    'Course02',
    'Lesson 1: The First One, a Second Time',
    '<p>Things</p><p>Other Things</p><p>Still More Things</p>',
  );
  await createLesson(
    store,
    'Course02',
    'Lesson 2: Yes, Another One',
    '<ul><li>a</li><li>b</li><li>c</li><li>d</li><li></ul>',
  );
}
