import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { DocumentStore } from '../src/store/base.js';
import type { Entity } from '../src/types.js';
import { keyId, makeKey } from '../src/store/key.js';

const course = (code: string, name: string): Entity => ({
  key: makeKey('LmsCourse', code),
  properties: { code, name, description: `${name} description` },
});

/** Behavior every DocumentStore must share. */
export function describeStoreContract(
  label: string,
  open: () => DocumentStore,
  cleanup: () => void = () => {},
): void {
  describe(`${label} contract`, () => {
    let store: DocumentStore;

    beforeEach(() => {
      store = open();
    });

    afterEach(async () => {
      await store.close();
      cleanup();
    });

    it('put and get', async () => {
      await store.put(course('C1', 'First Course'));
      const got = await store.get(makeKey('LmsCourse', 'C1'));
      expect(got).not.toBeNull();
      expect(got!.properties).toEqual({
        code: 'C1',
        name: 'First Course',
        description: 'First Course description',
      });
    });

    it('get returns null for missing', async () => {
      expect(await store.get(makeKey('LmsCourse', 'nope'))).toBeNull();
    });

    it('put replaces the whole record', async () => {
      await store.put(course('C1', 'First Course'));
      await store.put({ key: makeKey('LmsCourse', 'C1'), properties: { name: 'Renamed' } });
      const got = await store.get(makeKey('LmsCourse', 'C1'));
      expect(got!.properties).toEqual({ name: 'Renamed' });
    });

    it('put allocates distinct ids for incomplete keys', async () => {
      const parent = makeKey('LmsCourse', 'C1');
      const a = await store.put({ key: makeKey('LmsLesson', undefined, parent), properties: { title: 'a' } });
      const b = await store.put({ key: makeKey('LmsLesson', undefined, parent), properties: { title: 'b' } });
      expect(keyId(a)).toBeTypeOf('number');
      expect(keyId(a)).not.toBe(keyId(b));
      expect(a.path[0]).toEqual({ kind: 'LmsCourse', name: 'C1' });
      expect((await store.get(b))!.properties.title).toBe('b');
    });

    it('returned entities are copies', async () => {
      const completions = [makeKey('LmsLesson', 1, makeKey('LmsCourse', 'C1'))];
      await store.put({ key: makeKey('LmsUser', 'u1'), properties: { completions } });
      const first = await store.get(makeKey('LmsUser', 'u1'));
      const list = first!.properties.completions;
      if (Array.isArray(list)) list.push('extra');
      const second = await store.get(makeKey('LmsUser', 'u1'));
      expect(second!.properties.completions).toEqual(completions);
    });

    it('round-trips keys nested in lists', async () => {
      const lesson = makeKey('LmsLesson', 5, makeKey('LmsCourse', 'C1'));
      await store.put({ key: makeKey('LmsUser', 'u1'), properties: { completions: [lesson], about: null } });
      const got = await store.get(makeKey('LmsUser', 'u1'));
      expect(got!.properties).toEqual({ completions: [lesson], about: null });
    });

    it('query by kind only returns that kind', async () => {
      await store.put(course('C1', 'First'));
      await store.put({ key: makeKey('LmsUser', 'u1'), properties: { username: 'u1' } });
      const results = await store.query({ kind: 'LmsCourse' });
      expect(results.map((e) => e.properties.code)).toEqual(['C1']);
    });

    it('query by ancestor stays under that ancestor', async () => {
      const c1 = makeKey('LmsCourse', 'C1');
      const c10 = makeKey('LmsCourse', 'C10');
      await store.put({ key: makeKey('LmsLesson', undefined, c1), properties: { title: 'one' } });
      await store.put({ key: makeKey('LmsLesson', undefined, c10), properties: { title: 'ten' } });
      await store.put({ key: makeKey('LmsLesson', undefined, c1), properties: { title: 'two' } });
      const results = await store.query({ kind: 'LmsLesson', ancestor: c1 });
      expect(results.map((e) => e.properties.title)).toEqual(['one', 'two']);
    });

    it('equality filters combine with AND', async () => {
      await store.put({ key: makeKey('LmsUser', 'u1'), properties: { username: 'u1', passwordhash: 'h1' } });
      await store.put({ key: makeKey('LmsUser', 'u2'), properties: { username: 'u2', passwordhash: 'h1' } });
      const hit = await store.query({
        kind: 'LmsUser',
        filters: [
          { property: 'username', value: 'u1' },
          { property: 'passwordhash', value: 'h1' },
        ],
      });
      expect(hit.map((e) => e.properties.username)).toEqual(['u1']);
      const miss = await store.query({
        kind: 'LmsUser',
        filters: [
          { property: 'username', value: 'u1' },
          { property: 'passwordhash', value: 'h2' },
        ],
      });
      expect(miss).toEqual([]);
    });

    it('a list property matches when any element equals', async () => {
      await store.put({ key: makeKey('T', 'a'), properties: { tags: ['x', 'y'] } });
      await store.put({ key: makeKey('T', 'b'), properties: { tags: ['z'] } });
      const results = await store.query({ kind: 'T', filters: [{ property: 'tags', value: 'y' }] });
      expect(results.map((e) => e.key.path[0].name)).toEqual(['a']);
    });

    it('orders descending, case-sensitive', async () => {
      await store.put(course('A', 'alpha'));
      await store.put(course('B', 'Beta'));
      await store.put(course('C', 'gamma'));
      const results = await store.query({
        kind: 'LmsCourse',
        order: [{ property: 'name', direction: 'descending' }],
      });
      expect(results.map((e) => e.properties.name)).toEqual(['gamma', 'alpha', 'Beta']);
    });

    it('unindexed properties cannot be filtered or ordered on', async () => {
      await store.put({
        key: makeKey('LmsCourse', 'C1'),
        properties: { code: 'C1', name: 'First' },
        excludeFromIndexes: ['code'],
      });
      expect(await store.query({ kind: 'LmsCourse', filters: [{ property: 'code', value: 'C1' }] })).toEqual([]);
      expect(
        await store.query({ kind: 'LmsCourse', order: [{ property: 'code', direction: 'ascending' }] }),
      ).toEqual([]);
      const all = await store.query({ kind: 'LmsCourse', filters: [{ property: 'name', value: 'First' }] });
      expect(all[0].excludeFromIndexes).toEqual(['code']);
    });
  });
}
