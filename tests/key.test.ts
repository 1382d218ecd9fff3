import { describe, it, expect } from 'vitest';
import {
  compareKeys,
  decodeKey,
  encodeKey,
  isAncestorOrSelf,
  isComplete,
  isEntityKey,
  keyId,
  keyName,
  keysEqual,
  makeKey,
  parentKey,
  withId,
} from '../src/store/key.js';

describe('makeKey', () => {
  it('numbers become ids, strings become names', () => {
    expect(makeKey('LmsLesson', 3).path).toEqual([{ kind: 'LmsLesson', id: 3 }]);
    expect(makeKey('LmsCourse', 'C1').path).toEqual([{ kind: 'LmsCourse', name: 'C1' }]);
  });

  it('children embed the parent path', () => {
    const lesson = makeKey('LmsLesson', 7, makeKey('LmsCourse', 'C1'));
    expect(lesson.path).toEqual([
      { kind: 'LmsCourse', name: 'C1' },
      { kind: 'LmsLesson', id: 7 },
    ]);
    expect(keyId(lesson)).toBe(7);
    expect(keyName(parentKey(lesson)!)).toBe('C1');
  });

  it('omitting the identifier gives an incomplete key', () => {
    const key = makeKey('LmsLesson', undefined, makeKey('LmsCourse', 'C1'));
    expect(isComplete(key)).toBe(false);
    expect(isComplete(withId(key, 4))).toBe(true);
    expect(keyId(withId(key, 4))).toBe(4);
  });
});

describe('key comparison', () => {
  const c1 = makeKey('LmsCourse', 'C1');

  it('keysEqual distinguishes id 1 from name "1"', () => {
    expect(keysEqual(makeKey('K', 1), makeKey('K', 1))).toBe(true);
    expect(keysEqual(makeKey('K', 1), makeKey('K', '1'))).toBe(false);
  });

  it('isAncestorOrSelf', () => {
    const lesson = makeKey('LmsLesson', 1, c1);
    expect(isAncestorOrSelf(c1, lesson)).toBe(true);
    expect(isAncestorOrSelf(c1, c1)).toBe(true);
    expect(isAncestorOrSelf(makeKey('LmsCourse', 'C2'), lesson)).toBe(false);
    expect(isAncestorOrSelf(lesson, c1)).toBe(false);
  });

  it('orders ids numerically, ids before names, ancestors first', () => {
    expect(compareKeys(makeKey('K', 2), makeKey('K', 10))).toBeLessThan(0);
    expect(compareKeys(makeKey('K', 99), makeKey('K', 'a'))).toBeLessThan(0);
    expect(compareKeys(c1, makeKey('LmsLesson', 1, c1))).toBeLessThan(0);
    expect(compareKeys(makeKey('K', 'B'), makeKey('K', 'a'))).toBeLessThan(0);
  });
});

describe('encodeKey / decodeKey', () => {
  it('encodes path elements with their type tag', () => {
    const key = makeKey('LmsLesson', 3, makeKey('LmsCourse', 'C1'));
    expect(encodeKey(key)).toBe('LmsCourse:sC1/LmsLesson:i3');
    expect(decodeKey('LmsCourse:sC1/LmsLesson:i3')).toEqual(key);
  });

  it('escapes separators inside names', () => {
    const key = makeKey('LmsUser', 'a/b:c');
    expect(encodeKey(key)).toBe('LmsUser:sa%2Fb%3Ac');
    expect(decodeKey(encodeKey(key))).toEqual(key);
  });

  it('refuses incomplete keys', () => {
    expect(() => encodeKey(makeKey('LmsLesson'))).toThrow('incomplete');
  });

  it('rejects malformed segments', () => {
    expect(() => decodeKey('LmsCourse')).toThrow('Invalid key segment');
    expect(() => decodeKey('LmsCourse:x1')).toThrow('Invalid key segment');
  });
});

describe('isEntityKey', () => {
  it('recognizes keys and rejects other values', () => {
    expect(isEntityKey(makeKey('K', 1))).toBe(true);
    expect(isEntityKey({ path: [{ kind: 1 }] })).toBe(false);
    expect(isEntityKey(['K'])).toBe(false);
    expect(isEntityKey('K')).toBe(false);
    expect(isEntityKey(null)).toBe(false);
  });
});
