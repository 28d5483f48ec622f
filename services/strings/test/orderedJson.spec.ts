import { describe, expect, it } from 'vitest';
import { toOrderedJson } from '../src/serialization/orderedJson';

describe('toOrderedJson', () => {
  it('writes maps in entry order', () => {
    const freq = new Map([['z', 1], ['7', 2], ['a', 3]]);
    expect(toOrderedJson({ freq })).toBe('{"freq":{"z":1,"7":2,"a":3}}');
  });

  it('matches JSON.stringify for plain values', () => {
    const payload = { a: 1, b: 'two', c: [true, null], d: { e: -0.5 }, when: new Date('2026-01-02T03:04:05.000Z') };
    expect(toOrderedJson(payload)).toBe(JSON.stringify(payload));
  });

  it('drops undefined members and nulls undefined array items', () => {
    expect(toOrderedJson({ a: undefined, b: [undefined, 1] })).toBe('{"b":[null,1]}');
    expect(toOrderedJson(new Map([['k', undefined]]))).toBe('{}');
  });

  it('escapes keys and strings', () => {
    expect(toOrderedJson(new Map([['"', 1], ['\n', 2]]))).toBe('{"\\"":1,"\\n":2}');
  });
});
