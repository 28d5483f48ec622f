import { describe, expect, it } from 'vitest';
import { analyzeString } from '../src/analysis/analyzer';
import { describeFilters, filterRecords, matchesFilters } from '../src/query/filters';
import type { StringRecord } from '../src/types';

function makeRecord(value: string): StringRecord {
  const properties = analyzeString(value);
  return { id: properties.sha256_hash, value, properties, created_at: new Date() };
}

const records = ['racecar', 'hello', 'hello world', 'level', ' padded '].map(makeRecord);
const values = (list: StringRecord[]) => list.map((r) => r.value);

describe('filterRecords', () => {
  it('returns everything for an empty filter set', () => {
    expect(values(filterRecords(records, {}))).toEqual(['racecar', 'hello', 'hello world', 'level', ' padded ']);
  });

  it('filters by palindrome flag', () => {
    expect(values(filterRecords(records, { is_palindrome: true }))).toEqual(['racecar', 'level']);
    expect(values(filterRecords(records, { is_palindrome: false }))).toEqual(['hello', 'hello world', ' padded ']);
  });

  it('treats min_length as inclusive by default', () => {
    expect(values(filterRecords(records, { min_length: 7 }))).toEqual(['racecar', 'hello world']);
  });

  it('treats min_length as exclusive when asked', () => {
    expect(values(filterRecords(records, { min_length: 7 }, { minLength: 'exclusive' }))).toEqual(['hello world']);
  });

  it('combines length bounds and word count with AND', () => {
    expect(values(filterRecords(records, { min_length: 5, max_length: 6 }))).toEqual(['hello', 'level', ' padded ']);
    expect(values(filterRecords(records, { min_length: 5, max_length: 6, word_count: 1, is_palindrome: true }))).toEqual([
      'level',
    ]);
    expect(values(filterRecords(records, { word_count: 2 }))).toEqual(['hello world']);
  });

  it('matches contains_character against the untrimmed value', () => {
    const padded = makeRecord(' padded ');
    expect(padded.properties.length).toBe(6);
    // the trimmed properties have no space, the stored value does
    expect(matchesFilters(padded, { contains_character: ' ' })).toBe(true);
    expect(values(filterRecords(records, { contains_character: ' ' }))).toEqual(['hello world', ' padded ']);
  });

  it('is case-sensitive for contains_character', () => {
    const record = makeRecord('Zebra');
    expect(matchesFilters(record, { contains_character: 'z' })).toBe(false);
    expect(matchesFilters(record, { contains_character: 'Z' })).toBe(true);
  });
});

describe('describeFilters', () => {
  it('keeps only the set predicates in canonical order', () => {
    const applied = describeFilters({ word_count: 1, contains_character: undefined, is_palindrome: false, min_length: 0 });
    expect(applied).toEqual({ is_palindrome: false, min_length: 0, word_count: 1 });
    expect(Object.keys(applied)).toEqual(['is_palindrome', 'min_length', 'word_count']);
  });

  it('returns an empty object when nothing is set', () => {
    expect(describeFilters({})).toEqual({});
  });
});
