// src/query/filters.ts
import type { StringRecord } from '../types';

/** Optional predicates, combined with AND. Keys mirror the public query parameters. */
export interface FilterSet {
  is_palindrome?: boolean;
  min_length?: number;
  max_length?: number;
  word_count?: number;
  contains_character?: string;
}

/**
 * How `min_length` is compared against a record's length.
 * The structured listing is inclusive; the natural-language endpoint stores "longer than N"
 * as N + 1 and compares exclusively.
 */
export type MinLengthMode = 'inclusive' | 'exclusive';

export interface FilterOptions {
  minLength?: MinLengthMode;
}

const FILTER_KEYS = [
  'is_palindrome',
  'min_length',
  'max_length',
  'word_count',
  'contains_character',
] as const satisfies ReadonlyArray<keyof FilterSet>;

export function matchesFilters(
  record: StringRecord,
  filters: FilterSet,
  options: FilterOptions = {},
): boolean {
  const { properties: p } = record;
  const minLengthMode = options.minLength ?? 'inclusive';

  if (filters.is_palindrome !== undefined && p.is_palindrome !== filters.is_palindrome) return false;

  if (filters.min_length !== undefined) {
    const ok = minLengthMode === 'inclusive' ? p.length >= filters.min_length : p.length > filters.min_length;
    if (!ok) return false;
  }

  if (filters.max_length !== undefined && p.length > filters.max_length) return false;
  if (filters.word_count !== undefined && p.word_count !== filters.word_count) return false;

  // matched against the untrimmed value, unlike the length/word properties
  if (filters.contains_character !== undefined && !record.value.includes(filters.contains_character)) {
    return false;
  }

  return true;
}

export function filterRecords(
  records: StringRecord[],
  filters: FilterSet,
  options: FilterOptions = {},
): StringRecord[] {
  return records.filter((record) => matchesFilters(record, filters, options));
}

/** Copy of `filters` holding only the predicates that are set, in canonical key order. */
export function describeFilters(filters: FilterSet): FilterSet {
  const applied: FilterSet = {};
  for (const key of FILTER_KEYS) {
    if (filters[key] !== undefined) {
      Object.assign(applied, { [key]: filters[key] });
    }
  }
  return applied;
}
