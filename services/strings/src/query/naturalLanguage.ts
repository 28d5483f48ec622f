// src/query/naturalLanguage.ts
//
// Fixed substring heuristics that turn a free-text query into a FilterSet.
// Matching is case-insensitive and literal; there is no linguistic analysis.
import { UnparsableQueryError } from '../errors';
import type { FilterSet } from './filters';

const PALINDROME_PHRASES = ['palindromic', 'palindrome'];
const SINGLE_WORD_PHRASES = ['single word', 'one word'];
const LONGER_THAN = 'longer than';
const CONTAINING_LETTER = 'containing the letter';
const CONTAINING_THE = 'containing the';
const VOWEL = 'vowel';
const DEFAULT_VOWEL = 'a';

/**
 * Text following the first occurrence of `phrase`, cut at its next occurrence.
 * Undefined when the phrase is absent.
 */
function segmentAfter(text: string, phrase: string): string | undefined {
  const start = text.indexOf(phrase);
  if (start === -1) return undefined;
  const from = start + phrase.length;
  const next = text.indexOf(phrase, from);
  return next === -1 ? text.slice(from) : text.slice(from, next);
}

/**
 * All ASCII digits of `segment` read as one integer, e.g. "5 or 6" -> 56.
 * Values past Number.MAX_SAFE_INTEGER are clamped to it.
 */
export function extractNumber(segment: string): number | undefined {
  const digits = segment.replace(/[^0-9]/g, '');
  if (!digits) return undefined;
  return Math.min(Number(digits), Number.MAX_SAFE_INTEGER);
}

/** First character of the first whitespace-delimited token in `segment`. */
export function extractLetter(segment: string): string | undefined {
  const [token] = segment.trim().split(/\s+/);
  if (!token) return undefined;
  return Array.from(token)[0];
}

/**
 * Interprets `query` as a set of filters.
 * Rules are evaluated in a fixed order; a rule whose extraction misses is skipped.
 * @throws UnparsableQueryError when no rule produced a filter
 */
export function interpretQuery(query: string): FilterSet {
  const q = query.toLowerCase();
  const filters: FilterSet = {};

  if (PALINDROME_PHRASES.some((phrase) => q.includes(phrase))) {
    filters.is_palindrome = true;
  }

  if (SINGLE_WORD_PHRASES.some((phrase) => q.includes(phrase))) {
    filters.word_count = 1;
  }

  const longerThan = segmentAfter(q, LONGER_THAN);
  if (longerThan !== undefined) {
    const n = extractNumber(longerThan);
    // stored as N + 1 and compared exclusively by the natural-language endpoint
    if (n !== undefined) filters.min_length = n + 1;
  }

  const letterSegment = segmentAfter(q, CONTAINING_LETTER);
  if (letterSegment !== undefined) {
    const letter = extractLetter(letterSegment);
    if (letter !== undefined) filters.contains_character = letter;
  } else if (q.includes(CONTAINING_THE) && q.includes(VOWEL)) {
    filters.contains_character = DEFAULT_VOWEL;
  }

  if (Object.keys(filters).length === 0) {
    throw new UnparsableQueryError();
  }
  return filters;
}
