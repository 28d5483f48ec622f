// src/analysis/analyzer.ts
import { sha256Hex } from './hash';
import type { StringProperties } from '../types';

const NON_ALPHANUMERIC = /[^\p{L}\p{N}]/gu;

// Strings are measured in code points, not UTF-16 units.
function chars(value: string): string[] {
  return Array.from(value);
}

export function isPalindrome(value: string): boolean {
  const normalized = chars(value.replace(NON_ALPHANUMERIC, '').toLowerCase());
  for (let i = 0, j = normalized.length - 1; i < j; i += 1, j -= 1) {
    if (normalized[i] !== normalized[j]) return false;
  }
  return true;
}

export function countUniqueCharacters(value: string): number {
  return new Set(chars(value)).size;
}

export function countWords(value: string): number {
  return value.split(/\s+/).filter((token) => token.length > 0).length;
}

/** Occurrence count per character, in order of first occurrence. */
export function characterFrequency(value: string): Map<string, number> {
  const freq = new Map<string, number>();
  for (const ch of chars(value)) {
    freq.set(ch, (freq.get(ch) ?? 0) + 1);
  }
  return freq;
}

/**
 * Computes every derived property of `value`.
 * Leading/trailing whitespace is trimmed first and all properties describe the trimmed string,
 * so `"abc"` and `"  abc "` analyze identically and share a hash.
 */
export function analyzeString(value: string): StringProperties {
  const trimmed = value.trim();
  return {
    length: chars(trimmed).length,
    is_palindrome: isPalindrome(trimmed),
    unique_characters: countUniqueCharacters(trimmed),
    word_count: countWords(trimmed),
    sha256_hash: sha256Hex(trimmed),
    character_frequency_map: characterFrequency(trimmed),
  };
}
