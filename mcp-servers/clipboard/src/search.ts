/**
 * Search Engine
 *
 * Filters a history snapshot by query. Results keep history order; rank is
 * the entry's 1-based position in the snapshot ("how far back"), not a
 * relevance score, so entries skipped by the filter still use up a rank.
 */

import fuzzysort from 'fuzzysort';
import type { ClipboardEntry } from './entry';

export interface SearchHit {
  readonly rank: number;
  readonly entry: ClipboardEntry;
}

export type Matcher = (text: string) => boolean;

/** Case-insensitive substring match. The empty query matches everything. */
export function exactMatcher(query: string): Matcher {
  const needle = query.toLocaleLowerCase();
  return (text) => text.toLocaleLowerCase().includes(needle);
}

/** Whether every character of `needle` occurs in `haystack`, in order. */
function isSubsequence(needle: string, haystack: string): boolean {
  const wanted = Array.from(needle);
  let next = 0;
  for (const ch of haystack) {
    if (next === wanted.length) break;
    if (ch === wanted[next]) next++;
  }
  return next === wanted.length;
}

/**
 * Subsequence match: the query's characters appear in order, not necessarily
 * contiguous. Anything the exact matcher accepts is accepted as well.
 *
 * fuzzysort treats spaces as word separators matched in any order, so a
 * query containing whitespace is checked as a single character sequence.
 */
export function fuzzyMatcher(query: string): Matcher {
  const exact = exactMatcher(query);
  if (/\s/.test(query)) {
    const needle = query.toLocaleLowerCase();
    return (text) => exact(text) || isSubsequence(needle, text.toLocaleLowerCase());
  }
  return (text) => exact(text) || fuzzysort.single(query, text) !== null;
}

export function searchHistory(
  query: string,
  fuzzy: boolean,
  history: readonly ClipboardEntry[],
): SearchHit[] {
  const matches = fuzzy ? fuzzyMatcher(query) : exactMatcher(query);
  const hits: SearchHit[] = [];

  history.forEach((entry, index) => {
    if (matches(entry.text)) {
      hits.push({ rank: index + 1, entry });
    }
  });

  return hits;
}
