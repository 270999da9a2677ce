/**
 * History Store — bounded, deduplicated, most-recent-first clipboard history.
 *
 * Entries and the limit live together in one immutable state object that
 * every mutation replaces whole. Readers holding a snapshot therefore see
 * either the state before a mutation or the state after it, and the bound
 * (size <= limit) holds in every state that is ever published.
 */

import type { ClipboardEntry } from './entry';

// ─── Constants ──────────────────────────────────────────────────────────────

export const DEFAULT_HISTORY_LIMIT = 100;
export const MAX_HISTORY_LIMIT = 10_000_000;

// ─── Types ──────────────────────────────────────────────────────────────────

interface HistoryState {
  readonly entries: readonly ClipboardEntry[];
  readonly limit: number;
}

function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`History limit must be a positive integer, got ${limit}`);
  }
}

function publish(entries: ClipboardEntry[], limit: number): HistoryState {
  if (entries.length > limit) entries.length = limit;
  return Object.freeze({ entries: Object.freeze(entries), limit });
}

// ─── Store ──────────────────────────────────────────────────────────────────

export class HistoryStore {
  private state: HistoryState;

  constructor(limit: number = DEFAULT_HISTORY_LIMIT) {
    assertLimit(limit);
    this.state = publish([], limit);
  }

  /**
   * Build a store from previously persisted entries (most recent first).
   * The first occurrence of a text wins and the tail is cut to `limit`.
   */
  static fromEntries(entries: readonly ClipboardEntry[], limit: number = DEFAULT_HISTORY_LIMIT): HistoryStore {
    const store = new HistoryStore(limit);
    const seen = new Set<string>();
    const unique: ClipboardEntry[] = [];
    for (const entry of entries) {
      if (seen.has(entry.text)) continue;
      seen.add(entry.text);
      unique.push(entry);
    }
    store.state = publish(unique, limit);
    return store;
  }

  get limit(): number {
    return this.state.limit;
  }

  get size(): number {
    return this.state.entries.length;
  }

  /** Move-to-front insert: an older entry with equal text is dropped. */
  insert(entry: ClipboardEntry): void {
    const { entries, limit } = this.state;
    const next = [entry, ...entries.filter((e) => e.text !== entry.text)];
    this.state = publish(next, limit);
  }

  /** Remove the entry with equal text. Returns false when there was none. */
  remove(text: string): boolean {
    const { entries, limit } = this.state;
    const next = entries.filter((e) => e.text !== text);
    if (next.length === entries.length) return false;
    this.state = publish(next, limit);
    return true;
  }

  /** Change the bound; a smaller bound drops the oldest entries immediately. */
  setLimit(newLimit: number): void {
    assertLimit(newLimit);
    this.state = publish([...this.state.entries], newLimit);
  }

  /** Point-in-time view of the history, most recent first. */
  snapshot(): readonly ClipboardEntry[] {
    return this.state.entries;
  }
}
