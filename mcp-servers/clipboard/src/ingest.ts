/**
 * Ingestion Filter
 *
 * Decides whether an observed clipboard value becomes a new history entry.
 * Whitespace-only values (including the empty string a non-text clipboard
 * reads as) and values equal to the last accepted one are rejected.
 *
 * The last accepted value is tracked independently of the history, so an
 * entry the user removed is not re-added by a repeated notification for
 * the same unchanged clipboard.
 */

import { createEntry, type ClipboardEntry } from './entry';

export class IngestionFilter {
  private last: string | null = null;

  observe(candidate: string, now: Date = new Date()): ClipboardEntry | null {
    if (candidate.trim().length === 0 || candidate === this.last) {
      return null;
    }
    this.last = candidate;
    return createEntry(candidate, now);
  }
}
