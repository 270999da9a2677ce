/**
 * Clipboard history entry: captured text plus the moment it was seen.
 */

export interface ClipboardEntry {
  readonly text: string;
  readonly capturedAt: Date;
}

/**
 * Create a frozen entry. `text` is the deduplication key. The capture time is
 * kept as epoch milliseconds; each read of `capturedAt` returns a fresh Date.
 */
export function createEntry(text: string, capturedAt: Date = new Date()): ClipboardEntry {
  const capturedMs = capturedAt.getTime();
  return Object.freeze({
    text,
    get capturedAt(): Date {
      return new Date(capturedMs);
    },
  });
}
