/**
 * History File — load-at-startup / save-at-shutdown persistence.
 *
 * Format: a JSON array of { "text": string, "datetime": seconds since epoch },
 * most recent first. Both directions are best-effort: failures are logged
 * and degrade to "empty history" or "nothing saved".
 *
 * Uses synchronous fs calls: save() runs from signal handlers right before
 * process.exit().
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { createLogger } from '../../_shared/ts/logger';
import { createEntry, type ClipboardEntry } from './entry';

const log = createLogger('clipboard:persistence');

export const HISTORY_FILE_NAME = 'clipboard_history';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface PersistenceBridge {
  load(): ClipboardEntry[];
  save(entries: readonly ClipboardEntry[]): boolean;
}

const recordSchema = z.object({
  text: z.string().min(1),
  datetime: z.number().int(),
});

const historyFileSchema = z.array(recordSchema);

export type HistoryRecord = z.infer<typeof recordSchema>;

export function toRecord(entry: ClipboardEntry): HistoryRecord {
  return { text: entry.text, datetime: Math.floor(entry.capturedAt.getTime() / 1000) };
}

export function fromRecord(record: HistoryRecord): ClipboardEntry {
  return createEntry(record.text, new Date(record.datetime * 1000));
}

// ─── File Bridge ────────────────────────────────────────────────────────────

export class HistoryFile implements PersistenceBridge {
  readonly filePath: string;

  constructor(private readonly dataDir: string) {
    this.filePath = path.join(dataDir, HISTORY_FILE_NAME);
  }

  load(): ClipboardEntry[] {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      log.debug('Failed reading clipboard history', this.filePath, describe(err));
      return [];
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      log.warn('Clipboard history is not valid JSON, starting empty', this.filePath, describe(err));
      return [];
    }

    const parsed = historyFileSchema.safeParse(json);
    if (!parsed.success) {
      log.warn('Clipboard history has an unexpected shape, starting empty', this.filePath);
      return [];
    }

    log.debug(`Read ${parsed.data.length} entries from`, this.filePath);
    return parsed.data.map(fromRecord);
  }

  save(entries: readonly ClipboardEntry[]): boolean {
    try {
      fs.mkdirSync(this.dataDir, { recursive: true });
    } catch (err) {
      log.warn('Failed creating data dir', this.dataDir, describe(err));
      return false;
    }

    try {
      fs.writeFileSync(this.filePath, JSON.stringify(entries.map(toRecord), null, 2));
    } catch (err) {
      log.warn('Failed writing history file', this.filePath, describe(err));
      return false;
    }

    log.debug(`Wrote ${entries.length} entries to`, this.filePath);
    return true;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
