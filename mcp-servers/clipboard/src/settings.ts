/**
 * Clipboard Settings — user-facing configuration and its store.
 *
 * Implementations: FileSettingsStore (JSON file in the data dir),
 * MemorySettingsStore (tests).
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { createLogger } from '../../_shared/ts/logger';
import { DEFAULT_HISTORY_LIMIT, MAX_HISTORY_LIMIT } from './history';

const log = createLogger('clipboard:settings');

export const SETTINGS_FILE_NAME = 'clipboard_settings.json';

// ─── Types ───────────────────────────────────────────────────────────────────

export const historyLimitSchema = z.number().int().min(1).max(MAX_HISTORY_LIMIT);

export interface ClipboardSettings {
  readonly history_limit: number;
  readonly persist_history: boolean;
  readonly fuzzy: boolean;
}

export const DEFAULT_SETTINGS: ClipboardSettings = {
  history_limit: DEFAULT_HISTORY_LIMIT,
  persist_history: false,
  fuzzy: false,
};

// Each field falls back on its own so one bad value doesn't reset the rest
const settingsFileSchema = z.object({
  history_limit: historyLimitSchema.catch(DEFAULT_SETTINGS.history_limit),
  persist_history: z.boolean().catch(DEFAULT_SETTINGS.persist_history),
  fuzzy: z.boolean().catch(DEFAULT_SETTINGS.fuzzy),
});

/** Coerce arbitrary stored data into valid settings. */
export function parseSettings(raw: unknown): ClipboardSettings {
  const parsed = settingsFileSchema.safeParse(raw);
  return parsed.success ? parsed.data : { ...DEFAULT_SETTINGS };
}

// ─── Store Interface ─────────────────────────────────────────────────────────

export interface SettingsStore {
  load(): ClipboardSettings;
  save(settings: ClipboardSettings): void;
}

// ─── File Store ──────────────────────────────────────────────────────────────

export class FileSettingsStore implements SettingsStore {
  readonly filePath: string;

  constructor(private readonly dataDir: string) {
    this.filePath = path.join(dataDir, SETTINGS_FILE_NAME);
  }

  load(): ClipboardSettings {
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      return parseSettings(raw);
    } catch {
      log.debug('No readable settings file, using defaults', this.filePath);
      return { ...DEFAULT_SETTINGS };
    }
  }

  save(settings: ClipboardSettings): void {
    try {
      fs.mkdirSync(this.dataDir, { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(settings, null, 2));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.warn('Failed writing settings file', this.filePath, msg);
    }
  }
}

// ─── Memory Store ────────────────────────────────────────────────────────────

export class MemorySettingsStore implements SettingsStore {
  private settings: ClipboardSettings;
  saveCount = 0;

  constructor(initial: Partial<ClipboardSettings> = {}) {
    this.settings = { ...DEFAULT_SETTINGS, ...initial };
  }

  load(): ClipboardSettings {
    return { ...this.settings };
  }

  save(settings: ClipboardSettings): void {
    this.settings = { ...settings };
    this.saveCount++;
  }
}
