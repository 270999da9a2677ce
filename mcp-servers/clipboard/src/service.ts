/**
 * Clipboard History Service — wires the core to its collaborators.
 *
 * Owns the history store, the ingestion filter and the current settings.
 * The clipboard bridge and the snippets capability are looked up through
 * their accessors on each call, so tests can swap them freely.
 */

import { createLogger } from '../../_shared/ts/logger';
import { getBridge } from './bridge';
import type { ClipboardEntry } from './entry';
import { HistoryStore } from './history';
import { IngestionFilter } from './ingest';
import type { PersistenceBridge } from './persistence';
import { searchHistory } from './search';
import type { ClipboardSettings, SettingsStore } from './settings';
import { getSnippets } from './snippets';

const log = createLogger('clipboard:service');

// ─── Types ──────────────────────────────────────────────────────────────────

export type EntryAction = 'copy_and_paste' | 'copy' | 'remove' | 'save_as_snippet';

export interface SearchItem {
  readonly rank: number;
  readonly text: string;
  /** Locale-aware long date/time, for display. */
  readonly timestamp: string;
  /** ISO 8601. */
  readonly captured_at: string;
  readonly actions: EntryAction[];
}

const SETTING_KEYS = ['history_limit', 'persist_history', 'fuzzy'] as const;

export interface SettingsChange {
  readonly previous: ClipboardSettings;
  readonly current: ClipboardSettings;
}

export interface ServiceOptions {
  readonly settingsStore: SettingsStore;
  readonly persistence: PersistenceBridge;
  readonly locale?: string;
}

export function formatTimestamp(date: Date, locale?: string): string {
  return new Intl.DateTimeFormat(locale, { dateStyle: 'full', timeStyle: 'long' }).format(date);
}

// ─── Service ────────────────────────────────────────────────────────────────

export class ClipboardHistoryService {
  readonly history: HistoryStore;
  readonly filter = new IngestionFilter();
  private ingestion: Promise<void> = Promise.resolve();
  private current: ClipboardSettings;
  private readonly settingsStore: SettingsStore;
  private readonly persistence: PersistenceBridge;
  private readonly locale: string | undefined;

  private constructor(options: ServiceOptions, settings: ClipboardSettings, history: HistoryStore) {
    this.settingsStore = options.settingsStore;
    this.persistence = options.persistence;
    this.locale = options.locale;
    this.current = settings;
    this.history = history;
  }

  /** Load settings and, when persistence is on, the stored history. */
  static open(options: ServiceOptions): ClipboardHistoryService {
    const settings = options.settingsStore.load();
    const history = settings.persist_history
      ? HistoryStore.fromEntries(options.persistence.load(), settings.history_limit)
      : new HistoryStore(settings.history_limit);
    log.debug(`Opened history with ${history.size} entries (limit ${history.limit})`);
    return new ClipboardHistoryService(options, settings, history);
  }

  get settings(): ClipboardSettings {
    return { ...this.current };
  }

  /**
   * Ingestion trigger: read the clipboard and record it if the filter accepts it.
   * A failed read is logged and treated as "nothing new".
   *
   * Calls are queued behind each other, so a slow read that started before a
   * write can never land after the check that follows the write.
   */
  checkClipboard(): Promise<ClipboardEntry | null> {
    const run = this.ingestion.then(() => this.ingest());
    this.ingestion = run.then(
      () => undefined,
      (err: unknown) => {
        log.error('Clipboard ingestion failed', err);
      },
    );
    return run;
  }

  private async ingest(): Promise<ClipboardEntry | null> {
    let text: string;
    try {
      text = (await getBridge().read()).content;
    } catch (err) {
      log.warn('Failed reading clipboard', err instanceof Error ? err.message : String(err));
      return null;
    }

    const entry = this.filter.observe(text);
    if (entry) this.history.insert(entry);
    return entry;
  }

  /** Ranked matches in recency order, decorated for display. */
  search(query: string, fuzzy: boolean = this.current.fuzzy): SearchItem[] {
    const actions = this.availableActions();
    return searchHistory(query, fuzzy, this.history.snapshot()).map(({ rank, entry }) => ({
      rank,
      text: entry.text,
      timestamp: formatTimestamp(entry.capturedAt, this.locale),
      captured_at: entry.capturedAt.toISOString(),
      actions: [...actions],
    }));
  }

  /** Actions offered on every search result, given the current capabilities. */
  availableActions(): EntryAction[] {
    const actions: EntryAction[] = [];
    if (getBridge().supportsPaste()) actions.push('copy_and_paste');
    actions.push('copy', 'remove');
    if (getSnippets()) actions.push('save_as_snippet');
    return actions;
  }

  remove(text: string): boolean {
    const removed = this.history.remove(text);
    if (removed) log.debug('Removed history entry');
    return removed;
  }

  async copy(text: string, paste = false): Promise<{ copied: boolean; pasted: boolean }> {
    const bridge = getBridge();
    if (paste) {
      const pasted = await bridge.writeAndPaste(text);
      return { copied: pasted, pasted };
    }
    return { copied: await bridge.write(text), pasted: false };
  }

  /** Apply a partial settings update; the history limit takes effect immediately. */
  updateSettings(patch: Partial<ClipboardSettings>): SettingsChange {
    const previous = this.current;
    const next: ClipboardSettings = {
      history_limit: patch.history_limit ?? previous.history_limit,
      persist_history: patch.persist_history ?? previous.persist_history,
      fuzzy: patch.fuzzy ?? previous.fuzzy,
    };

    if (next.history_limit !== previous.history_limit) {
      this.history.setLimit(next.history_limit);
    }

    this.current = next;
    this.settingsStore.save(next);

    for (const key of SETTING_KEYS) {
      if (previous[key] !== next[key]) {
        log.info(`Setting ${key} changed from ${String(previous[key])} to ${String(next[key])}`);
      }
    }

    return { previous: { ...previous }, current: { ...next } };
  }

  /** Persist the history if enabled. Returns whether anything was written. */
  shutdown(): boolean {
    if (!this.current.persist_history) return false;
    return this.persistence.save(this.history.snapshot());
  }
}

// ─── Service Singleton ──────────────────────────────────────────────────────

let service: ClipboardHistoryService | null = null;

/** Get the active service; throws before startup has installed one. */
export function getService(): ClipboardHistoryService {
  if (!service) throw new Error('Clipboard history service not initialized');
  return service;
}

export function setService(next: ClipboardHistoryService | null): void {
  service = next;
}
