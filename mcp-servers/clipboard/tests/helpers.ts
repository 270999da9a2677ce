/**
 * Test helpers for the clipboard MCP server.
 *
 * Provides mock bridge setup/teardown, an in-memory service and optional
 * history seeding.
 */

import { MockClipboardBridge, setBridge } from '../src/bridge';
import { createEntry, type ClipboardEntry } from '../src/entry';
import type { PersistenceBridge } from '../src/persistence';
import { ClipboardHistoryService, setService } from '../src/service';
import { MemorySettingsStore, type ClipboardSettings } from '../src/settings';
import { setSnippets, type SnippetsService } from '../src/snippets';

/** Persistence stand-in that keeps the "file" in memory. */
export class MemoryPersistence implements PersistenceBridge {
  stored: ClipboardEntry[] = [];
  saveCount = 0;

  constructor(initial: ClipboardEntry[] = []) {
    this.stored = initial;
  }

  load(): ClipboardEntry[] {
    return [...this.stored];
  }

  save(entries: readonly ClipboardEntry[]): boolean {
    this.stored = [...entries];
    this.saveCount++;
    return true;
  }
}

/** Snippets stand-in that records what it was given. */
export class RecordingSnippets implements SnippetsService {
  readonly saved: string[] = [];

  async addSnippet(text: string): Promise<string> {
    this.saved.push(text);
    return `/snippets/${this.saved.length}.txt`;
  }
}

/** Seed options for clipboard tests. */
export interface SeedOptions {
  /** Pre-fill the clipboard with this content. */
  readonly initialContent?: string;
  /** Number of history entries to pre-seed ("History entry 1" is oldest). */
  readonly historyCount?: number;
  readonly pasteSupported?: boolean;
  readonly snippets?: SnippetsService;
  readonly settings?: Partial<ClipboardSettings>;
  readonly persisted?: ClipboardEntry[];
}

export interface TestContext {
  readonly bridge: MockClipboardBridge;
  readonly service: ClipboardHistoryService;
  readonly settingsStore: MemorySettingsStore;
  readonly persistence: MemoryPersistence;
}

/** Timestamps one minute apart, starting at 2026-01-01T00:00:00Z. */
export function at(minute: number): Date {
  return new Date(Date.UTC(2026, 0, 1, 0, minute));
}

/**
 * Install a fresh MockClipboardBridge, snippets capability and service.
 * Returns the pieces for direct assertions.
 */
export function setupTestService(opts?: SeedOptions): TestContext {
  const bridge = new MockClipboardBridge({ pasteSupported: opts?.pasteSupported });
  setBridge(bridge);
  setSnippets(opts?.snippets ?? null);

  const settingsStore = new MemorySettingsStore(opts?.settings);
  const persistence = new MemoryPersistence(opts?.persisted);
  const service = ClipboardHistoryService.open({ settingsStore, persistence, locale: 'en-US' });
  setService(service);

  if (opts?.initialContent !== undefined) {
    void bridge.write(opts.initialContent);
  }

  const historyCount = opts?.historyCount ?? 0;
  for (let i = 0; i < historyCount; i++) {
    service.history.insert(createEntry(`History entry ${i + 1}`, at(i)));
  }

  return { bridge, service, settingsStore, persistence };
}

/** Tear down the service and restore a fresh bridge. */
export function teardownTestService(): void {
  setBridge(new MockClipboardBridge());
  setSnippets(null);
  setService(null);
}
