#!/usr/bin/env node
/**
 * Clipboard MCP Server -- Entry Point
 *
 * Loads settings (and the stored history when persistence is on), starts
 * polling the OS clipboard, registers the clipboard tools and starts the
 * JSON-RPC listener. History is written back on shutdown.
 *
 * Tools (9):
 *   clipboard.get_clipboard     -- read clipboard contents
 *   clipboard.set_clipboard     -- write to clipboard
 *   clipboard.clipboard_history -- recent clipboard entries
 *   clipboard.search_history    -- exact / fuzzy history search
 *   clipboard.remove_entry      -- drop an entry from history
 *   clipboard.copy_entry        -- copy (and optionally paste) an entry
 *   clipboard.save_snippet      -- forward text to the snippets service
 *   clipboard.get_settings      -- read settings
 *   clipboard.update_settings   -- change settings (confirm)
 */

import { MCPServer } from '../../_shared/ts/mcp-base';
import { createLogger, setLogLevel } from '../../_shared/ts/logger';
import { createPlatformBridge, setBridge } from './bridge';
import { loadConfig } from './config';
import { HistoryFile } from './persistence';
import { ClipboardHistoryService, setService } from './service';
import { FileSettingsStore } from './settings';
import { DirectorySnippetsService, setSnippets } from './snippets';
import { ClipboardWatcher } from './watcher';
import { clipboardTools } from './tools';

const log = createLogger('clipboard');

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  // ─── Collaborators ──────────────────────────────────────────────────────────

  setBridge(await createPlatformBridge());
  setSnippets(config.snippetsDir ? new DirectorySnippetsService(config.snippetsDir) : null);

  const service = ClipboardHistoryService.open({
    settingsStore: new FileSettingsStore(config.dataDir),
    persistence: new HistoryFile(config.dataDir),
  });
  setService(service);

  const watcher = new ClipboardWatcher(() => service.checkClipboard(), config.pollIntervalMs);

  // ─── Server Setup ───────────────────────────────────────────────────────────

  const server = new MCPServer({
    name: 'clipboard',
    version: '1.0.0',
    tools: clipboardTools,
  });

  // ─── Graceful Shutdown ──────────────────────────────────────────────────────

  // Every exit path (signals, stdin closing) goes through process.exit
  process.on('exit', () => {
    watcher.stop();
    service.shutdown();
  });

  process.on('SIGINT', () => {
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    process.exit(0);
  });

  // ─── Start ──────────────────────────────────────────────────────────────────

  watcher.start();
  server.start();
}

main().catch((err: unknown) => {
  log.error('Failed to start clipboard server', err);
  process.exit(1);
});
