/**
 * Environment configuration for the clipboard server.
 *
 *   CLIPBOARD_DATA_DIR          history + settings directory (default ~/.clipboard-history)
 *   CLIPBOARD_SNIPPETS_DIR      enables "save as snippet" when set
 *   CLIPBOARD_POLL_INTERVAL_MS  clipboard poll period (default 500)
 *   CLIPBOARD_LOG_LEVEL         debug | info | warn | error (default info)
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../../_shared/ts/logger';

export interface ServerConfig {
  readonly dataDir: string;
  readonly snippetsDir: string | null;
  readonly pollIntervalMs: number;
  readonly logLevel: LogLevel;
}

export const DEFAULT_POLL_INTERVAL_MS = 500;

const pollIntervalSchema = z.coerce.number().int().min(50).max(60_000);
const logLevelSchema = z.enum(LOG_LEVELS);

/** Read the server configuration from an environment map. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const pollInterval = pollIntervalSchema.safeParse(env.CLIPBOARD_POLL_INTERVAL_MS);
  const logLevel = logLevelSchema.safeParse(env.CLIPBOARD_LOG_LEVEL);
  const snippetsDir = env.CLIPBOARD_SNIPPETS_DIR?.trim();

  return {
    dataDir: env.CLIPBOARD_DATA_DIR?.trim() || path.join(os.homedir(), '.clipboard-history'),
    snippetsDir: snippetsDir ? snippetsDir : null,
    pollIntervalMs: pollInterval.success ? pollInterval.data : DEFAULT_POLL_INTERVAL_MS,
    logLevel: logLevel.success ? logLevel.data : 'info',
  };
}
