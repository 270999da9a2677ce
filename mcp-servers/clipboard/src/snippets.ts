/**
 * Snippets collaborator — optional capability.
 *
 * When configured, clipboard entries can be saved as snippets. The service is
 * either present or null; callers check before offering the action.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createLogger } from '../../_shared/ts/logger';

const log = createLogger('clipboard:snippets');

const MAX_BASENAME_LENGTH = 48;

export interface SnippetsService {
  /** Store `text` as a new snippet and return where it was written. */
  addSnippet(text: string): Promise<string>;
}

/** Derive a filesystem-safe base name from the snippet's first line. */
export function snippetBaseName(text: string): string {
  const firstLine = text.trim().split(/\r?\n/, 1)[0] ?? '';
  const cleaned = firstLine
    .replace(/[\\/<>:"|?*\0]/g, '')
    .replace(/\.\./g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, MAX_BASENAME_LENGTH)
    .trim();
  return cleaned.length > 0 ? cleaned : 'snippet';
}

/** One `.txt` file per snippet in a directory; name collisions get a numeric suffix. */
export class DirectorySnippetsService implements SnippetsService {
  constructor(readonly directory: string) {}

  async addSnippet(text: string): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true });
    const base = snippetBaseName(text);

    for (let attempt = 0; ; attempt++) {
      const name = attempt === 0 ? `${base}.txt` : `${base} ${attempt + 1}.txt`;
      const target = path.join(this.directory, name);
      try {
        await fs.writeFile(target, text, { flag: 'wx' });
        log.info('Saved snippet', target);
        return target;
      } catch (err) {
        if (isAlreadyExists(err)) continue;
        throw err;
      }
    }
  }
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}

// ── Capability Accessor ──────────────────────────────────────────────────────

let snippets: SnippetsService | null = null;

export function getSnippets(): SnippetsService | null {
  return snippets;
}

export function setSnippets(service: SnippetsService | null): void {
  snippets = service;
}
