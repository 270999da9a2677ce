/**
 * Run a clipboard helper command with explicit argument arrays
 * (no shell, no string interpolation).
 */

import { spawn } from 'child_process';

const COMMAND_TIMEOUT_MS = 5000;

/** Run `command`, optionally feeding `input` on stdin. Resolves with stdout. */
export function runCommand(command: string, args: readonly string[], input?: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { timeout: COMMAND_TIMEOUT_MS });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.on('error', reject);
    child.on('close', (code) => {
      if (code === 0) {
        resolve(Buffer.concat(stdout).toString('utf-8'));
      } else {
        const detail = Buffer.concat(stderr).toString('utf-8').trim();
        reject(new Error(`${command} exited with code ${String(code)}${detail ? `: ${detail}` : ''}`));
      }
    });

    child.stdin.end(input ?? '');
  });
}

/** Whether `command` resolves on PATH. */
export async function hasCommand(command: string): Promise<boolean> {
  const probe = process.platform === 'win32' ? 'where' : 'which';
  try {
    await runCommand(probe, [command]);
    return true;
  } catch {
    return false;
  }
}
