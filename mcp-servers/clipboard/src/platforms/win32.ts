/**
 * WindowsClipboardBridge — clipboard via PowerShell Get-Clipboard/Set-Clipboard.
 * Paste is not supported.
 */

import type { ClipboardBridge, ClipboardContent } from '../bridge';
import { runCommand } from './exec';

const POWERSHELL = ['powershell.exe', '-NoProfile', '-NonInteractive', '-Command'] as const;

export class WindowsClipboardBridge implements ClipboardBridge {
  async read(): Promise<ClipboardContent> {
    const [command, ...args] = POWERSHELL;
    const out = await runCommand(command, [...args, 'Get-Clipboard -Raw']);
    // PowerShell terminates its output with a newline of its own
    return { content: out.replace(/\r?\n$/, ''), type: 'text/plain' };
  }

  async write(content: string): Promise<boolean> {
    const [command, ...args] = POWERSHELL;
    await runCommand(command, [...args, '[Console]::In.ReadToEnd() | Set-Clipboard'], content);
    return true;
  }

  supportsPaste(): boolean {
    return false;
  }

  async writeAndPaste(_content: string): Promise<boolean> {
    return false;
  }
}
