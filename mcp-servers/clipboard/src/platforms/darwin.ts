/**
 * DarwinClipboardBridge — macOS clipboard via pbpaste/pbcopy, paste via osascript.
 */

import type { ClipboardBridge, ClipboardContent } from '../bridge';
import { runCommand } from './exec';

const PASTE_SCRIPT = 'tell application "System Events" to keystroke "v" using command down';

export class DarwinClipboardBridge implements ClipboardBridge {
  async read(): Promise<ClipboardContent> {
    const content = await runCommand('pbpaste', []);
    return { content, type: 'text/plain' };
  }

  async write(content: string): Promise<boolean> {
    await runCommand('pbcopy', [], content);
    return true;
  }

  supportsPaste(): boolean {
    return true;
  }

  async writeAndPaste(content: string): Promise<boolean> {
    await this.write(content);
    await runCommand('osascript', ['-e', PASTE_SCRIPT]);
    return true;
  }
}
