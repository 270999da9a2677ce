/**
 * LinuxClipboardBridge — wl-clipboard on Wayland, xclip on X11.
 * Paste is synthesized with wtype (Wayland) or xdotool (X11) when installed.
 */

import { createLogger } from '../../../_shared/ts/logger';
import type { ClipboardBridge, ClipboardContent } from '../bridge';
import { hasCommand, runCommand } from './exec';

const log = createLogger('clipboard:linux');

interface LinuxTools {
  readonly read: readonly [string, ...string[]];
  readonly write: readonly [string, ...string[]];
  readonly paste: readonly [string, ...string[]] | null;
}

const WAYLAND_READ = ['wl-paste', '--no-newline', '--type', 'text'] as const;
const WAYLAND_WRITE = ['wl-copy'] as const;
const WAYLAND_PASTE = ['wtype', '-M', 'ctrl', 'v', '-m', 'ctrl'] as const;
const X11_READ = ['xclip', '-selection', 'clipboard', '-o'] as const;
const X11_WRITE = ['xclip', '-selection', 'clipboard', '-i'] as const;
const X11_PASTE = ['xdotool', 'key', '--clearmodifiers', 'ctrl+v'] as const;

export class LinuxClipboardBridge implements ClipboardBridge {
  constructor(private readonly tools: LinuxTools) {}

  /** Pick the tool set for the running session and probe for a paste tool. */
  static async detect(env: NodeJS.ProcessEnv = process.env): Promise<LinuxClipboardBridge> {
    const wayland = Boolean(env.WAYLAND_DISPLAY);
    const paste = wayland ? WAYLAND_PASTE : X11_PASTE;
    const canPaste = await hasCommand(paste[0]);
    return new LinuxClipboardBridge({
      read: wayland ? WAYLAND_READ : X11_READ,
      write: wayland ? WAYLAND_WRITE : X11_WRITE,
      paste: canPaste ? paste : null,
    });
  }

  async read(): Promise<ClipboardContent> {
    const [command, ...args] = this.tools.read;
    try {
      return { content: await runCommand(command, args), type: 'text/plain' };
    } catch (err) {
      // Both tools exit non-zero when the selection is empty or not text
      log.debug('No text on clipboard', err instanceof Error ? err.message : String(err));
      return { content: '', type: 'text/plain' };
    }
  }

  async write(content: string): Promise<boolean> {
    const [command, ...args] = this.tools.write;
    await runCommand(command, args, content);
    return true;
  }

  supportsPaste(): boolean {
    return this.tools.paste !== null;
  }

  async writeAndPaste(content: string): Promise<boolean> {
    if (!this.tools.paste) return false;
    await this.write(content);
    const [command, ...args] = this.tools.paste;
    await runCommand(command, args);
    return true;
  }
}
