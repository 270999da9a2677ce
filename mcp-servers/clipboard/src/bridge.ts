/**
 * Clipboard Bridge Abstraction
 *
 * Provides a swappable bridge layer between the MCP server and the
 * actual clipboard implementation. Platform bridges shell out to the
 * native clipboard tools; tests and standalone mode use an in-memory mock.
 */

import * as os from 'os';

// ── Types ────────────────────────────────────────────────────────────────────

export interface ClipboardContent {
  readonly content: string;
  readonly type: string;
}

/** Abstraction over the OS clipboard (or mock). */
export interface ClipboardBridge {
  /** Read the current clipboard contents. Non-text content reads as ''. */
  read(): Promise<ClipboardContent>;

  /** Write content to the clipboard. Returns true on success. */
  write(content: string): Promise<boolean>;

  /** Whether writeAndPaste can synthesize a paste into the focused app. */
  supportsPaste(): boolean;

  /** Write content to the clipboard, then paste it. Returns true on success. */
  writeAndPaste(content: string): Promise<boolean>;
}

// ── Mock Bridge ──────────────────────────────────────────────────────────────

/**
 * In-memory clipboard implementation for testing and standalone mode.
 * Stores a single string value as the "clipboard" contents.
 */
export class MockClipboardBridge implements ClipboardBridge {
  private clipboardContent = '';
  private readonly pasteSupported: boolean;
  readonly pasted: string[] = [];

  constructor(opts?: { readonly pasteSupported?: boolean }) {
    this.pasteSupported = opts?.pasteSupported ?? false;
  }

  async read(): Promise<ClipboardContent> {
    return { content: this.clipboardContent, type: 'text/plain' };
  }

  async write(content: string): Promise<boolean> {
    this.clipboardContent = content;
    return true;
  }

  supportsPaste(): boolean {
    return this.pasteSupported;
  }

  async writeAndPaste(content: string): Promise<boolean> {
    if (!this.pasteSupported) return false;
    await this.write(content);
    this.pasted.push(content);
    return true;
  }
}

// ── Unsupported Platform ─────────────────────────────────────────────────────

class UnsupportedPlatformBridge implements ClipboardBridge {
  constructor(private readonly platform: string) {}

  private fail(): never {
    throw new Error(`Clipboard not available on ${this.platform}. Supported: macOS, Linux, Windows.`);
  }

  async read(): Promise<ClipboardContent> { this.fail(); }
  async write(_content: string): Promise<boolean> { this.fail(); }
  supportsPaste(): boolean { return false; }
  async writeAndPaste(_content: string): Promise<boolean> { this.fail(); }
}

// ── Platform Factory ─────────────────────────────────────────────────────────

export async function createPlatformBridge(platform: string = os.platform()): Promise<ClipboardBridge> {
  if (platform === 'darwin') {
    const { DarwinClipboardBridge } = await import('./platforms/darwin');
    return new DarwinClipboardBridge();
  }
  if (platform === 'linux') {
    const { LinuxClipboardBridge } = await import('./platforms/linux');
    return LinuxClipboardBridge.detect();
  }
  if (platform === 'win32') {
    const { WindowsClipboardBridge } = await import('./platforms/win32');
    return new WindowsClipboardBridge();
  }
  return new UnsupportedPlatformBridge(platform);
}

// ── Bridge Accessor ──────────────────────────────────────────────────────────

let currentBridge: ClipboardBridge = new MockClipboardBridge();

/** Get the active clipboard bridge instance. */
export function getBridge(): ClipboardBridge {
  return currentBridge;
}

/** Set the clipboard bridge (used at startup and for testing / DI). */
export function setBridge(bridge: ClipboardBridge): void {
  currentBridge = bridge;
}
