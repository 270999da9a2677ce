import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getClipboard } from '../src/tools/get_clipboard';
import { setBridge, type ClipboardBridge } from '../src/bridge';
import { setupTestService, teardownTestService } from './helpers';

describe('clipboard.get_clipboard', () => {
  beforeEach(() => {
    setupTestService();
  });

  afterEach(() => {
    teardownTestService();
  });

  it('should return empty content when clipboard is empty', async () => {
    const result = await getClipboard.execute({});
    expect(result.success).toBe(true);
    expect(result.data).toEqual({ content: '', type: 'text/plain' });
  });

  it('should return the current clipboard content', async () => {
    setupTestService({ initialContent: 'Hello from clipboard' });

    const result = await getClipboard.execute({});
    expect(result.data.content).toBe('Hello from clipboard');
  });

  it('should wrap bridge failures as internal errors', async () => {
    const failing: ClipboardBridge = {
      read: () => Promise.reject(new Error('no display')),
      write: () => Promise.resolve(false),
      supportsPaste: () => false,
      writeAndPaste: () => Promise.resolve(false),
    };
    setBridge(failing);

    await expect(getClipboard.execute({})).rejects.toMatchObject({
      code: -32603,
      message: 'Failed to read clipboard: no display',
    });
  });

  it('has correct tool metadata', () => {
    expect(getClipboard.name).toBe('clipboard.get_clipboard');
    expect(getClipboard.confirmationRequired).toBe(false);
    expect(getClipboard.undoSupported).toBe(false);
  });
});
