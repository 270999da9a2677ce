import { describe, it, expect, afterEach } from 'vitest';
import { getSettings } from '../src/tools/get_settings';
import { updateSettings } from '../src/tools/update_settings';
import { getService } from '../src/service';
import { setupTestService, teardownTestService } from './helpers';

describe('clipboard.get_settings', () => {
  afterEach(() => {
    teardownTestService();
  });

  it('should return the current settings', async () => {
    setupTestService({ settings: { fuzzy: true } });

    const result = await getSettings.execute({});
    expect(result.data).toEqual({ history_limit: 100, persist_history: false, fuzzy: true });
  });

  it('has correct tool metadata', () => {
    expect(getSettings.name).toBe('clipboard.get_settings');
    expect(getSettings.confirmationRequired).toBe(false);
  });
});

describe('clipboard.update_settings', () => {
  afterEach(() => {
    teardownTestService();
  });

  it('should shrink the history when the limit is lowered', async () => {
    const { settingsStore } = setupTestService({ historyCount: 4 });

    const result = await updateSettings.execute({ history_limit: 1 });

    expect(result.data.previous.history_limit).toBe(100);
    expect(result.data.current.history_limit).toBe(1);
    expect(getService().history.snapshot().map((e) => e.text)).toEqual(['History entry 4']);
    expect(settingsStore.saveCount).toBe(1);
  });

  it('should toggle fuzzy and persistence', async () => {
    setupTestService();

    const result = await updateSettings.execute({ fuzzy: true, persist_history: true });
    expect(result.data.current).toEqual({ history_limit: 100, persist_history: true, fuzzy: true });
  });

  it('should reject a zero, fractional or oversized limit', () => {
    expect(updateSettings.paramsSchema.safeParse({ history_limit: 0 }).success).toBe(false);
    expect(updateSettings.paramsSchema.safeParse({ history_limit: 1.5 }).success).toBe(false);
    expect(updateSettings.paramsSchema.safeParse({ history_limit: 10_000_001 }).success).toBe(false);
    expect(updateSettings.paramsSchema.safeParse({ history_limit: 10_000_000 }).success).toBe(true);
  });

  it('has correct tool metadata', () => {
    expect(updateSettings.name).toBe('clipboard.update_settings');
    expect(updateSettings.confirmationRequired).toBe(true);
    expect(updateSettings.undoSupported).toBe(false);
  });
});
