/**
 * clipboard.clipboard_history -- Get recent clipboard entries.
 *
 * Non-destructive: executes immediately, no confirmation needed.
 * Returns entries in reverse-chronological order (most recent first).
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { toMCPError } from '../../../_shared/ts/mcp-base';
import { getService } from '../service';

export const DEFAULT_HISTORY_PAGE = 20;

// ── Params ───────────────────────────────────────────────────────────────────

const paramsSchema = z
  .object({
    limit: z
      .number()
      .int()
      .min(1)
      .max(100)
      .optional()
      .describe(`Max entries to return (default ${DEFAULT_HISTORY_PAGE})`),
  })
  .describe('Get recent clipboard entries');

type Params = z.infer<typeof paramsSchema>;

// ── Return type ──────────────────────────────────────────────────────────────

interface HistoryEntryView {
  readonly rank: number;
  readonly text: string;
  readonly captured_at: string;
}

interface ClipboardHistoryResult {
  readonly entries: HistoryEntryView[];
  readonly total: number;
}

// ── Tool ─────────────────────────────────────────────────────────────────────

export const clipboardHistory: MCPTool<Params, ClipboardHistoryResult> = {
  name: 'clipboard.clipboard_history',
  description: 'Get recent clipboard entries',
  paramsSchema,
  confirmationRequired: false,
  undoSupported: false,

  async execute(params: Params): Promise<MCPResult<ClipboardHistoryResult>> {
    try {
      const limit = params.limit ?? DEFAULT_HISTORY_PAGE;
      const snapshot = getService().history.snapshot();
      const entries = snapshot.slice(0, limit).map((entry, index) => ({
        rank: index + 1,
        text: entry.text,
        captured_at: entry.capturedAt.toISOString(),
      }));
      return {
        success: true,
        data: { entries, total: snapshot.length },
      };
    } catch (err: unknown) {
      throw toMCPError(err, 'Failed to get clipboard history');
    }
  },
};
