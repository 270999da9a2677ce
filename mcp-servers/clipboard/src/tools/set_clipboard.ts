/**
 * clipboard.set_clipboard -- Set clipboard contents.
 *
 * Non-destructive: no confirmation required.
 * Runs an ingestion check after a successful write, so the new value is
 * recorded the same way an external copy would be.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { toMCPError } from '../../../_shared/ts/mcp-base';
import { getBridge } from '../bridge';
import { getService } from '../service';

// ── Params ───────────────────────────────────────────────────────────────────

const paramsSchema = z
  .object({
    content: z.string().min(1).describe('Content to copy to clipboard'),
  })
  .describe('Set clipboard contents');

type Params = z.infer<typeof paramsSchema>;

// ── Return type ──────────────────────────────────────────────────────────────

interface SetClipboardResult {
  readonly success: boolean;
  readonly recorded: boolean;
}

// ── Tool ─────────────────────────────────────────────────────────────────────

export const setClipboard: MCPTool<Params, SetClipboardResult> = {
  name: 'clipboard.set_clipboard',
  description: 'Set clipboard contents',
  paramsSchema,
  confirmationRequired: false,
  undoSupported: false,

  async execute(params: Params): Promise<MCPResult<SetClipboardResult>> {
    try {
      const ok = await getBridge().write(params.content);
      const recorded = ok ? (await getService().checkClipboard()) !== null : false;
      return {
        success: ok,
        data: { success: ok, recorded },
      };
    } catch (err: unknown) {
      throw toMCPError(err, 'Failed to set clipboard');
    }
  },
};
