/**
 * clipboard.copy_entry -- Copy a history entry back to the clipboard,
 * optionally pasting it into the focused application.
 *
 * Pasting needs a bridge with paste support; otherwise the call is rejected.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { MCPError, ErrorCodes, toMCPError } from '../../../_shared/ts/mcp-base';
import { getBridge } from '../bridge';
import { getService } from '../service';

const paramsSchema = z
  .object({
    text: z.string().min(1).describe('Text to copy'),
    paste: z.boolean().optional().describe('Also paste into the focused app'),
  })
  .describe('Copy a clipboard history entry');

type Params = z.infer<typeof paramsSchema>;

interface CopyEntryResult {
  readonly copied: boolean;
  readonly pasted: boolean;
}

export const copyEntry: MCPTool<Params, CopyEntryResult> = {
  name: 'clipboard.copy_entry',
  description: 'Copy a clipboard history entry (optionally paste it)',
  paramsSchema,
  confirmationRequired: false,
  undoSupported: false,

  async execute(params: Params): Promise<MCPResult<CopyEntryResult>> {
    const paste = params.paste ?? false;
    if (paste && !getBridge().supportsPaste()) {
      throw new MCPError(ErrorCodes.INVALID_PARAMS, 'Paste is not supported on this host');
    }

    try {
      const result = await getService().copy(params.text, paste);
      return { success: result.copied, data: result };
    } catch (err: unknown) {
      throw toMCPError(err, 'Failed to copy history entry');
    }
  },
};
