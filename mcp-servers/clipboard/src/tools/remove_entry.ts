/**
 * clipboard.remove_entry -- Remove an entry from the clipboard history.
 *
 * Mutable, but not an error when the text is absent.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { toMCPError } from '../../../_shared/ts/mcp-base';
import { getService } from '../service';

const paramsSchema = z
  .object({
    text: z.string().min(1).describe('Exact text of the entry to remove'),
  })
  .describe('Remove a clipboard history entry');

type Params = z.infer<typeof paramsSchema>;

interface RemoveEntryResult {
  readonly removed: boolean;
}

export const removeEntry: MCPTool<Params, RemoveEntryResult> = {
  name: 'clipboard.remove_entry',
  description: 'Remove a clipboard history entry',
  paramsSchema,
  confirmationRequired: false,
  undoSupported: false,

  async execute(params: Params): Promise<MCPResult<RemoveEntryResult>> {
    try {
      return { success: true, data: { removed: getService().remove(params.text) } };
    } catch (err: unknown) {
      throw toMCPError(err, 'Failed to remove history entry');
    }
  },
};
