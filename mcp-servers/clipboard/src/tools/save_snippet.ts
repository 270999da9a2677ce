/**
 * clipboard.save_snippet -- Forward text to the snippets service.
 *
 * Only available when a snippets service is configured.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { MCPError, ErrorCodes, toMCPError } from '../../../_shared/ts/mcp-base';
import { getSnippets } from '../snippets';

const paramsSchema = z
  .object({
    text: z.string().min(1).describe('Snippet text'),
  })
  .describe('Save text as a snippet');

type Params = z.infer<typeof paramsSchema>;

interface SaveSnippetResult {
  readonly saved: boolean;
  readonly path: string;
}

export const saveSnippet: MCPTool<Params, SaveSnippetResult> = {
  name: 'clipboard.save_snippet',
  description: 'Save text as a snippet',
  paramsSchema,
  confirmationRequired: true,
  undoSupported: false,

  async execute(params: Params): Promise<MCPResult<SaveSnippetResult>> {
    const snippets = getSnippets();
    if (!snippets) {
      throw new MCPError(ErrorCodes.CAPABILITY_UNAVAILABLE, 'Snippets service is not available');
    }

    try {
      const path = await snippets.addSnippet(params.text);
      return { success: true, data: { saved: true, path } };
    } catch (err: unknown) {
      throw toMCPError(err, 'Failed to save snippet');
    }
  },
};
