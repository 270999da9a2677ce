/**
 * clipboard.search_history -- Search the clipboard history.
 *
 * Non-destructive. Results keep recency order; `rank` is how many entries
 * back the match sits. An empty query lists the whole history.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { toMCPError } from '../../../_shared/ts/mcp-base';
import { getService, type SearchItem } from '../service';

// ── Params ───────────────────────────────────────────────────────────────────

const paramsSchema = z
  .object({
    query: z.string().describe('Text to look for; empty matches everything'),
    fuzzy: z
      .boolean()
      .optional()
      .describe('Subsequence matching; defaults to the fuzzy setting'),
  })
  .describe('Search clipboard history');

type Params = z.infer<typeof paramsSchema>;

// ── Return type ──────────────────────────────────────────────────────────────

interface SearchHistoryResult {
  readonly fuzzy: boolean;
  readonly results: SearchItem[];
}

// ── Tool ─────────────────────────────────────────────────────────────────────

export const searchHistoryTool: MCPTool<Params, SearchHistoryResult> = {
  name: 'clipboard.search_history',
  description: 'Search clipboard history',
  paramsSchema,
  confirmationRequired: false,
  undoSupported: false,

  async execute(params: Params): Promise<MCPResult<SearchHistoryResult>> {
    try {
      const service = getService();
      const fuzzy = params.fuzzy ?? service.settings.fuzzy;
      return {
        success: true,
        data: { fuzzy, results: service.search(params.query, fuzzy) },
      };
    } catch (err: unknown) {
      throw toMCPError(err, 'Failed to search clipboard history');
    }
  },
};
