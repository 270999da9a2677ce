/**
 * clipboard.update_settings -- Change clipboard history settings.
 *
 * Mutable: requires confirmation. Lowering history_limit drops the oldest
 * entries immediately; persist_history applies at the next shutdown/startup.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { toMCPError } from '../../../_shared/ts/mcp-base';
import { getService, type SettingsChange } from '../service';
import { historyLimitSchema } from '../settings';

const paramsSchema = z
  .object({
    history_limit: historyLimitSchema.optional().describe('Maximum number of entries kept'),
    persist_history: z.boolean().optional().describe('Store history across restarts'),
    fuzzy: z.boolean().optional().describe('Use fuzzy matching by default'),
  })
  .describe('Update clipboard history settings');

type Params = z.infer<typeof paramsSchema>;

export const updateSettings: MCPTool<Params, SettingsChange> = {
  name: 'clipboard.update_settings',
  description: 'Update clipboard history settings',
  paramsSchema,
  confirmationRequired: true,
  undoSupported: false,

  async execute(params: Params): Promise<MCPResult<SettingsChange>> {
    try {
      return { success: true, data: getService().updateSettings(params) };
    } catch (err: unknown) {
      throw toMCPError(err, 'Failed to update settings');
    }
  },
};
