/**
 * clipboard.get_settings -- Read the clipboard history settings.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import { toMCPError } from '../../../_shared/ts/mcp-base';
import { getService } from '../service';
import type { ClipboardSettings } from '../settings';

const paramsSchema = z.object({}).describe('Get clipboard history settings (no params)');

type Params = z.infer<typeof paramsSchema>;

export const getSettings: MCPTool<Params, ClipboardSettings> = {
  name: 'clipboard.get_settings',
  description: 'Get clipboard history settings',
  paramsSchema,
  confirmationRequired: false,
  undoSupported: false,

  async execute(_params: Params): Promise<MCPResult<ClipboardSettings>> {
    try {
      return { success: true, data: getService().settings };
    } catch (err: unknown) {
      throw toMCPError(err, 'Failed to read settings');
    }
  },
};
