/**
 * Clipboard tool registry, in the order tools/list reports them.
 */

import type { MCPTool } from '../../../_shared/ts/mcp-base';
import { clipboardHistory } from './clipboard_history';
import { copyEntry } from './copy_entry';
import { getClipboard } from './get_clipboard';
import { getSettings } from './get_settings';
import { removeEntry } from './remove_entry';
import { saveSnippet } from './save_snippet';
import { searchHistoryTool } from './search_history';
import { setClipboard } from './set_clipboard';
import { updateSettings } from './update_settings';

export const clipboardTools: MCPTool[] = [
  getClipboard,
  setClipboard,
  clipboardHistory,
  searchHistoryTool,
  removeEntry,
  copyEntry,
  saveSnippet,
  getSettings,
  updateSettings,
];
