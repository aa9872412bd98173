import { renderAssetList } from '../assets/types.js';
import type { ToolDefinition, ToolExecutionResult } from './types.js';

export const listAssetsTool: ToolDefinition = {
  name: 'list_assets',
  description: 'List the Linux hosts (assets) that commands can be run on, with their connection address. Takes no arguments.',
  parameters: [],

  async execute(_args, context): Promise<ToolExecutionResult> {
    const allowed = context.allowedAssetNames;
    const summaries = (await context.assets.list()).filter(asset => !allowed || allowed.has(asset.name));

    return {
      success: true,
      content: renderAssetList(summaries),
    };
  },
};
