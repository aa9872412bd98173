// Tool System Initialization
// Builds the registry of tools offered to the model

import { ToolRegistry } from './registry.js';
import { listAssetsTool } from './list-assets-tool.js';
import { executeCommandTool } from './execute-command-tool.js';
import { createUploadFileTool } from './upload-file-tool.js';

export { ToolRegistry } from './registry.js';
export type { ValidationResult } from './registry.js';
export { resolveTarget, stringArg } from './target.js';
export { listAssetsTool, executeCommandTool, createUploadFileTool };
export type {
  CommandObserver,
  ToolArguments,
  ToolContext,
  ToolDeclaration,
  ToolDefinition,
  ToolExecutionResult,
  ToolParameter,
} from './types.js';

export interface OpsToolOptions {
  uploadEnabled: boolean;
  uploadDir: string;
}

export function createOpsToolRegistry(options: OpsToolOptions): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(listAssetsTool);
  registry.register(executeCommandTool);

  if (options.uploadEnabled) {
    registry.register(createUploadFileTool({ uploadDir: options.uploadDir }));
  }

  return registry;
}
