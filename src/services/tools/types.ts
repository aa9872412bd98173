// Tool system types and interfaces
// Defines the schema and interfaces for the tools the model can call

import type { AssetDirectory } from '../assets/types.js';
import type { RemoteExecutor } from '../remote/ssh-executor.js';
import type { ExecutionRecord } from '../orchestrator/types.js';
import type { Logger } from '../../utils/logger.js';

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'boolean';
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
}

/** Receives command lifecycle notifications from tools that touch a host. */
export interface CommandObserver {
  commandStarted(assetName: string, command: string): void;
  commandFinished(record: ExecutionRecord): void;
}

export interface ToolContext {
  assets: AssetDirectory;
  executor: RemoteExecutor;
  /** When set, only these assets may be listed or targeted */
  allowedAssetNames?: ReadonlySet<string>;
  observer: CommandObserver;
  logger: Logger;
  signal?: AbortSignal;
}

export interface ToolExecutionResult {
  success: boolean;
  content: string;
  metadata?: {
    assetName?: string;
    durationMs?: number;
  };
}

export type ToolArguments = Record<string, unknown>;

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameter[];
  execute: (args: ToolArguments, context: ToolContext) => Promise<ToolExecutionResult>;
}

export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

export interface JsonSchemaProperty {
  type: ToolParameter['type'];
  description: string;
  enum?: string[];
}
