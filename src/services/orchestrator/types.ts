// Orchestrator Types

import type { ToolArguments } from '../tools/types.js';

export interface ToolCall {
  id: string;
  name: string;
  /** Parsed arguments, or the raw text when the model sent something that is not a JSON object */
  arguments: ToolArguments | string;
}

export type Turn =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
  | { role: 'tool'; content: string; toolCallId: string; toolName: string; assetName?: string };

export interface ToolResult {
  callId: string;
  toolName: string;
  content: string;
  success: boolean;
  assetName?: string;
}

export interface ExecutionRecord {
  assetName: string;
  command: string;
  result: string;
  timestamp: string;
}

/** What the model decided to do with its turn. */
export type ModelDecision =
  | { type: 'final'; text: string }
  | { type: 'tool_calls'; calls: ToolCall[]; text: string };

export type RunEvent =
  | { type: 'model_reply'; round: number; content: string }
  | { type: 'command_start'; assetName: string; command: string }
  | { type: 'command_result'; assetName: string; command: string; result: string }
  | { type: 'reply'; reply: string }
  | { type: 'error'; message: string };

export type RunEventSink = (event: RunEvent) => void;

export interface RunRequest {
  instruction: string;
  history?: Turn[];
  /** Restricts the run to these assets; an empty selection means no restriction */
  allowedAssetNames?: Iterable<string>;
  traceId?: string;
  signal?: AbortSignal;
}

export type RunStatus = 'completed' | 'step_limit' | 'error' | 'cancelled';

export interface RunOutcome {
  status: RunStatus;
  reply: string;
  commands: ExecutionRecord[];
  rounds: number;
  conversation: Turn[];
  error?: string;
}

export interface OrchestratorConfig {
  /** Model queries allowed per instruction */
  maxRounds: number;
  /** Tool output longer than this is cut before it goes back to the model */
  toolResultMaxChars: number;
  systemPrompt?: string;
}
