// Orchestrator Module - Main exports

export { Orchestrator, cancelledReply, stepLimitReply } from './orchestrator.js';
export type { OrchestratorDependencies } from './orchestrator.js';
export {
  AutoModelClient,
  NativeModelClient,
  SelfParsedModelClient,
  createModelClient,
  renderNative,
  wrapToolResult,
} from './model-client.js';
export type { AskOptions, ModelClient, ModelSettings } from './model-client.js';
export { ToolDispatcher } from './dispatcher.js';
export { parseActionDescriptor, parseTaggedToolCall, parseToolArguments, stripThinking } from './parser.js';
export type { ParsedAction } from './parser.js';
export { SYSTEM_PROMPT, buildAllowedAssetsConstraint, buildSelfParsedInstructions } from './prompts.js';
export { buildModelSettings, buildOrchestratorConfig } from './config.js';
export type {
  ExecutionRecord,
  ModelDecision,
  OrchestratorConfig,
  RunEvent,
  RunEventSink,
  RunOutcome,
  RunRequest,
  RunStatus,
  ToolCall,
  ToolResult,
  Turn,
} from './types.js';
