// Orchestrator configuration from the environment (composition root only)

import { env, type Env } from '../../env.js';
import type { ModelSettings } from './model-client.js';
import type { OrchestratorConfig } from './types.js';

export function buildOrchestratorConfig(source: Env = env): OrchestratorConfig {
  return {
    maxRounds: Math.max(1, source.MAX_ROUNDS),
    toolResultMaxChars: source.TOOL_RESULT_MAX_CHARS,
  };
}

export function buildModelSettings(source: Env = env): ModelSettings {
  return {
    model: source.MODEL_NAME,
    maxTokens: source.MODEL_MAX_TOKENS,
    temperature: source.MODEL_TEMPERATURE,
  };
}
