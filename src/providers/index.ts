// Provider construction

import { env, normalizeBaseUrl, type Env } from '../env.js';
import { OpenAICompatibleProvider, type ProviderConfig } from './openai-compatible.js';
import type { Provider } from './types.js';

// Local OpenAI-compatible servers ignore the key, but the SDK refuses an empty one
const PLACEHOLDER_API_KEY = 'not-needed';

export function buildProviderConfig(source: Env = env): ProviderConfig {
  return {
    baseURL: normalizeBaseUrl(source.MODEL_BASE_URL),
    apiKey: source.MODEL_API_KEY || PLACEHOLDER_API_KEY,
    timeoutMs: source.MODEL_TIMEOUT_MS,
  };
}

export function createProvider(config: ProviderConfig): Provider {
  return new OpenAICompatibleProvider(config);
}

export { OpenAICompatibleProvider, isToolsUnsupportedMessage } from './openai-compatible.js';
export type { ProviderConfig } from './openai-compatible.js';
export type {
  Provider,
  ProviderMessage,
  ProviderOptions,
  ProviderResponse,
  ProviderTool,
  ProviderToolCall,
  ProviderUsage,
} from './types.js';
