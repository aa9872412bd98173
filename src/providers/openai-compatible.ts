// OpenAI-compatible chat completions provider
// Works against DeepSeek, OpenAI, vLLM, Ollama and anything else speaking the same API

import OpenAI from 'openai';
import { ModelEndpointError, errorMessage } from '../utils/errors.js';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ProviderToolCall } from './types.js';

export interface ProviderConfig {
  baseURL: string;
  apiKey: string;
  timeoutMs: number;
}

const TOOLS_UNSUPPORTED_PATTERNS = [/does not support tools?/i, /tools? (is|are) not supported/i];

/** True when an endpoint error says the model cannot take tool declarations. */
export function isToolsUnsupportedMessage(text: string): boolean {
  if (TOOLS_UNSUPPORTED_PATTERNS.some(pattern => pattern.test(text))) return true;
  return /extra inputs are not permitted/i.test(text) && /tool/i.test(text);
}

function toOpenAIMessage(message: ProviderMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      if (message.tool_calls && message.tool_calls.length > 0) {
        return {
          role: 'assistant',
          content: message.content || null,
          tool_calls: message.tool_calls.map(tc => ({
            id: tc.id,
            type: 'function' as const,
            function: { name: tc.name, arguments: tc.arguments },
          })),
        };
      }
      return { role: 'assistant', content: message.content };
    case 'tool':
      return { role: 'tool', content: message.content, tool_call_id: message.tool_call_id };
  }
}

export class OpenAICompatibleProvider implements Provider {
  name = 'openai-compatible';
  private client: OpenAI;
  private timeoutMs: number;

  constructor(config: ProviderConfig) {
    this.client = new OpenAI({
      baseURL: config.baseURL,
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
    this.timeoutMs = config.timeoutMs;
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: options.model,
      messages: messages.map(toOpenAIMessage),
    };
    if (options.maxTokens !== undefined) params.max_tokens = options.maxTokens;
    if (options.temperature !== undefined) params.temperature = options.temperature;
    if (options.tools && options.tools.length > 0) {
      params.tools = options.tools;
      params.tool_choice = options.toolChoice ?? 'auto';
    }

    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(params, {
        signal: options.signal,
        timeout: this.timeoutMs,
      });
    } catch (error) {
      throw this.toEndpointError(error);
    }

    const choice = Array.isArray(completion.choices) ? completion.choices[0] : undefined;
    if (!choice || !choice.message) {
      throw new ModelEndpointError('Model endpoint returned a response without choices');
    }

    const message = choice.message;
    const toolCalls: ProviderToolCall[] = (message.tool_calls ?? [])
      .filter(tc => tc.type === 'function')
      .map(tc => ({ id: tc.id, name: tc.function.name, arguments: tc.function.arguments }));

    const response: ProviderResponse = {
      content: message.content ?? '',
      toolCalls,
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      },
      finishReason: choice.finish_reason ?? undefined,
    };

    if ('reasoning_content' in message && typeof message.reasoning_content === 'string') {
      response.reasoning = message.reasoning_content;
    }

    return response;
  }

  private toEndpointError(error: unknown): ModelEndpointError {
    if (error instanceof ModelEndpointError) return error;

    const status = error instanceof OpenAI.APIError ? error.status : undefined;
    const message = errorMessage(error);
    return new ModelEndpointError(
      status ? `Model endpoint error (${status}): ${message}` : `Model endpoint error: ${message}`,
      status,
      isToolsUnsupportedMessage(message),
    );
  }
}
