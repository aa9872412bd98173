// Model clients
// Each client renders the canonical conversation into its endpoint's wire format and
// normalizes the reply into a ModelDecision, so the loop never branches on calling convention.

import { randomUUID } from 'crypto';
import type { ToolCallMode } from '../../env.js';
import type { Provider, ProviderMessage, ProviderResponse } from '../../providers/types.js';
import { ModelEndpointError } from '../../utils/errors.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import type { ToolDeclaration } from '../tools/types.js';
import { parseActionDescriptor, parseTaggedToolCall, parseToolArguments, stripThinking, type ParsedAction } from './parser.js';
import { buildSelfParsedInstructions } from './prompts.js';
import type { ModelDecision, ToolCall, Turn } from './types.js';

export interface ModelSettings {
  model: string;
  maxTokens?: number;
  temperature?: number;
}

export interface AskOptions {
  signal?: AbortSignal;
}

export interface ModelClient {
  /** Calling convention currently in use */
  readonly mode: Exclude<ToolCallMode, 'auto'>;
  ask(conversation: readonly Turn[], tools: ToolDeclaration[], options?: AskOptions): Promise<ModelDecision>;
}

function newCallId(): string {
  return `call_${randomUUID().replace(/-/g, '').slice(0, 24)}`;
}

function serializeArguments(args: ToolCall['arguments']): string {
  return typeof args === 'string' ? args : JSON.stringify(args);
}

function decisionFromAction(action: ParsedAction | null, text: string): ModelDecision {
  if (!action) {
    return { type: 'final', text: stripThinking(text) };
  }
  if (action.type === 'final') {
    return { type: 'final', text: action.message.trim() || stripThinking(text) };
  }
  return {
    type: 'tool_calls',
    text,
    calls: [{ id: newCallId(), name: action.name, arguments: action.arguments }],
  };
}

function responseText(response: ProviderResponse): string {
  return response.content.trim() ? response.content : response.reasoning ?? '';
}

export class NativeModelClient implements ModelClient {
  readonly mode = 'native' as const;

  constructor(
    private provider: Provider,
    private settings: ModelSettings,
  ) {}

  async ask(conversation: readonly Turn[], tools: ToolDeclaration[], options: AskOptions = {}): Promise<ModelDecision> {
    const response = await this.provider.sendChat(conversation.map(renderNative), {
      ...this.settings,
      signal: options.signal,
      tools: tools.map(declaration => ({ type: 'function' as const, function: declaration })),
      toolChoice: 'auto',
    });

    if (response.toolCalls.length > 0) {
      return {
        type: 'tool_calls',
        text: response.content,
        calls: response.toolCalls.map(tc => ({
          id: tc.id || newCallId(),
          name: tc.name,
          arguments: parseToolArguments(tc.arguments),
        })),
      };
    }

    const tagged = parseTaggedToolCall(response.content);
    if (tagged) {
      return decisionFromAction(tagged, response.content);
    }

    return { type: 'final', text: stripThinking(response.content) };
  }
}

export function renderNative(turn: Turn): ProviderMessage {
  switch (turn.role) {
    case 'system':
      return { role: 'system', content: turn.content };
    case 'user':
      return { role: 'user', content: turn.content };
    case 'assistant':
      if (turn.toolCalls && turn.toolCalls.length > 0) {
        return {
          role: 'assistant',
          content: turn.content,
          tool_calls: turn.toolCalls.map(call => ({
            id: call.id,
            name: call.name,
            arguments: serializeArguments(call.arguments),
          })),
        };
      }
      return { role: 'assistant', content: turn.content };
    case 'tool':
      return { role: 'tool', content: turn.content, tool_call_id: turn.toolCallId };
  }
}

export function wrapToolResult(turn: Extract<Turn, { role: 'tool' }>): string {
  const asset = turn.assetName ? ` asset="${turn.assetName}"` : '';
  return `<tool_result name="${turn.toolName}"${asset}>\n${turn.content}\n</tool_result>`;
}

export class SelfParsedModelClient implements ModelClient {
  readonly mode = 'self_parsed' as const;

  constructor(
    private provider: Provider,
    private settings: ModelSettings,
  ) {}

  async ask(conversation: readonly Turn[], tools: ToolDeclaration[], options: AskOptions = {}): Promise<ModelDecision> {
    const messages = this.render(conversation, tools);
    const response = await this.provider.sendChat(messages, { ...this.settings, signal: options.signal });

    const text = responseText(response);
    return decisionFromAction(parseActionDescriptor(text), text);
  }

  private render(conversation: readonly Turn[], tools: ToolDeclaration[]): ProviderMessage[] {
    const instructions = buildSelfParsedInstructions(tools);
    const messages: ProviderMessage[] = [];
    let instructionsAdded = false;

    for (const turn of conversation) {
      switch (turn.role) {
        case 'system':
          if (!instructionsAdded) {
            messages.push({ role: 'system', content: `${turn.content}\n\n${instructions}` });
            instructionsAdded = true;
          } else {
            messages.push({ role: 'system', content: turn.content });
          }
          break;
        case 'user':
          messages.push({ role: 'user', content: turn.content });
          break;
        case 'assistant': {
          const calls = turn.toolCalls ?? [];
          const content = turn.content.trim() || calls
            .map(call => `<tool_call>${JSON.stringify({ name: call.name, arguments: call.arguments })}</tool_call>`)
            .join('\n');
          messages.push({ role: 'assistant', content });
          break;
        }
        case 'tool':
          messages.push({ role: 'user', content: wrapToolResult(turn) });
          break;
      }
    }

    if (!instructionsAdded) {
      messages.unshift({ role: 'system', content: instructions });
    }
    return messages;
  }
}

/**
 * Native tool calling until the endpoint says it has none, then the text
 * protocol for the rest of this client's life.
 */
export class AutoModelClient implements ModelClient {
  private fallenBack = false;
  private readonly native: NativeModelClient;
  private readonly selfParsed: SelfParsedModelClient;

  constructor(
    provider: Provider,
    settings: ModelSettings,
    private logger: Logger = rootLogger,
  ) {
    this.native = new NativeModelClient(provider, settings);
    this.selfParsed = new SelfParsedModelClient(provider, settings);
  }

  get mode(): Exclude<ToolCallMode, 'auto'> {
    return this.fallenBack ? 'self_parsed' : 'native';
  }

  async ask(conversation: readonly Turn[], tools: ToolDeclaration[], options: AskOptions = {}): Promise<ModelDecision> {
    if (!this.fallenBack) {
      try {
        return await this.native.ask(conversation, tools, options);
      } catch (error) {
        if (!(error instanceof ModelEndpointError) || !error.toolsUnsupported) {
          throw error;
        }
        this.fallenBack = true;
        this.logger.warn({ err: error.message }, 'Endpoint does not support native tools, switching to self-parsed tool calls');
      }
    }
    return this.selfParsed.ask(conversation, tools, options);
  }
}

export function createModelClient(
  mode: ToolCallMode,
  provider: Provider,
  settings: ModelSettings,
  logger?: Logger,
): ModelClient {
  switch (mode) {
    case 'native':
      return new NativeModelClient(provider, settings);
    case 'self_parsed':
      return new SelfParsedModelClient(provider, settings);
    case 'auto':
      return new AutoModelClient(provider, settings, logger);
  }
}
