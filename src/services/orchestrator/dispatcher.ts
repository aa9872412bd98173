// Tool Dispatcher
// Single choke point between the model's tool calls and their side effects.
// Every call gets exactly one ToolResult back; nothing here throws.

import { errorMessage } from '../../utils/errors.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolContext, ToolDefinition } from '../tools/types.js';
import type { ToolCall, ToolResult } from './types.js';

/** A call that names no asset goes to the selected asset when exactly one is selected. */
export function withDefaultAsset(
  tool: ToolDefinition,
  args: ToolCall['arguments'],
  allowed: ReadonlySet<string> | undefined,
): ToolCall['arguments'] {
  if (typeof args === 'string' || !allowed || allowed.size !== 1) return args;
  if (!tool.parameters.some(param => param.name === 'asset_name')) return args;

  const named = args.asset_name;
  if (typeof named === 'string' && named.trim()) return args;

  const [only] = allowed;
  return { ...args, asset_name: only };
}

export class ToolDispatcher {
  constructor(
    private registry: ToolRegistry,
    private maxResultChars: number,
  ) {}

  async dispatch(call: ToolCall, context: ToolContext): Promise<ToolResult> {
    const startTime = Date.now();
    const tool = this.registry.get(call.name);

    if (!tool) {
      const available = this.registry.getAll().map(t => t.name).join(', ');
      return this.result(call, false, `Unknown tool "${call.name}". Available tools: ${available}`);
    }

    const validation = this.registry.validate(call.name, withDefaultAsset(tool, call.arguments, context.allowedAssetNames));
    if (!validation.ok) {
      context.logger.info({ tool: call.name, error: validation.error }, 'Rejected tool call arguments');
      return this.result(call, false, validation.error);
    }

    context.logger.info({ tool: call.name, args: validation.args }, 'Dispatching tool call');

    try {
      const outcome = await tool.execute(validation.args, context);
      context.logger.debug(
        { tool: call.name, success: outcome.success, durationMs: Date.now() - startTime },
        'Tool call finished',
      );
      return this.result(call, outcome.success, outcome.content, outcome.metadata?.assetName);
    } catch (error) {
      context.logger.error({ tool: call.name, err: error }, 'Tool threw');
      return this.result(call, false, `Tool ${call.name} failed: ${errorMessage(error)}`);
    }
  }

  /** Cut content for the model; the execution record keeps the full text. */
  truncate(content: string): string {
    if (this.maxResultChars <= 0 || content.length <= this.maxResultChars) {
      return content;
    }
    return (
      content.slice(0, this.maxResultChars) +
      `\n\n[Output truncated: showing the first ${this.maxResultChars} of ${content.length} characters. Decide the next step from what is shown.]`
    );
  }

  private result(call: ToolCall, success: boolean, content: string, assetName?: string): ToolResult {
    const result: ToolResult = {
      callId: call.id,
      toolName: call.name,
      content: this.truncate(content),
      success,
    };
    if (assetName) result.assetName = assetName;
    return result;
  }
}
