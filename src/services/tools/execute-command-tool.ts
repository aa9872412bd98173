// Run a shell command on one asset
// Every attempt that reaches a host produces a command_start/command_result pair and an execution record

import { TransportError, errorMessage } from '../../utils/errors.js';
import type { ToolDefinition, ToolExecutionResult } from './types.js';
import { resolveTarget, stringArg } from './target.js';

const description = `Run a shell command on a configured Linux asset over SSH and return its combined output. Use list_assets first if you do not know the asset names. Run one command per call; chain with && when steps depend on each other.`;

export const executeCommandTool: ToolDefinition = {
  name: 'execute_command',
  description,
  parameters: [
    {
      name: 'asset_name',
      type: 'string',
      description: 'Name of the asset to run the command on, exactly as returned by list_assets',
      required: true,
    },
    {
      name: 'command',
      type: 'string',
      description: 'Shell command to execute (e.g., "df -h", "systemctl status nginx")',
      required: true,
    },
  ],

  async execute(args, context): Promise<ToolExecutionResult> {
    const command = stringArg(args, 'command');
    const target = await resolveTarget(stringArg(args, 'asset_name'), context);
    if (!target.ok) {
      return { success: false, content: target.error };
    }

    const { asset } = target;
    const startTime = Date.now();
    context.observer.commandStarted(asset.name, command);

    let result: string;
    let success = true;
    try {
      const { output } = await context.executor.run(asset, command);
      result = output;
    } catch (error) {
      success = false;
      if (error instanceof TransportError) {
        context.logger.warn({ asset: asset.name, command, timedOut: error.timedOut, err: error.message }, 'Remote command failed');
        result = `SSH error: ${error.message}`;
      } else {
        context.logger.error({ asset: asset.name, command, err: error }, 'Remote command threw');
        result = `Execution failed: ${errorMessage(error)}`;
      }
    }

    context.observer.commandFinished({
      assetName: asset.name,
      command,
      result,
      timestamp: new Date().toISOString(),
    });

    return {
      success,
      content: result || '(no output)',
      metadata: { assetName: asset.name, durationMs: Date.now() - startTime },
    };
  },
};
