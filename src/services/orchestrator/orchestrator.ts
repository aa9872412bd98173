// Ops Orchestrator
// Drives the ask-model / dispatch-tools cycle for one instruction at a time.
// Each call to runStream owns its own conversation; the only shared state is
// the asset directory and the executor, which do their own locking.

import { randomUUID } from 'crypto';
import { AppError, ModelEndpointError, ToolConfigurationError, errorMessage } from '../../utils/errors.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import type { AssetDirectory } from '../assets/types.js';
import type { RemoteExecutor } from '../remote/ssh-executor.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { CommandObserver, ToolContext } from '../tools/types.js';
import { ToolDispatcher } from './dispatcher.js';
import type { ModelClient } from './model-client.js';
import { SYSTEM_PROMPT, buildAllowedAssetsConstraint } from './prompts.js';
import type {
  ExecutionRecord,
  ModelDecision,
  OrchestratorConfig,
  RunEvent,
  RunEventSink,
  RunOutcome,
  RunRequest,
  RunStatus,
  Turn,
} from './types.js';

export interface OrchestratorDependencies {
  config: OrchestratorConfig;
  modelClient: ModelClient;
  registry: ToolRegistry;
  assets: AssetDirectory;
  executor: RemoteExecutor;
  logger?: Logger;
}

function withCommandList(headline: string, commands: ExecutionRecord[]): string {
  const lines = [headline];
  for (const record of commands) {
    lines.push(`- [${record.assetName}] ${record.command}`);
  }
  return lines.join('\n');
}

export function stepLimitReply(maxRounds: number, commands: ExecutionRecord[]): string {
  return withCommandList(
    `Step limit reached (${maxRounds} rounds) before the task finished. Partial results are listed below.`,
    commands,
  );
}

export function cancelledReply(commands: ExecutionRecord[]): string {
  if (commands.length === 0) return 'Stopped at user request before any command ran.';
  return withCommandList('Stopped at user request. Commands that ran before the stop:', commands);
}

/** An empty or blank selection is the same as no selection. */
function selectedAssets(names: Iterable<string> | undefined): Set<string> | undefined {
  if (!names) return undefined;
  const selected = new Set(Array.from(names, name => name.trim()).filter(Boolean));
  return selected.size > 0 ? selected : undefined;
}

export class Orchestrator {
  private readonly config: OrchestratorConfig;
  private readonly modelClient: ModelClient;
  private readonly registry: ToolRegistry;
  private readonly assets: AssetDirectory;
  private readonly executor: RemoteExecutor;
  private readonly dispatcher: ToolDispatcher;
  private readonly logger: Logger;

  constructor(deps: OrchestratorDependencies) {
    if (!Number.isInteger(deps.config.maxRounds) || deps.config.maxRounds < 1) {
      throw new RangeError(`maxRounds must be a positive integer, got ${deps.config.maxRounds}`);
    }
    if (deps.registry.size === 0) {
      throw new ToolConfigurationError('The tool registry is empty');
    }

    this.config = deps.config;
    this.modelClient = deps.modelClient;
    this.registry = deps.registry;
    this.assets = deps.assets;
    this.executor = deps.executor;
    this.dispatcher = new ToolDispatcher(deps.registry, deps.config.toolResultMaxChars);
    this.logger = (deps.logger ?? rootLogger).child({ module: 'orchestrator' });
  }

  /**
   * Synchronous variant: the same loop, resolving with the outcome instead of
   * streaming it. Events still reach `onEvent` when given. Model endpoint
   * failures are thrown.
   */
  async run(request: RunRequest, onEvent?: RunEventSink): Promise<RunOutcome> {
    const recorded: { terminal?: RunEvent } = {};
    const outcome = await this.runStream(request, event => {
      if (event.type === 'reply' || event.type === 'error') recorded.terminal = event;
      onEvent?.(event);
    });

    if (outcome.status === 'error') {
      const terminal = recorded.terminal;
      const message = terminal?.type === 'error' ? terminal.message : outcome.error ?? 'Model endpoint error';
      throw new ModelEndpointError(message);
    }
    return outcome;
  }

  async runStream(request: RunRequest, sink: RunEventSink): Promise<RunOutcome> {
    const instruction = request.instruction.trim();
    if (!instruction) {
      throw AppError.badRequest('Instruction must not be empty');
    }

    const traceId = request.traceId ?? randomUUID();
    const log = this.logger.child({ traceId });
    const signal = request.signal;
    const allowed = selectedAssets(request.allowedAssetNames);

    const emit = this.guardSink(sink, signal, log);
    const conversation = this.seedConversation(instruction, request.history ?? [], allowed);
    const commands: ExecutionRecord[] = [];
    const declarations = this.registry.declare();
    const startTime = Date.now();
    let rounds = 0;

    const observer: CommandObserver = {
      commandStarted: (assetName, command) => {
        emit({ type: 'command_start', assetName, command });
      },
      commandFinished: record => {
        commands.push(record);
        emit({ type: 'command_result', assetName: record.assetName, command: record.command, result: record.result });
      },
    };

    const context: ToolContext = {
      assets: this.assets,
      executor: this.executor,
      allowedAssetNames: allowed,
      observer,
      logger: log,
      signal,
    };

    const finish = (status: RunStatus, reply: string, error?: string): RunOutcome => {
      log.info(
        { status, rounds, commands: commands.length, durationMs: Date.now() - startTime },
        'Run finished',
      );
      const outcome: RunOutcome = { status, reply, commands, rounds, conversation };
      if (error !== undefined) outcome.error = error;
      return outcome;
    };
    // The sink is closed once aborted; the caller decides how to deliver this reply
    const cancelled = () => finish('cancelled', cancelledReply(commands));

    log.info(
      { mode: this.modelClient.mode, maxRounds: this.config.maxRounds, allowedAssets: allowed ? Array.from(allowed) : undefined },
      'Run started',
    );

    while (rounds < this.config.maxRounds) {
      if (signal?.aborted) return cancelled();
      rounds++;

      let decision: ModelDecision;
      try {
        decision = await this.modelClient.ask(conversation, declarations, { signal });
      } catch (error) {
        if (signal?.aborted) return cancelled();
        const message = errorMessage(error);
        log.error({ round: rounds, err: message }, 'Model request failed');
        emit({ type: 'error', message });
        return finish('error', '', message);
      }
      if (signal?.aborted) return cancelled();

      if (decision.type === 'final') {
        log.info({ round: rounds, mode: this.modelClient.mode, replyLength: decision.text.length }, 'Model replied');
        conversation.push({ role: 'assistant', content: decision.text });
        emit({ type: 'reply', reply: decision.text });
        return finish('completed', decision.text);
      }

      log.info(
        { round: rounds, mode: this.modelClient.mode, calls: decision.calls.map(call => call.name) },
        'Model requested tools',
      );
      conversation.push({ role: 'assistant', content: decision.text, toolCalls: decision.calls });
      if (decision.text.trim()) {
        emit({ type: 'model_reply', round: rounds, content: decision.text });
      }

      for (const call of decision.calls) {
        if (signal?.aborted) {
          // Keep every call paired with a tool turn even when the run stops mid-round
          conversation.push({ role: 'tool', content: 'Cancelled before execution', toolCallId: call.id, toolName: call.name });
          continue;
        }
        const result = await this.dispatcher.dispatch(call, context);
        conversation.push({
          role: 'tool',
          content: result.content,
          toolCallId: call.id,
          toolName: call.name,
          ...(result.assetName ? { assetName: result.assetName } : {}),
        });
      }
    }

    if (signal?.aborted) return cancelled();

    log.warn({ maxRounds: this.config.maxRounds }, 'Step limit reached');
    const reply = stepLimitReply(this.config.maxRounds, commands);
    emit({ type: 'reply', reply });
    return finish('step_limit', reply);
  }

  private seedConversation(instruction: string, history: Turn[], allowed?: Set<string>): Turn[] {
    const conversation: Turn[] = [{ role: 'system', content: this.config.systemPrompt ?? SYSTEM_PROMPT }];
    if (allowed) {
      conversation.push({ role: 'system', content: buildAllowedAssetsConstraint(allowed) });
    }
    for (const turn of history) {
      if (turn.role !== 'system') conversation.push(turn);
    }
    conversation.push({ role: 'user', content: instruction });
    return conversation;
  }

  /** Nothing reaches the caller's sink after a terminal event or once the run is aborted. */
  private guardSink(sink: RunEventSink, signal: AbortSignal | undefined, log: Logger): RunEventSink {
    let closed = false;
    return event => {
      if (closed || signal?.aborted) return;
      if (event.type === 'reply' || event.type === 'error') closed = true;
      try {
        sink(event);
      } catch (error) {
        log.warn({ event: event.type, err: errorMessage(error) }, 'Event sink threw');
      }
    };
  }
}
