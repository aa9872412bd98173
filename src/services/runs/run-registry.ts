// Run tracking
// Live and recently finished runs by trace id, so clients can poll status or stop a run

import { AppError } from '../../utils/errors.js';
import { TTLCache } from '../../utils/ttl-cache.js';
import type { ExecutionRecord, RunEvent, RunOutcome, RunStatus } from '../orchestrator/types.js';

const RUNNING_TTL_MS = 24 * 60 * 60 * 1000;

export interface ModelReply {
  round: number;
  content: string;
}

export interface RunState {
  traceId: string;
  status: 'running' | RunStatus;
  instruction: string;
  assetNames?: string[];
  sessionId?: string;
  commands: ExecutionRecord[];
  /** Assistant text that came with tool calls, by round */
  modelReplies: ModelReply[];
  reply?: string;
  error?: string;
  rounds?: number;
  startedAt: string;
  finishedAt?: string;
}

export interface StartRunDetails {
  instruction: string;
  assetNames?: string[];
  sessionId?: string;
}

export class RunRegistry {
  private runs: TTLCache<string, RunState>;
  private controllers = new Map<string, AbortController>();

  constructor(private finishedTtlMs: number = 60 * 60 * 1000) {
    this.runs = new TTLCache<string, RunState>(finishedTtlMs);
  }

  /** Register a run and hand back the signal that stop() will fire. */
  start(traceId: string, details: StartRunDetails): AbortSignal {
    if (this.controllers.has(traceId)) {
      throw AppError.conflict(`Run ${traceId} is already in progress`);
    }

    const controller = new AbortController();
    this.controllers.set(traceId, controller);

    const state: RunState = {
      traceId,
      status: 'running',
      instruction: details.instruction,
      commands: [],
      modelReplies: [],
      startedAt: new Date().toISOString(),
    };
    if (details.assetNames) state.assetNames = details.assetNames;
    if (details.sessionId) state.sessionId = details.sessionId;

    this.runs.set(traceId, state, RUNNING_TTL_MS);
    return controller.signal;
  }

  /** Mirror a sink event into the run's state. */
  record(traceId: string, event: RunEvent): void {
    const state = this.runs.get(traceId);
    if (!state) return;
    if (event.type === 'model_reply') {
      state.modelReplies.push({ round: event.round, content: event.content });
    } else if (event.type === 'command_result') {
      state.commands.push({
        assetName: event.assetName,
        command: event.command,
        result: event.result,
        timestamp: new Date().toISOString(),
      });
    }
  }

  finish(traceId: string, outcome: RunOutcome, sessionId?: string): void {
    this.settle(traceId, state => {
      state.status = outcome.status;
      state.reply = outcome.reply;
      state.commands = outcome.commands;
      state.rounds = outcome.rounds;
      if (outcome.error) state.error = outcome.error;
      if (sessionId) state.sessionId = sessionId;
    });
  }

  fail(traceId: string, message: string): void {
    this.settle(traceId, state => {
      state.status = 'error';
      state.error = message;
    });
  }

  /** Abort a running run. Returns false when it is unknown or already done. */
  stop(traceId: string): boolean {
    const controller = this.controllers.get(traceId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  get(traceId: string): RunState | undefined {
    return this.runs.get(traceId);
  }

  isRunning(traceId: string): boolean {
    return this.controllers.has(traceId);
  }

  destroy(): void {
    for (const controller of this.controllers.values()) {
      controller.abort();
    }
    this.controllers.clear();
    this.runs.clear();
  }

  private settle(traceId: string, update: (state: RunState) => void): void {
    this.controllers.delete(traceId);
    const state = this.runs.get(traceId);
    if (!state) return;
    update(state);
    state.finishedAt = new Date().toISOString();
    this.runs.set(traceId, state, this.finishedTtlMs);
  }
}
