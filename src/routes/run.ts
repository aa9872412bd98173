/**
 * Run routes
 * Turn one instruction into a model-driven sequence of remote commands,
 * either as a single request/response or as a server-sent event stream.
 */

import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { env } from '../env.js';
import { AppError, ModelEndpointError, errorMessage } from '../utils/errors.js';
import type { Orchestrator } from '../services/orchestrator/orchestrator.js';
import type { RunEvent, RunOutcome, RunRequest } from '../services/orchestrator/types.js';
import type { RunRegistry } from '../services/runs/run-registry.js';
import { historyFromSession, toStoredCommands, type SessionStore } from '../services/sessions/session-store.js';
import { enforceRateLimitIfEnabled, requireAuthIfEnabled } from '../security/route-guards.js';

export interface RunRoutesOptions {
  orchestrator: Orchestrator;
  sessions: SessionStore;
  runs: RunRegistry;
  modelConfigured: boolean;
  /** Interval of SSE comment frames while a stream is otherwise quiet */
  keepAliveMs?: number;
}

const RunRequestSchema = z.object({
  instruction: z.string().trim().min(1).max(20000),
  asset_names: z.array(z.string().trim().min(1)).optional(),
  session_id: z.string().trim().min(1).max(128).optional(),
});

const StopRunSchema = z.object({
  trace_id: z.string().min(1),
});

type RunBody = z.infer<typeof RunRequestSchema>;

type WireData = Record<string, string | number>;

function toWireEvent(event: RunEvent): WireData {
  switch (event.type) {
    case 'model_reply':
      return { round: event.round, content: event.content };
    case 'command_start':
      return { asset_name: event.assetName, command: event.command };
    case 'command_result':
      return { asset_name: event.assetName, command: event.command, result: event.result };
    case 'reply':
      return { reply: event.reply };
    case 'error':
      return { message: event.message };
  }
}

// A stopped run is saved with its stop notice; a failed one is not saved
function shouldPersist(outcome: RunOutcome): boolean {
  return outcome.status !== 'error';
}

export const runRoutes: FastifyPluginAsync<RunRoutesOptions> = async (server, opts) => {
  const { orchestrator, sessions, runs } = opts;
  const keepAliveMs = opts.keepAliveMs ?? env.SSE_KEEP_ALIVE_MS;

  async function prepareRun(body: RunBody, traceId: string, signal: AbortSignal): Promise<RunRequest> {
    const session = body.session_id ? await sessions.get(body.session_id) : undefined;
    return {
      instruction: body.instruction,
      history: session ? historyFromSession(session.messages) : [],
      allowedAssetNames: body.asset_names,
      traceId,
      signal,
    };
  }

  function admitRun(request: FastifyRequest, reply: FastifyReply): boolean {
    if (!requireAuthIfEnabled(request, reply)) {
      return false;
    }
    return enforceRateLimitIfEnabled(request, reply, {
      routeKey: 'run',
      maxRequests: env.RATE_LIMIT_RUN_PER_WINDOW,
    });
  }

  function requireModel(): void {
    if (!opts.modelConfigured) {
      throw AppError.unavailable('No model endpoint is configured. Set MODEL_API_KEY or MODEL_BASE_URL.');
    }
  }

  // POST /v1/run - Run an instruction and wait for the reply
  server.post('/run', async (request, reply) => {
    if (!admitRun(request, reply)) {
      return;
    }
    requireModel();

    const body = RunRequestSchema.parse(request.body);
    const traceId = randomUUID();
    const sessionId = body.session_id ?? randomUUID();
    const signal = runs.start(traceId, { instruction: body.instruction, assetNames: body.asset_names, sessionId });

    let outcome: RunOutcome;
    try {
      outcome = await orchestrator.run(await prepareRun(body, traceId, signal), event => {
        runs.record(traceId, event);
      });
    } catch (error) {
      runs.fail(traceId, errorMessage(error));
      if (error instanceof ModelEndpointError) {
        throw AppError.badGateway(error.message);
      }
      throw error;
    }

    if (shouldPersist(outcome)) {
      await sessions.appendExchange(sessionId, body.instruction, outcome.reply, outcome.commands);
    }
    runs.finish(traceId, outcome, sessionId);

    return {
      trace_id: traceId,
      session_id: sessionId,
      status: outcome.status,
      reply: outcome.reply,
      commands: toStoredCommands(outcome.commands),
    };
  });

  // POST /v1/run/stream - Same run, streamed as server-sent events
  server.post('/run/stream', async (request, reply) => {
    if (!admitRun(request, reply)) {
      return;
    }
    requireModel();

    const body = RunRequestSchema.parse(request.body);
    const traceId = randomUUID();
    const sessionId = body.session_id ?? randomUUID();
    const signal = runs.start(traceId, { instruction: body.instruction, assetNames: body.asset_names, sessionId });

    reply.hijack();
    const raw = reply.raw;
    raw.writeHead(200, {
      ...reply.getHeaders(),
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      'Connection': 'keep-alive',
      'X-Accel-Buffering': 'no',
    });

    const sendEvent = (type: string, data: WireData) => {
      if (raw.writableEnded || raw.destroyed) return;
      try {
        raw.write(`event: ${type}\n`);
        raw.write(`data: ${JSON.stringify(data)}\n\n`);
      } catch (e) {
        request.log.error({ err: e, type, traceId }, 'Failed to send SSE event');
      }
    };

    // A client that goes away mid-run cancels it
    const onClose = () => {
      if (!raw.writableEnded) {
        runs.stop(traceId);
      }
    };
    raw.on('close', onClose);

    const keepAlive = setInterval(() => {
      if (!raw.writableEnded && !raw.destroyed) raw.write(': keep-alive\n\n');
    }, keepAliveMs);

    sendEvent('start', { trace_id: traceId, session_id: sessionId });

    try {
      const outcome = await orchestrator.runStream(await prepareRun(body, traceId, signal), event => {
        runs.record(traceId, event);
        sendEvent(event.type, toWireEvent(event));
      });

      // The loop goes quiet once stopped; a client still listening gets the stop notice as its reply
      if (outcome.status === 'cancelled') {
        sendEvent('reply', { reply: outcome.reply });
      }
      if (shouldPersist(outcome)) {
        await sessions.appendExchange(sessionId, body.instruction, outcome.reply, outcome.commands);
      }
      runs.finish(traceId, outcome, sessionId);
    } catch (error) {
      const message = errorMessage(error);
      request.log.error({ err: error, traceId }, 'Streaming run failed');
      runs.fail(traceId, message);
      sendEvent('error', { message });
    } finally {
      clearInterval(keepAlive);
      raw.off('close', onClose);
      if (!raw.writableEnded) {
        raw.end();
      }
    }
  });

  // POST /v1/run/stop - Cancel a running instruction
  server.post('/run/stop', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return;
    }

    const { trace_id: traceId } = StopRunSchema.parse(request.body);
    if (runs.stop(traceId)) {
      return { ok: true, trace_id: traceId };
    }

    const state = runs.get(traceId);
    if (!state) {
      throw AppError.notFound(`Run ${traceId} not found`);
    }
    throw AppError.conflict(`Run ${traceId} is not in progress`, { status: state.status });
  });

  // GET /v1/run/status/:traceId
  server.get<{ Params: { traceId: string } }>('/run/status/:traceId', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return;
    }

    const state = runs.get(request.params.traceId);
    if (!state) {
      throw AppError.notFound(`Run ${request.params.traceId} not found`);
    }

    return {
      trace_id: state.traceId,
      status: state.status,
      instruction: state.instruction,
      asset_names: state.assetNames ?? null,
      session_id: state.sessionId ?? null,
      commands: toStoredCommands(state.commands),
      model_replies: state.modelReplies,
      reply: state.reply ?? null,
      error: state.error ?? null,
      rounds: state.rounds ?? null,
      started_at: state.startedAt,
      finished_at: state.finishedAt ?? null,
    };
  });
};
