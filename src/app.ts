// HTTP application
// Routes receive their collaborators through plugin options, so tests can build an app around fakes

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { AppError, ErrorCode, ModelEndpointError, formatErrorResponse } from './utils/errors.js';
import { logger as rootLogger, type Logger } from './utils/logger.js';
import type { AssetDirectory } from './services/assets/types.js';
import type { AssetGroupStore } from './services/assets/asset-group-store.js';
import type { RemoteExecutor } from './services/remote/ssh-executor.js';
import type { Orchestrator } from './services/orchestrator/orchestrator.js';
import type { SessionStore } from './services/sessions/session-store.js';
import type { RunRegistry } from './services/runs/run-registry.js';
import { healthRoutes } from './routes/health.js';
import { assetRoutes } from './routes/assets.js';
import { assetGroupRoutes } from './routes/asset-groups.js';
import { runRoutes } from './routes/run.js';
import { sessionRoutes } from './routes/sessions.js';

export interface AppDependencies {
  assets: AssetDirectory;
  groups: AssetGroupStore;
  executor: RemoteExecutor;
  orchestrator: Orchestrator;
  sessions: SessionStore;
  runs: RunRegistry;
  modelConfigured?: boolean;
  corsOrigins?: string[];
  /** Take the client address from X-Forwarded-For */
  trustProxy?: boolean;
  /** Interval of SSE keep-alive comments on /run/stream */
  sseKeepAliveMs?: number;
  logger?: Logger;
  /** Include error details (zod issues) in error bodies */
  exposeErrorDetails?: boolean;
}

function hasClientStatus(error: Error): error is Error & { statusCode: number } {
  return (
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  );
}

function toAppError(error: Error): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof ZodError) {
    return AppError.validationError('Invalid request body', error.flatten());
  }
  if (error instanceof ModelEndpointError) {
    return AppError.badGateway(error.message);
  }
  if (hasClientStatus(error)) {
    // Fastify's own errors: malformed JSON, unsupported media type, body too large
    return new AppError(ErrorCode.BAD_REQUEST, error.message, error.statusCode);
  }
  return AppError.internal();
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = deps.logger ?? rootLogger;
  const server = Fastify({ loggerInstance, trustProxy: deps.trustProxy ?? false });

  await server.register(cors, {
    origin: deps.corsOrigins ?? true,
    credentials: true,
  });

  server.setErrorHandler((error: Error, request, reply) => {
    const appError = toAppError(error);
    if (appError.statusCode >= 500) {
      request.log.error({ err: error }, 'Request failed');
    }
    return reply.code(appError.statusCode).send(formatErrorResponse(appError, deps.exposeErrorDetails ?? true));
  });

  await server.register(healthRoutes, { prefix: '/v1', modelConfigured: deps.modelConfigured ?? true });
  await server.register(assetRoutes, {
    prefix: '/v1',
    assets: deps.assets,
    groups: deps.groups,
    executor: deps.executor,
  });
  await server.register(assetGroupRoutes, { prefix: '/v1', groups: deps.groups, assets: deps.assets });
  await server.register(runRoutes, {
    prefix: '/v1',
    orchestrator: deps.orchestrator,
    sessions: deps.sessions,
    runs: deps.runs,
    modelConfigured: deps.modelConfigured ?? true,
    keepAliveMs: deps.sseKeepAliveMs,
  });
  await server.register(sessionRoutes, { prefix: '/v1', sessions: deps.sessions });

  // Legacy redirect
  server.get('/health', async (request, reply) => {
    return reply.redirect('/v1/health', 301);
  });

  server.addHook('onClose', async () => {
    deps.runs.destroy();
  });

  return server;
}
