// Builds the HTTP app around in-process fakes

import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../app.js';
import { createDb, migrateDb } from '../../db/index.js';
import { AssetGroupStore } from '../../services/assets/asset-group-store.js';
import { InMemoryAssetDirectory } from '../../services/assets/in-memory-asset-directory.js';
import { Orchestrator } from '../../services/orchestrator/orchestrator.js';
import { RunRegistry } from '../../services/runs/run-registry.js';
import { SessionStore } from '../../services/sessions/session-store.js';
import { createOpsToolRegistry } from '../../services/tools/index.js';
import { FakeExecutor, ScriptedModelClient } from '../../services/orchestrator/__tests__/fakes.js';

export interface TestApp {
  app: FastifyInstance;
  modelClient: ScriptedModelClient;
  executor: FakeExecutor;
  assets: InMemoryAssetDirectory;
  groups: AssetGroupStore;
  sessions: SessionStore;
  runs: RunRegistry;
}

export interface TestAppOptions {
  executor?: FakeExecutor;
  modelConfigured?: boolean;
  sseKeepAliveMs?: number;
  trustProxy?: boolean;
}

export async function createTestApp(
  steps: ConstructorParameters<typeof ScriptedModelClient>[0] = [],
  options: TestAppOptions = {},
): Promise<TestApp> {
  const assets = new InMemoryAssetDirectory([
    { name: 'web-1', host: '10.0.0.11', username: 'deploy', password: 'test-secret', description: 'frontend' },
    { name: 'db-1', host: '10.0.0.12', username: 'root', privateKeyPath: '~/.ssh/id_test' },
  ]);
  const executor = options.executor ?? new FakeExecutor();
  const modelClient = new ScriptedModelClient(steps);
  const db = createDb(':memory:');
  migrateDb(db);
  const sessions = new SessionStore(db);
  const groups = new AssetGroupStore(db);
  const runs = new RunRegistry();

  const orchestrator = new Orchestrator({
    config: { maxRounds: 5, toolResultMaxChars: 4000 },
    modelClient,
    registry: createOpsToolRegistry({ uploadEnabled: false, uploadDir: './uploads' }),
    assets,
    executor,
  });

  const app = await buildApp({
    assets,
    groups,
    executor,
    orchestrator,
    sessions,
    runs,
    modelConfigured: options.modelConfigured ?? true,
    sseKeepAliveMs: options.sseKeepAliveMs,
    trustProxy: options.trustProxy,
  });
  await app.ready();

  return { app, modelClient, executor, assets, groups, sessions, runs };
}

export interface SseEvent {
  event: string;
  data: Record<string, unknown>;
}

/** Event frames in order; comment frames (keep-alives) are skipped. */
export function parseSse(body: string): SseEvent[] {
  return body
    .split('\n\n')
    .filter(block => block.trim() !== '' && !block.trim().startsWith(':'))
    .map(block => {
      let event = 'message';
      let data: Record<string, unknown> = {};
      for (const line of block.split('\n')) {
        if (line.startsWith('event: ')) event = line.slice('event: '.length);
        if (line.startsWith('data: ')) data = JSON.parse(line.slice('data: '.length));
      }
      return { event, data };
    });
}
