// Ops Agent API
// Port: 8000 (localhost only by default)

// Load environment variables from .env file
import 'dotenv/config';

import { env, isModelConfigured, logConfiguration } from './env.js';
import { buildApp } from './app.js';
import { createDb, migrateDb } from './db/index.js';
import { logger } from './utils/logger.js';
import { AssetGroupStore, SqliteAssetDirectory, seedAssetsFromFile } from './services/assets/index.js';
import { SshExecutor } from './services/remote/ssh-executor.js';
import { createOpsToolRegistry } from './services/tools/index.js';
import { buildProviderConfig, createProvider } from './providers/index.js';
import {
  Orchestrator,
  buildModelSettings,
  buildOrchestratorConfig,
  createModelClient,
} from './services/orchestrator/index.js';
import { SessionStore } from './services/sessions/session-store.js';
import { RunRegistry } from './services/runs/run-registry.js';

const PORT = env.PORT;
const HOST = env.HOST;

const db = createDb(env.DATABASE_URL);
migrateDb(db);

const assets = new SqliteAssetDirectory(db);
if (env.ASSETS_FILE) {
  const count = await seedAssetsFromFile(assets, env.ASSETS_FILE);
  logger.info({ count, file: env.ASSETS_FILE }, 'Seeded assets');
}

const executor = new SshExecutor({
  connectTimeoutSeconds: env.SSH_CONNECT_TIMEOUT_SECONDS,
  commandTimeoutMs: env.COMMAND_TIMEOUT_MS,
  longCommandTimeoutMs: env.LONG_COMMAND_TIMEOUT_MS,
  logger,
});

// Initialize tools
const registry = createOpsToolRegistry({
  uploadEnabled: env.UPLOAD_TOOL_ENABLED,
  uploadDir: env.UPLOAD_DIR,
});
logger.info({ tools: registry.getAll().map(t => t.name) }, 'Tool registry ready');

const provider = createProvider(buildProviderConfig());
const modelClient = createModelClient(env.TOOL_CALL_MODE, provider, buildModelSettings(), logger);

const orchestrator = new Orchestrator({
  config: buildOrchestratorConfig(),
  modelClient,
  registry,
  assets,
  executor,
  logger,
});

const server = await buildApp({
  assets,
  groups: new AssetGroupStore(db),
  executor,
  orchestrator,
  sessions: new SessionStore(db),
  runs: new RunRegistry(),
  modelConfigured: isModelConfigured(),
  corsOrigins: env.CORS_ORIGINS,
  trustProxy: env.TRUST_PROXY,
  sseKeepAliveMs: env.SSE_KEEP_ALIVE_MS,
  logger,
  exposeErrorDetails: env.NODE_ENV !== 'production',
});

// Start server
try {
  await server.listen({ port: PORT, host: HOST });
  console.log(`🛠️  Ops Agent API listening on http://${HOST}:${PORT}`);
  console.log(`📊 Health: http://${HOST}:${PORT}/v1/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
