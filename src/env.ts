// Environment configuration for the ops agent API
// Load model endpoint, SSH and server settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

export const DEFAULT_MODEL_BASE_URL = 'https://api.deepseek.com';

export type ToolCallMode = 'native' | 'self_parsed' | 'auto';

const TOOL_CALL_MODES: readonly ToolCallMode[] = ['native', 'self_parsed', 'auto'];

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseOptionalNumber(value: string | undefined, name: string): number | undefined {
  if (!value || !value.trim()) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", ignoring`);
    return undefined;
  }
  return parsed;
}

export function parseToolCallMode(value: string | undefined): ToolCallMode {
  const normalized = strEnv(value, 'native').toLowerCase();
  const mode = TOOL_CALL_MODES.find(m => m === normalized);
  if (!mode) {
    console.error(`Invalid TOOL_CALL_MODE "${value}", using default native`);
    return 'native';
  }
  return mode;
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8000),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  DATABASE_URL: process.env.DATABASE_URL || 'file:./data/ops.db',
  CORS_ORIGINS: strEnv(process.env.CORS_ORIGINS, 'http://localhost:8080,http://127.0.0.1:8080,http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(origin => origin.trim())
    .filter(Boolean),

  // Model endpoint (any OpenAI-compatible chat completions API)
  MODEL_BASE_URL: strEnv(process.env.MODEL_BASE_URL, DEFAULT_MODEL_BASE_URL),
  MODEL_API_KEY: strEnv(process.env.MODEL_API_KEY || process.env.DEEPSEEK_API_KEY),
  MODEL_NAME: strEnv(process.env.MODEL_NAME, 'deepseek-chat'),
  MODEL_TIMEOUT_MS: parsePositiveInt(process.env.MODEL_TIMEOUT_MS, 120000, 'MODEL_TIMEOUT_MS'),
  MODEL_MAX_TOKENS: parseOptionalNumber(process.env.MODEL_MAX_TOKENS, 'MODEL_MAX_TOKENS'),
  MODEL_TEMPERATURE: parseOptionalNumber(process.env.MODEL_TEMPERATURE, 'MODEL_TEMPERATURE'),
  TOOL_CALL_MODE: parseToolCallMode(process.env.TOOL_CALL_MODE),

  // Orchestration
  MAX_ROUNDS: parsePositiveInt(process.env.MAX_ROUNDS, 30, 'MAX_ROUNDS'),
  TOOL_RESULT_MAX_CHARS: parsePositiveInt(process.env.TOOL_RESULT_MAX_CHARS, 12000, 'TOOL_RESULT_MAX_CHARS'),

  // Remote execution
  SSH_CONNECT_TIMEOUT_SECONDS: parsePositiveInt(
    process.env.SSH_CONNECT_TIMEOUT_SECONDS,
    10,
    'SSH_CONNECT_TIMEOUT_SECONDS',
  ),
  COMMAND_TIMEOUT_MS: parsePositiveInt(process.env.COMMAND_TIMEOUT_MS, 60000, 'COMMAND_TIMEOUT_MS'),
  LONG_COMMAND_TIMEOUT_MS: parsePositiveInt(process.env.LONG_COMMAND_TIMEOUT_MS, 120000, 'LONG_COMMAND_TIMEOUT_MS'),
  UPLOAD_TOOL_ENABLED: process.env.UPLOAD_TOOL_ENABLED === 'true', // Default false
  UPLOAD_DIR: strEnv(process.env.UPLOAD_DIR, './data/uploads'),
  ASSETS_FILE: strEnv(process.env.ASSETS_FILE),

  // Streaming
  SSE_KEEP_ALIVE_MS: parsePositiveInt(process.env.SSE_KEEP_ALIVE_MS, 15000, 'SSE_KEEP_ALIVE_MS'),

  // Protection
  TRUST_PROXY: process.env.TRUST_PROXY === 'true',
  AUTH_ENFORCEMENT_ENABLED: process.env.AUTH_ENFORCEMENT_ENABLED === 'true',
  API_TOKEN: strEnv(process.env.API_TOKEN),
  RATE_LIMITING_ENABLED: process.env.RATE_LIMITING_ENABLED === 'true',
  RATE_LIMIT_WINDOW_MS: parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 60000, 'RATE_LIMIT_WINDOW_MS'),
  RATE_LIMIT_RUN_PER_WINDOW: parsePositiveInt(process.env.RATE_LIMIT_RUN_PER_WINDOW, 8, 'RATE_LIMIT_RUN_PER_WINDOW'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export type Env = typeof env;

/**
 * OpenAI-compatible clients expect the base URL to include the API version
 * segment. A bare host (or root path) gets `/v1`; deeper paths are left alone.
 */
export function normalizeBaseUrl(raw: string): string {
  let baseUrl = raw.trim();
  if (!baseUrl) return `${DEFAULT_MODEL_BASE_URL}/v1`;

  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(baseUrl)) {
    baseUrl = `http://${baseUrl}`;
  }

  const url = new URL(baseUrl);
  const trimmed = baseUrl.replace(/\/+$/, '');
  const path = url.pathname.replace(/\/+$/, '');
  if (path === '') return `${trimmed}/v1`;
  return trimmed;
}

export function isModelConfigured(source: Pick<Env, 'MODEL_API_KEY' | 'MODEL_BASE_URL'> = env): boolean {
  if (source.MODEL_API_KEY) return true;
  const base = source.MODEL_BASE_URL.replace(/\/+$/, '');
  return base !== '' && base !== DEFAULT_MODEL_BASE_URL;
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  console.log('Ops agent configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Model endpoint: ${normalizeBaseUrl(env.MODEL_BASE_URL)}`);
  console.log(`  Model: ${env.MODEL_NAME} (tool call mode: ${env.TOOL_CALL_MODE})`);
  console.log(`  Model API key: ${env.MODEL_API_KEY ? 'set' : 'not set'}`);
  console.log(`  Max rounds per instruction: ${env.MAX_ROUNDS}`);
  console.log(`  Upload tool enabled: ${env.UPLOAD_TOOL_ENABLED}`);
  console.log(`  Auth enforcement enabled: ${env.AUTH_ENFORCEMENT_ENABLED}`);
  console.log(`  Rate limiting enabled: ${env.RATE_LIMITING_ENABLED}`);
  if (env.RATE_LIMITING_ENABLED) {
    console.log(`  Rate limit window ms: ${env.RATE_LIMIT_WINDOW_MS}`);
    console.log(`  /run max per window: ${env.RATE_LIMIT_RUN_PER_WINDOW}`);
  }
  if (!isModelConfigured()) {
    console.log('  ⚠️  No model API key set for the hosted endpoint - runs will be rejected');
  }
}
