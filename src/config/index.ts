// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config, Cache & Context Tuning
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envBool(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function envNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function envFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function envString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function envOptional(key: string): string | undefined {
  const value = process.env[key];
  return value && value.trim().length > 0 ? value : undefined;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

export type Environment = 'development' | 'staging' | 'production' | 'test';

export interface EnvironmentConfig {
  environment: Environment;
  isProduction: boolean;
  isStaging: boolean;
  isDevelopment: boolean;
  isTest: boolean;
}

function parseEnvironment(value: string): Environment {
  switch (value) {
    case 'production':
    case 'staging':
    case 'test':
      return value;
    default:
      return 'development';
  }
}

export function loadEnvironmentConfig(): EnvironmentConfig {
  const env = parseEnvironment(envString('NODE_ENV', 'development'));

  return {
    environment: env,
    isProduction: env === 'production',
    isStaging: env === 'staging',
    isDevelopment: env === 'development',
    isTest: env === 'test',
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGING
// ─────────────────────────────────────────────────────────────────────────────────

export interface LoggingConfig {
  debugMode: boolean;
  redactPII: boolean;
}

export function loadLoggingConfig(): LoggingConfig {
  return {
    debugMode: envBool('DEBUG', false),
    redactPII: envBool('REDACT_PII', true),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// HISTORY CACHE
// ─────────────────────────────────────────────────────────────────────────────────

export interface CacheConfig {
  // Maximum age of a cached history window
  historyTtlMs: number;
}

export function loadCacheConfig(): CacheConfig {
  return {
    historyTtlMs: envNumber('HISTORY_CACHE_TTL_MS', 5 * 60 * 1000),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONTEXT ASSEMBLY
// ─────────────────────────────────────────────────────────────────────────────────

export interface ContextConfig {
  historyLimit: number;
  insightLimit: number;
}

export function loadContextConfig(): ContextConfig {
  return {
    historyLimit: envNumber('CONTEXT_HISTORY_LIMIT', 10),
    insightLimit: envNumber('CONTEXT_INSIGHT_LIMIT', 5),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// INSIGHT DEDUP
// ─────────────────────────────────────────────────────────────────────────────────

export interface InsightConfig {
  dedupWindowSize: number;
  dedupWindowMs: number;
}

export function loadInsightConfig(): InsightConfig {
  return {
    dedupWindowSize: envNumber('INSIGHT_DEDUP_WINDOW_SIZE', 10),
    dedupWindowMs: envNumber('INSIGHT_DEDUP_WINDOW_MS', 24 * 60 * 60 * 1000),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// MODEL
// ─────────────────────────────────────────────────────────────────────────────────

export interface ModelConfig {
  apiKey: string | undefined;
  baseURL: string | undefined;
  chatModel: string;
  personaModel: string;
  temperature: number;
  maxTokens: number;
  requestTimeoutMs: number;
  useMockProvider: boolean;
  // LLM-assisted persona generation; rule-based when off
  llmPersona: boolean;
}

export function loadModelConfig(): ModelConfig {
  const apiKey = envOptional('OPENAI_API_KEY');

  return {
    apiKey,
    baseURL: envOptional('OPENAI_BASE_URL'),
    chatModel: envString('CHAT_MODEL', 'gpt-4o-mini'),
    personaModel: envString('PERSONA_MODEL', 'gpt-4o-mini'),
    temperature: envFloat('MODEL_TEMPERATURE', 0.7),
    maxTokens: envNumber('MODEL_MAX_TOKENS', 400),
    requestTimeoutMs: envNumber('MODEL_TIMEOUT_MS', 30000),
    useMockProvider: envBool('USE_MOCK_PROVIDER', false),
    llmPersona: envBool('LLM_PERSONA', false),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// STORAGE
// ─────────────────────────────────────────────────────────────────────────────────

export interface StorageConfig {
  redisUrl: string | undefined;
  keyPrefix: string;
  commandTimeoutMs: number;
  connectTimeoutMs: number;
}

export function loadStorageConfig(): StorageConfig {
  return {
    redisUrl: envOptional('REDIS_URL'),
    keyPrefix: envString('REDIS_KEY_PREFIX', 'wellness:'),
    commandTimeoutMs: envNumber('REDIS_COMMAND_TIMEOUT_MS', 2000),
    connectTimeoutMs: envNumber('REDIS_CONNECT_TIMEOUT_MS', 5000),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SERVER
// ─────────────────────────────────────────────────────────────────────────────────

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigin: string;
}

export function loadServerConfig(): ServerConfig {
  return {
    port: envNumber('PORT', 5001),
    host: envString('HOST', '0.0.0.0'),
    corsOrigin: envString('CORS_ORIGIN', '*'),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface AppConfig {
  env: EnvironmentConfig;
  logging: LoggingConfig;
  cache: CacheConfig;
  context: ContextConfig;
  insights: InsightConfig;
  model: ModelConfig;
  storage: StorageConfig;
  server: ServerConfig;
}

let cachedConfig: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    env: loadEnvironmentConfig(),
    logging: loadLoggingConfig(),
    cache: loadCacheConfig(),
    context: loadContextConfig(),
    insights: loadInsightConfig(),
    model: loadModelConfig(),
    storage: loadStorageConfig(),
    server: loadServerConfig(),
  };

  return cachedConfig;
}

export function reloadConfig(): AppConfig {
  cachedConfig = null;
  return loadConfig();
}
