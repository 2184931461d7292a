// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TESTS — Environment Parsing and Defaults
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  loadCacheConfig,
  loadContextConfig,
  loadEnvironmentConfig,
  loadInsightConfig,
  loadModelConfig,
  loadStorageConfig,
  reloadConfig,
} from '../index.js';

const TOUCHED = [
  'NODE_ENV',
  'HISTORY_CACHE_TTL_MS',
  'CONTEXT_HISTORY_LIMIT',
  'CONTEXT_INSIGHT_LIMIT',
  'OPENAI_API_KEY',
  'USE_MOCK_PROVIDER',
  'MODEL_TEMPERATURE',
  'REDIS_URL',
  'INSIGHT_DEDUP_WINDOW_SIZE',
];

describe('config', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of TOUCHED) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of TOUCHED) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    reloadConfig();
  });

  it('should use the documented defaults', () => {
    expect(loadCacheConfig().historyTtlMs).toBe(300_000);
    expect(loadContextConfig()).toEqual({ historyLimit: 10, insightLimit: 5 });
    expect(loadInsightConfig()).toEqual({ dedupWindowSize: 10, dedupWindowMs: 86_400_000 });
    expect(loadStorageConfig().redisUrl).toBeUndefined();
    expect(loadStorageConfig().keyPrefix).toBe('wellness:');
  });

  it('should read overrides from the environment', () => {
    process.env.HISTORY_CACHE_TTL_MS = '1000';
    process.env.CONTEXT_HISTORY_LIMIT = '20';
    process.env.INSIGHT_DEDUP_WINDOW_SIZE = '3';
    process.env.REDIS_URL = 'redis://localhost:6379';

    expect(loadCacheConfig().historyTtlMs).toBe(1000);
    expect(loadContextConfig().historyLimit).toBe(20);
    expect(loadInsightConfig().dedupWindowSize).toBe(3);
    expect(loadStorageConfig().redisUrl).toBe('redis://localhost:6379');
  });

  it('should ignore malformed numbers', () => {
    process.env.HISTORY_CACHE_TTL_MS = 'soon';
    process.env.MODEL_TEMPERATURE = 'warm';

    expect(loadCacheConfig().historyTtlMs).toBe(300_000);
    expect(loadModelConfig().temperature).toBe(0.7);
  });

  it('should use the mock provider only when asked for', () => {
    expect(loadModelConfig()).toMatchObject({ apiKey: undefined, useMockProvider: false });

    process.env.OPENAI_API_KEY = 'test-secret';
    expect(loadModelConfig()).toMatchObject({ apiKey: 'test-secret', useMockProvider: false });

    process.env.USE_MOCK_PROVIDER = 'true';
    expect(loadModelConfig().useMockProvider).toBe(true);
  });

  it('should treat unknown environments as development', () => {
    process.env.NODE_ENV = 'qa';
    expect(loadEnvironmentConfig()).toMatchObject({ environment: 'development', isDevelopment: true });

    process.env.NODE_ENV = 'production';
    expect(loadEnvironmentConfig().isProduction).toBe(true);
  });

  it('should rebuild the cached config on reload', () => {
    process.env.CONTEXT_INSIGHT_LIMIT = '7';

    expect(reloadConfig().context.insightLimit).toBe(7);
  });
});
