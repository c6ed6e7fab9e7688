import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config/env.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });
    expect(config).toMatchObject({
      OPENAI_EMBED_MODEL: 'text-embedding-3-small',
      OPENAI_CHAT_MODEL: 'gpt-4o-mini',
      GENERATION_TEMPERATURE: 0,
      COURSES_FILE: 'data/courses_data.json',
      INDEX_DIR: 'data/vectorstore',
      CHUNK_SIZE: 500,
      CHUNK_OVERLAP: 50,
      TOP_K: 3,
      DEDUPE_POLICY: 'keep-first',
      INVALID_RECORD_POLICY: 'fail',
      REBUILD_INTERVAL_MS: 0,
      PORT: 3000,
      NODE_ENV: 'development',
    });
    expect(config.EMBED_DIMENSIONS).toBeUndefined();
    expect(config.DATABASE_URL).toBeUndefined();
  });

  it('parses numeric settings from strings', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-secret',
      CHUNK_SIZE: '800',
      CHUNK_OVERLAP: '0',
      TOP_K: '5',
      EMBED_DIMENSIONS: '512',
      GENERATION_TEMPERATURE: '0.5',
      DATABASE_URL: '',
    });
    expect(config.CHUNK_SIZE).toBe(800);
    expect(config.CHUNK_OVERLAP).toBe(0);
    expect(config.TOP_K).toBe(5);
    expect(config.EMBED_DIMENSIONS).toBe(512);
    expect(config.GENERATION_TEMPERATURE).toBe(0.5);
    expect(config.DATABASE_URL).toBeUndefined();
  });

  it('requires an API key', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow('OPENAI_API_KEY: OPENAI_API_KEY is required');
  });

  it('rejects a chunk overlap that is not smaller than the chunk size', () => {
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-secret', CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(
      'CHUNK_OVERLAP (100) must be smaller than CHUNK_SIZE (100)',
    );
  });

  it('rejects non-numeric and out-of-range values', () => {
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-secret', TOP_K: 'many' })).toThrow(ConfigError);
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-secret', TOP_K: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-secret', DEDUPE_POLICY: 'newest' })).toThrow(ConfigError);
  });
});
