/**
 * src/config/env.ts
 * What: Environment configuration loader/validator.
 * How: Validates an environment map (process.env by default) with zod and returns a typed AppConfig.
 *      Entrypoints load .env via `dotenv/config` before calling loadConfig, and pass the resulting
 *      object down explicitly; nothing here is cached at module level.
 *      Cross-field rules (chunk overlap must be smaller than chunk size) are checked after parsing.
 */

import { z } from 'zod';
import { ConfigError } from '../errors.js';

const intWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number().int().positive().default(def),
  );

const nonNegativeIntWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number().int().nonnegative().default(def),
  );

const optionalPositiveInt = z.preprocess(
  (v: unknown) => (typeof v === 'string' ? (v.trim() === '' ? undefined : Number(v)) : v),
  z.number().int().positive().optional(),
);

const emptyToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const schema = z.object({
  OPENAI_API_KEY: z.string({ required_error: 'OPENAI_API_KEY is required' }).min(1, 'OPENAI_API_KEY is required'),
  OPENAI_EMBED_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBED_DIMENSIONS: optionalPositiveInt,
  OPENAI_CHAT_MODEL: z.string().min(1).default('gpt-4o-mini'),
  GENERATION_TEMPERATURE: z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number().min(0).max(2).default(0),
  ),
  OPENAI_TIMEOUT_MS: intWithDefault(30_000),
  COURSES_FILE: z.string().min(1).default('data/courses_data.json'),
  INDEX_DIR: z.string().min(1).default('data/vectorstore'),
  CHUNK_SIZE: intWithDefault(500),
  CHUNK_OVERLAP: nonNegativeIntWithDefault(50),
  TOP_K: intWithDefault(3),
  EMBED_BATCH_SIZE: intWithDefault(64),
  EMBED_CONCURRENCY: intWithDefault(2),
  DEDUPE_POLICY: z.enum(['keep-first', 'keep-last']).default('keep-first'),
  INVALID_RECORD_POLICY: z.enum(['fail', 'skip']).default('fail'),
  REBUILD_INTERVAL_MS: nonNegativeIntWithDefault(0),
  DATABASE_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  PORT: intWithDefault(3000),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  ),
  NODE_ENV: z.enum(['production', 'development', 'test']).optional().default('development'),
});

export type DedupePolicy = 'keep-first' | 'keep-last';
export type InvalidRecordPolicy = 'fail' | 'skip';

export interface AppConfig {
  OPENAI_API_KEY: string;
  OPENAI_EMBED_MODEL: string;
  EMBED_DIMENSIONS?: number;
  OPENAI_CHAT_MODEL: string;
  GENERATION_TEMPERATURE: number;
  OPENAI_TIMEOUT_MS: number;
  COURSES_FILE: string;
  INDEX_DIR: string;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  TOP_K: number;
  EMBED_BATCH_SIZE: number;
  EMBED_CONCURRENCY: number;
  DEDUPE_POLICY: DedupePolicy;
  INVALID_RECORD_POLICY: InvalidRecordPolicy;
  REBUILD_INTERVAL_MS: number;
  DATABASE_URL?: string;
  PORT: number;
  LOG_LEVEL?: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  NODE_ENV: 'production' | 'development' | 'test';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ConfigError(`Invalid environment configuration: ${issues}`, parsed.error.issues);
  }

  const config: AppConfig = parsed.data;
  if (config.CHUNK_OVERLAP >= config.CHUNK_SIZE) {
    throw new ConfigError(
      `Invalid environment configuration: CHUNK_OVERLAP (${config.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${config.CHUNK_SIZE})`,
    );
  }
  return config;
}
