/**
 * Environment Configuration
 *
 * Validates and provides type-safe access to environment variables
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import { MAX_RETRIES, PIPER_VOICES_URL } from './constants';

// Load .env file
dotenv.config();

// 'false', '0' and 'no' switch a feature off; z.coerce.boolean() would read them as true
const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === '' ? fallback : !['false', '0', 'no', 'off'].includes(v.toLowerCase())));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // ===== Piper (local inference) =====
  PIPER_ENABLED: flag(true),
  PIPER_BIN: z.string().min(1).default('piper'),
  PIPER_VOICES_DIR: z.string().min(1).default('.cache/piper'),
  PIPER_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  // voices.json and the model files are fetched relative to this
  PIPER_VOICES_URL: z.string().url().default(PIPER_VOICES_URL),

  // ===== Cloud providers =====
  // Credentials are resolved by the SDKs themselves (AWS credential chain, OPENAI_API_KEY)
  POLLY_ENABLED: flag(true),
  OPENAI_TTS_ENABLED: flag(true),
  OPENAI_TTS_MODEL: z.string().min(1).default('tts-1'),

  // ===== Provider rate limits =====
  TTS_PIPER_CONCURRENCY: z.coerce.number().int().positive().default(1),
  TTS_PIPER_MIN_DELAY_MS: z.coerce.number().int().nonnegative().default(0),
  TTS_POLLY_CONCURRENCY: z.coerce.number().int().positive().default(4),
  TTS_POLLY_MIN_DELAY_MS: z.coerce.number().int().nonnegative().default(0),
  TTS_OPENAI_CONCURRENCY: z.coerce.number().int().positive().default(2),
  TTS_OPENAI_MIN_DELAY_MS: z.coerce.number().int().nonnegative().default(0),

  // ===== Build =====
  BUILD_CONCURRENCY: z.coerce.number().int().positive().default(4),
  BUILD_MAX_RETRIES: z.coerce.number().int().nonnegative().default(MAX_RETRIES),
  BUILD_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(500),

  // ===== Synthesis cache =====
  CACHE_ENABLED: flag(true),
  CACHE_DIR: z.string().min(1).default('.cache/voicepacks')
});

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Environment validation failed:');
  parsed.error.issues.forEach((issue) => {
    console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
  });
  process.exit(1);
}

export const env = parsed.data;

export type Env = typeof env;
