import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import {
  DEFAULT_HIGH_CONFIDENCE_THRESHOLD,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_SEGMENT_CLEANUP_MS,
  DEFAULT_SILENCE_GAP_MS,
  DEFAULT_TRANSLATION_TIMEOUT_MS,
} from '@parley/shared';
import { ConfigError } from '../errors.js';

export interface ParleyConfig {
  port: number;
  maxParticipants: number;
  buffer: {
    maxDelayMs: number;
    confidenceThreshold: number;
    cleanupDelayMs: number;
  };
  transcripts: {
    enableInterimResults: boolean;
    silenceGapMs: number;
  };
  translationTimeoutMs: number;
  geminiApiKey?: string;
  elevenLabsApiKey?: string;
}

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((val) => val === 'true' || val === '1');

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  MAX_PARTICIPANTS: z.coerce.number().int().min(2).default(8),

  // Buffer dispatch policy
  MAX_DELAY_MS: z.coerce.number().int().positive().default(DEFAULT_MAX_DELAY_MS),
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_HIGH_CONFIDENCE_THRESHOLD),
  SEGMENT_CLEANUP_MS: z.coerce.number().int().nonnegative().default(DEFAULT_SEGMENT_CLEANUP_MS),

  // Recognizer normalization
  ENABLE_INTERIM_RESULTS: booleanString.default('true'),
  SILENCE_GAP_MS: z.coerce.number().int().positive().default(DEFAULT_SILENCE_GAP_MS),

  TRANSLATION_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TRANSLATION_TIMEOUT_MS),

  // Providers (optional: services start disabled without them)
  GEMINI_API_KEY: z.string().min(1).optional(),
  ELEVENLABS_API_KEY: z.string().min(1).optional(),
});

// Empty strings from .env files mean "unset"
function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ParleyConfig {
  const parsed = configSchema.safeParse(withoutEmptyValues(env));

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${issues.join('; ')})`, issues);
  }

  const vars = parsed.data;

  if (vars.SEGMENT_CLEANUP_MS < vars.MAX_DELAY_MS) {
    console.warn(
      `[Config] SEGMENT_CLEANUP_MS (${vars.SEGMENT_CLEANUP_MS}) is shorter than MAX_DELAY_MS (${vars.MAX_DELAY_MS})`
    );
  }

  return {
    port: vars.PORT,
    maxParticipants: vars.MAX_PARTICIPANTS,
    buffer: {
      maxDelayMs: vars.MAX_DELAY_MS,
      confidenceThreshold: vars.CONFIDENCE_THRESHOLD,
      cleanupDelayMs: vars.SEGMENT_CLEANUP_MS,
    },
    transcripts: {
      enableInterimResults: vars.ENABLE_INTERIM_RESULTS,
      silenceGapMs: vars.SILENCE_GAP_MS,
    },
    translationTimeoutMs: vars.TRANSLATION_TIMEOUT_MS,
    geminiApiKey: vars.GEMINI_API_KEY,
    elevenLabsApiKey: vars.ELEVENLABS_API_KEY,
  };
}

export function loadEnvConfig(): ParleyConfig {
  dotenvConfig();
  return loadConfig(process.env);
}
