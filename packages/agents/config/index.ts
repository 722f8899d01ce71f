// Environment configuration
// Entry points load .env via dotenv; this module only reads what it is given

import { z } from 'zod';
import { NEWS_API_BASE, FMP_BASE } from 'newsdesk-market-data';
import { VOICES, type Voice } from '../types/briefing.js';
import type { LogLevel } from '../utils/logger.js';

export { STAGE_POLICIES, resolvePolicy } from './stages.js';
export type { BriefingStageName, StagePolicy, StagePolicyOverrides } from './stages.js';

export class ConfigError extends Error {
  constructor(message: string, public readonly keys: string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

const optionalString = z.string().trim().optional().transform(v => (v ? v : undefined));

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalString,
  NEWSDESK_MODEL: z.string().min(1).default('claude-3-5-haiku-latest'),
  NEWSDESK_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.3),
  NEWS_API_KEY: optionalString,
  NEWS_API_BASE_URL: z.string().url().default(NEWS_API_BASE),
  FMP_API_KEY: optionalString,
  FMP_BASE_URL: z.string().url().default(FMP_BASE),
  FMP_RATE_LIMIT: z.coerce.number().int().positive().default(300),
  OPENAI_API_KEY: optionalString,
  NEWSDESK_VOICE: z.enum(VOICES).default('alloy'),
  NEWSDESK_OUTPUT_DIR: z.string().min(1).default('output'),
  NEWSDESK_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  NEWSDESK_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(500),
});

export interface NewsdeskConfig {
  readonly anthropicApiKey?: string;
  readonly model: string;
  readonly temperature: number;
  readonly newsApiKey?: string;
  readonly newsApiBaseUrl: string;
  readonly fmpApiKey?: string;
  readonly fmpBaseUrl: string;
  readonly fmpRateLimit: number;
  readonly openaiApiKey?: string;
  readonly voice: Voice;
  readonly outputDir: string;
  readonly logLevel: LogLevel;
  readonly retryBaseMs: number;
}

/** Empty strings count as unset */
function stripEmpty(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== '') out[k] = v;
  }
  return out;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): NewsdeskConfig {
  const parsed = EnvSchema.safeParse(stripEmpty(env));
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(i => String(i.path[0] ?? '(root)')))];
    const detail = parsed.error.issues
      .map(i => `${String(i.path[0] ?? '(root)')}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`, keys);
  }
  const e = parsed.data;
  return Object.freeze({
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    model: e.NEWSDESK_MODEL,
    temperature: e.NEWSDESK_TEMPERATURE,
    newsApiKey: e.NEWS_API_KEY,
    newsApiBaseUrl: e.NEWS_API_BASE_URL,
    fmpApiKey: e.FMP_API_KEY,
    fmpBaseUrl: e.FMP_BASE_URL,
    fmpRateLimit: e.FMP_RATE_LIMIT,
    openaiApiKey: e.OPENAI_API_KEY,
    voice: e.NEWSDESK_VOICE,
    outputDir: e.NEWSDESK_OUTPUT_DIR,
    logLevel: e.NEWSDESK_LOG_LEVEL,
    retryBaseMs: e.NEWSDESK_RETRY_BASE_MS,
  });
}
