// Argument parsing for the newsdesk CLI — pure, validated with the request schema

import { z } from 'zod';
import { NEWS_CATEGORIES, type NewsCategory } from 'newsdesk-market-data';
import { BriefingRequestSchema, type BriefingRequest } from '../types/briefing.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface BriefArgs {
  request: BriefingRequest;
  outDir?: string;
  help: boolean;
}

export interface BatchArgs extends BriefArgs {
  categories: NewsCategory[];
  concurrency: number;
}

const VALUE_FLAGS = new Set([
  '--category', '--count', '--page', '--country', '--sources', '--query', '--symbols',
  '--depth', '--style', '--voice', '--out', '--max-length', '--max-claims',
  '--categories', '--concurrency',
]);

const SWITCH_FLAGS = new Set(['--no-fact-check', '--no-trends', '--audio', '--help', '-h']);

const CategoryListSchema = z.array(z.enum(NEWS_CATEGORIES)).min(1, 'at least one category is required');

function splitList(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function toInt(value: string): number {
  return /^-?\d+$/.test(value) ? Number(value) : Number.NaN;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(i => `${i.path.join('.') || 'arguments'}: ${i.message}`)
    .join('; ');
}

/** Flags and switches into a raw map; rejects unknown flags and missing values */
function collectFlags(args: readonly string[], allowed: ReadonlySet<string>): ParseResult<Map<string, string | true>> {
  const flags = new Map<string, string | true>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (SWITCH_FLAGS.has(arg) && allowed.has(arg)) {
      flags.set(arg === '-h' ? '--help' : arg, true);
      continue;
    }
    if (VALUE_FLAGS.has(arg) && allowed.has(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        return { ok: false, error: `Missing value for ${arg}` };
      }
      flags.set(arg, value);
      i++;
      continue;
    }
    return { ok: false, error: `Unknown argument: ${arg}` };
  }
  return { ok: true, value: flags };
}

/** Raw request fields; the schema validates and fills defaults */
function toRequestInput(flags: ReadonlyMap<string, string | true>): Record<string, unknown> {
  const str = (name: string): string | undefined => {
    const v = flags.get(name);
    return typeof v === 'string' ? v : undefined;
  };
  const int = (name: string): number | undefined => {
    const v = str(name);
    return v === undefined ? undefined : toInt(v);
  };

  const input: Record<string, unknown> = {
    category: str('--category')?.toLowerCase(),
    count: int('--count'),
    page: int('--page'),
    country: str('--country')?.toLowerCase(),
    sources: str('--sources'),
    query: str('--query'),
    symbols: str('--symbols') === undefined ? undefined : splitList(str('--symbols') ?? '').map(s => s.toUpperCase()),
    analysisDepth: str('--depth'),
    summaryStyle: str('--style'),
    voice: str('--voice'),
    maxLength: int('--max-length'),
    maxFactClaims: int('--max-claims'),
    useFactChecker: flags.has('--no-fact-check') ? false : undefined,
    useTrendAnalyzer: flags.has('--no-trends') ? false : undefined,
    generateAudio: flags.has('--audio') ? true : undefined,
  };
  // Drop unset keys so schema defaults apply
  return Object.fromEntries(Object.entries(input).filter(([, v]) => v !== undefined));
}

const BRIEF_FLAGS = new Set([...VALUE_FLAGS, ...SWITCH_FLAGS].filter(f => f !== '--categories' && f !== '--concurrency'));
const BATCH_FLAGS = new Set([...VALUE_FLAGS, ...SWITCH_FLAGS].filter(f => f !== '--category'));

export function parseBriefArgs(args: readonly string[]): ParseResult<BriefArgs> {
  const flags = collectFlags(args, BRIEF_FLAGS);
  if (!flags.ok) return flags;

  const parsed = BriefingRequestSchema.safeParse(toRequestInput(flags.value));
  if (!parsed.success) return { ok: false, error: formatIssues(parsed.error) };

  const outDir = flags.value.get('--out');
  return {
    ok: true,
    value: {
      request: parsed.data,
      ...(typeof outDir === 'string' ? { outDir } : {}),
      help: flags.value.has('--help'),
    },
  };
}

export function parseBatchArgs(args: readonly string[]): ParseResult<BatchArgs> {
  const flags = collectFlags(args, BATCH_FLAGS);
  if (!flags.ok) return flags;
  const help = flags.value.has('--help');

  const rawCategories = flags.value.get('--categories');
  const categories = CategoryListSchema.safeParse(
    typeof rawCategories === 'string' ? splitList(rawCategories.toLowerCase()) : [],
  );
  if (!categories.success && !help) {
    return { ok: false, error: `categories: ${categories.error.issues[0]?.message ?? 'invalid'}` };
  }

  const rawConcurrency = flags.value.get('--concurrency');
  const concurrency = typeof rawConcurrency === 'string' ? toInt(rawConcurrency) : 3;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    return { ok: false, error: 'concurrency: must be a positive integer' };
  }

  const parsed = BriefingRequestSchema.safeParse(toRequestInput(flags.value));
  if (!parsed.success) return { ok: false, error: formatIssues(parsed.error) };

  const outDir = flags.value.get('--out');
  return {
    ok: true,
    value: {
      request: parsed.data,
      categories: categories.success ? categories.data : [],
      concurrency,
      ...(typeof outDir === 'string' ? { outDir } : {}),
      help,
    },
  };
}
