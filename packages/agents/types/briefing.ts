// Briefing request and the payload shapes each briefing stage produces

import { z } from 'zod';
import { NEWS_CATEGORIES, TickerSchema, ArticleSchema, StockSnapshotSchema } from 'newsdesk-market-data';

export const ANALYSIS_DEPTHS = ['basic', 'moderate', 'deep', 'none'] as const;
export const SUMMARY_STYLES = ['formal', 'conversational', 'brief'] as const;
export const VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

export type AnalysisDepth = (typeof ANALYSIS_DEPTHS)[number];
export type SummaryStyle = (typeof SUMMARY_STYLES)[number];
export type Voice = (typeof VOICES)[number];

export const BriefingRequestSchema = z.object({
  category: z.enum(NEWS_CATEGORIES).default('general'),
  count: z.number().int().min(1).max(10).default(5),
  country: z.string().length(2).optional(),
  sources: z.string().min(1).optional(),
  query: z.string().min(1).optional(),
  /** Headline page, for briefings past the first page of results */
  page: z.number().int().min(1).optional(),
  symbols: z.array(TickerSchema).default([]),
  analysisDepth: z.enum(ANALYSIS_DEPTHS).default('moderate'),
  useFactChecker: z.boolean().default(true),
  useTrendAnalyzer: z.boolean().default(true),
  maxFactClaims: z.number().int().min(1).max(10).default(5),
  summaryStyle: z.enum(SUMMARY_STYLES).default('conversational'),
  maxLength: z.number().int().min(100).max(5000).default(600),
  generateAudio: z.boolean().default(false),
  voice: z.enum(VOICES).default('alloy'),
});

/** What callers pass in; every field has a default */
export type BriefingRequestInput = z.input<typeof BriefingRequestSchema>;
export type BriefingRequest = z.output<typeof BriefingRequestSchema>;

// ── Stage payloads ───────────────────────────────────────────────────

export const ArticleListSchema = z.array(ArticleSchema);
export const QuoteListSchema = z.array(StockSnapshotSchema);

export const AnalysisSchema = z.object({
  insights: z.string(),
  trends: z.array(z.string()).default([]),
  implications: z.array(z.string()).default([]),
});
export type Analysis = z.infer<typeof AnalysisSchema>;

export const VerificationSchema = z.object({
  claim: z.string(),
  assessment: z.string().default('unverified'),
  explanation: z.string().default(''),
  confidence: z.number().min(0).max(1).default(0.5),
  sources: z.array(z.string()).default([]),
});
export type Verification = z.infer<typeof VerificationSchema>;

export const FactCheckSchema = z.object({
  verifications: z.array(VerificationSchema).default([]),
  summary: z.string().default(''),
});
export type FactCheck = z.infer<typeof FactCheckSchema>;

export const TrendSchema = z.object({
  name: z.string(),
  description: z.string().default(''),
  strength: z.enum(['weak', 'moderate', 'strong']).catch('moderate'),
  /** 1-based indices into the fetched article list */
  supportingArticles: z.array(z.number().int()).default([]),
  timeframe: z.string().default('short-term'),
});
export type Trend = z.infer<typeof TrendSchema>;

export const TrendReportSchema = z.object({
  trends: z.array(TrendSchema).default([]),
  metaTrends: z.array(z.string()).default([]),
  summary: z.string().default(''),
});
export type TrendReport = z.infer<typeof TrendReportSchema>;

export const ScriptSchema = z.object({
  script: z.string(),
  characters: z.number().int().nonnegative(),
});
export type Script = z.infer<typeof ScriptSchema>;

export const AudioSchema = z.object({
  path: z.string(),
  bytes: z.number().int().nonnegative(),
  voice: z.string(),
});
export type Audio = z.infer<typeof AudioSchema>;
