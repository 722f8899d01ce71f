import { z } from 'zod';

export const NEWS_CATEGORIES = [
  'business',
  'entertainment',
  'general',
  'health',
  'science',
  'sports',
  'technology',
] as const;

export type NewsCategory = (typeof NEWS_CATEGORIES)[number];

const HEADLINE_CATEGORIES = [...NEWS_CATEGORIES, 'all'] as const;

export const TopHeadlinesSchema = z.object({
  category: z.enum(HEADLINE_CATEGORIES).default('general').describe('News category, or "all" for every category'),
  count: z.number().int().default(5).describe('Number of articles (clamped to 1-10)'),
  country: z.string().length(2).optional().describe('2-letter ISO 3166-1 country code (e.g., us, gb)'),
  sources: z.string().min(1).optional().describe('Comma-separated source ids (e.g., bbc-news,cnn). Overrides country and category'),
  query: z.string().min(1).optional().describe('Keywords or phrase to search for'),
  page: z.number().int().min(1).optional().describe('Page number'),
});

export type TopHeadlinesParams = z.input<typeof TopHeadlinesSchema>;

// Raw NewsAPI payloads — fields are frequently null
const RawArticleSchema = z.object({
  source: z.object({
    id: z.string().nullable().optional(),
    name: z.string().nullable().optional(),
  }).nullable().optional(),
  title: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
  url: z.string().nullable().optional(),
  publishedAt: z.string().nullable().optional(),
  content: z.string().nullable().optional(),
});

export const TopHeadlinesResponseSchema = z.object({
  status: z.string(),
  totalResults: z.number().optional(),
  articles: z.array(RawArticleSchema).default([]),
});

export type RawArticle = z.infer<typeof RawArticleSchema>;

export const ArticleSchema = z.object({
  title: z.string(),
  description: z.string(),
  url: z.string(),
  source: z.string(),
  publishedAt: z.string(),
  content: z.string(),
});

export type Article = z.infer<typeof ArticleSchema>;
