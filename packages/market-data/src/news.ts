// NewsAPI client — top headlines normalised into Article records

import { createJsonClient, CacheTTL, type JsonClient } from './client.js';
import {
  TopHeadlinesSchema,
  TopHeadlinesResponseSchema,
  type Article,
  type RawArticle,
  type TopHeadlinesParams,
} from './schemas/news.js';

export const NEWS_API_BASE = 'https://newsapi.org/v2';

export interface NewsClientConfig {
  apiKey: string;
  baseUrl?: string;
  rateLimitPerMinute?: number;
}

export interface NewsClient {
  topHeadlines(params: TopHeadlinesParams, signal?: AbortSignal): Promise<Article[]>;
}

export function normalizeArticle(raw: RawArticle): Article {
  return {
    title: raw.title || 'No title',
    description: raw.description || 'No description',
    url: raw.url ?? '',
    source: raw.source?.name || 'Unknown source',
    publishedAt: raw.publishedAt ?? '',
    content: raw.content || 'No content',
  };
}

/**
 * Build the query string for /top-headlines.
 * NewsAPI rejects `sources` mixed with `country` or `category`, so sources win.
 */
export function buildHeadlineQuery(params: TopHeadlinesParams): Record<string, string | number | undefined> {
  const { category, count, country, sources, query, page } = TopHeadlinesSchema.parse(params);
  const pageSize = Math.max(1, Math.min(count, 10));

  if (sources) {
    return { pageSize, language: 'en', sources, q: query, page };
  }
  return {
    pageSize,
    language: 'en',
    category: category === 'all' ? undefined : category,
    country,
    q: query,
    page,
  };
}

export function createNewsClient(config: NewsClientConfig, http?: JsonClient): NewsClient {
  const client = http ?? createJsonClient({
    provider: 'NewsAPI',
    baseUrl: config.baseUrl ?? NEWS_API_BASE,
    apiKey: config.apiKey,
    authParam: 'apiKey',
    rateLimitPerMinute: config.rateLimitPerMinute ?? 60,
    defaultCacheTtl: CacheTTL.SHORT,
  });

  return {
    async topHeadlines(params, signal) {
      const data = await client.get('top-headlines', buildHeadlineQuery(params), TopHeadlinesResponseSchema, { signal });
      return data.articles.map(normalizeArticle);
    },
  };
}
