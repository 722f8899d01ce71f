// Shared fakes for agents tests

import { vi } from 'vitest';
import type { Article, StockSnapshot, TopHeadlinesParams } from 'newsdesk-market-data';
import type { StageSpec } from '../types/stage.js';
import type { LlmClient, LlmRequest } from '../bridge/llm-client.js';
import type { HeadlineSource } from '../agents/fetcher-agent.js';
import type { QuoteSource } from '../agents/finance-agent.js';

export function stage(name: string, overrides: Partial<StageSpec> = {}): StageSpec {
  return {
    name,
    required: true,
    dependsOn: [],
    timeoutMs: 1000,
    maxRetries: 0,
    work: async () => `${name}-payload`,
    ...overrides,
  };
}

export const noSleep = async (_ms: number): Promise<void> => {};

/** Resolves never; rejects when the signal aborts */
export function hangUntilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

export interface FakeLlm extends LlmClient {
  calls: LlmRequest[];
}

export function fakeLlm(reply: string | ((request: LlmRequest) => string | Promise<string>)): FakeLlm {
  const calls: LlmRequest[] = [];
  return {
    model: 'test-model',
    calls,
    async complete(request) {
      calls.push(request);
      return typeof reply === 'string' ? reply : reply(request);
    },
  };
}

export function article(n: number, overrides: Partial<Article> = {}): Article {
  return {
    title: `Headline ${n}`,
    description: `Description ${n}`,
    url: `https://news.test/${n}`,
    source: `Source ${n}`,
    publishedAt: '2026-01-15T08:00:00Z',
    content: `Content ${n}`,
    ...overrides,
  };
}

export function fakeHeadlines(articles: Article[]) {
  const topHeadlines = vi.fn(async (_params: TopHeadlinesParams, _signal?: AbortSignal) => articles);
  return { topHeadlines } satisfies HeadlineSource;
}

export function snapshot(symbol: string, price: number, changePercent: number | null = null): StockSnapshot {
  return {
    symbol,
    companyName: `${symbol} Inc`,
    currentPrice: price,
    change: null,
    changePercent,
    dayHigh: null,
    dayLow: null,
    previousClose: null,
    openPrice: null,
    volume: null,
    marketCap: null,
    fiftyTwoWeekHigh: null,
    fiftyTwoWeekLow: null,
  };
}

export function fakeQuotes(snapshots: StockSnapshot[]) {
  const quotes = vi.fn(async (_symbols: readonly string[], _signal?: AbortSignal) => snapshots);
  return { quotes } satisfies QuoteSource;
}
