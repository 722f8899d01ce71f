// Financial Modeling Prep client — stock quotes as StockSnapshot records

import { createJsonClient, CacheTTL, ProviderError, type JsonClient } from './client.js';
import { QuoteResponseSchema, TickerSchema, type RawQuote, type StockSnapshot } from './schemas/quotes.js';

export const FMP_BASE = 'https://financialmodelingprep.com/stable';

export interface FmpClientConfig {
  apiKey: string;
  baseUrl?: string;
  rateLimitPerMinute?: number;
}

export interface FmpClient {
  quote(symbol: string, signal?: AbortSignal): Promise<StockSnapshot>;
  quotes(symbols: readonly string[], signal?: AbortSignal): Promise<StockSnapshot[]>;
}

export function toSnapshot(raw: RawQuote): StockSnapshot {
  return {
    symbol: raw.symbol,
    companyName: raw.name || 'N/A',
    currentPrice: raw.price ?? raw.open ?? 0,
    change: raw.change ?? null,
    changePercent: raw.changePercentage ?? null,
    dayHigh: raw.dayHigh ?? null,
    dayLow: raw.dayLow ?? null,
    previousClose: raw.previousClose ?? null,
    openPrice: raw.open ?? null,
    volume: raw.volume ?? null,
    marketCap: raw.marketCap ?? null,
    fiftyTwoWeekHigh: raw.yearHigh ?? null,
    fiftyTwoWeekLow: raw.yearLow ?? null,
  };
}

export function normalizeSymbols(symbols: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const s of symbols) {
    const upper = s.trim().toUpperCase();
    if (!upper) continue;
    TickerSchema.parse(upper);
    seen.add(upper);
  }
  return [...seen];
}

export function createFmpClient(config: FmpClientConfig, http?: JsonClient): FmpClient {
  const client = http ?? createJsonClient({
    provider: 'FMP',
    baseUrl: config.baseUrl ?? FMP_BASE,
    apiKey: config.apiKey,
    rateLimitPerMinute: config.rateLimitPerMinute ?? 300,
    defaultCacheTtl: CacheTTL.REALTIME,
  });

  async function quotes(symbols: readonly string[], signal?: AbortSignal): Promise<StockSnapshot[]> {
    const wanted = normalizeSymbols(symbols);
    if (wanted.length === 0) return [];

    const data = wanted.length === 1
      ? await client.get('quote', { symbol: wanted[0] }, QuoteResponseSchema, { signal })
      : await client.get('batch-quote', { symbols: wanted.join(',') }, QuoteResponseSchema, { signal });

    return data.map(toSnapshot);
  }

  return {
    quotes,
    async quote(symbol, signal) {
      const [snapshot] = await quotes([symbol], signal);
      if (!snapshot) {
        throw new ProviderError(`FMP: no quote returned for ${symbol.toUpperCase()}`, 'FMP', false);
      }
      return snapshot;
    },
  };
}
