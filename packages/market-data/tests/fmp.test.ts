import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createFmpClient, normalizeSymbols, toSnapshot } from '../src/fmp.js';

const appleQuote = {
  symbol: 'AAPL',
  name: 'Apple Inc.',
  price: 231.5,
  change: 1.5,
  changePercentage: 0.65,
  volume: 51000000,
  dayLow: 229.1,
  dayHigh: 232.8,
  yearHigh: 260.1,
  yearLow: 164.08,
  marketCap: 3450000000000,
  previousClose: 230,
  open: 230.2,
  exchange: 'NASDAQ',
};

describe('FMP client', () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockReset();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('maps a raw quote to a snapshot', () => {
    expect(toSnapshot(appleQuote)).toEqual({
      symbol: 'AAPL',
      companyName: 'Apple Inc.',
      currentPrice: 231.5,
      change: 1.5,
      changePercent: 0.65,
      dayHigh: 232.8,
      dayLow: 229.1,
      previousClose: 230,
      openPrice: 230.2,
      volume: 51000000,
      marketCap: 3450000000000,
      fiftyTwoWeekHigh: 260.1,
      fiftyTwoWeekLow: 164.08,
    });
  });

  it('falls back to the open price when price is missing', () => {
    const snapshot = toSnapshot({ symbol: 'XYZ', price: null, open: 12 });
    expect(snapshot.currentPrice).toBe(12);
    expect(snapshot.companyName).toBe('N/A');
    expect(snapshot.marketCap).toBeNull();
  });

  it('normalises and de-duplicates symbols', () => {
    expect(normalizeSymbols([' aapl', 'MSFT', 'AAPL', ''])).toEqual(['AAPL', 'MSFT']);
  });

  it('rejects invalid symbols', () => {
    expect(() => normalizeSymbols(['AA PL'])).toThrow();
  });

  it('uses the single quote endpoint for one symbol', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, json: async () => [appleQuote] });

    const client = createFmpClient({ apiKey: 'test-fmp-key', baseUrl: 'https://fmp-test.local/stable' });
    const snapshot = await client.quote('aapl');

    const url = new URL(mockFetch.mock.calls[0][0]);
    expect(url.pathname).toBe('/stable/quote');
    expect(url.searchParams.get('symbol')).toBe('AAPL');
    expect(url.searchParams.get('apikey')).toBe('test-fmp-key');
    expect(snapshot.currentPrice).toBe(231.5);
  });

  it('uses the batch endpoint for several symbols', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => [appleQuote, { symbol: 'MSFT', name: 'Microsoft Corporation', price: 415.2 }],
    });

    const client = createFmpClient({ apiKey: 'test-fmp-key', baseUrl: 'https://fmp-test.local/stable' });
    const snapshots = await client.quotes(['AAPL', 'msft']);

    const url = new URL(mockFetch.mock.calls[0][0]);
    expect(url.pathname).toBe('/stable/batch-quote');
    expect(url.searchParams.get('symbols')).toBe('AAPL,MSFT');
    expect(snapshots.map(s => s.symbol)).toEqual(['AAPL', 'MSFT']);
  });

  it('returns no snapshots and makes no request for an empty symbol list', async () => {
    const client = createFmpClient({ apiKey: 'test-fmp-key' });
    await expect(client.quotes([])).resolves.toEqual([]);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('throws when a quote comes back empty', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, json: async () => [] });

    const client = createFmpClient({ apiKey: 'test-fmp-key' });
    await expect(client.quote('ZZZZ')).rejects.toThrow('FMP: no quote returned for ZZZZ');
  });
});
