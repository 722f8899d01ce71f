import { z } from 'zod';

const TickerSchema = z.string().min(1).max(12).regex(/^[A-Za-z0-9.\-^]+$/, 'Invalid ticker symbol');

export const QuoteSchema = z.object({
  symbol: TickerSchema.describe('Stock ticker symbol (e.g., AAPL)'),
});

export const BatchQuoteSchema = z.object({
  symbols: z.string().min(1).describe('Comma-separated ticker symbols (e.g., AAPL,MSFT)'),
});

const num = z.number().nullable().optional();

// FMP quote payload (stable API); extra fields are ignored
export const RawQuoteSchema = z.object({
  symbol: z.string(),
  name: z.string().nullable().optional(),
  price: num,
  change: num,
  changePercentage: num,
  volume: num,
  dayLow: num,
  dayHigh: num,
  yearHigh: num,
  yearLow: num,
  marketCap: num,
  previousClose: num,
  open: num,
});

export const QuoteResponseSchema = z.array(RawQuoteSchema);

export type RawQuote = z.infer<typeof RawQuoteSchema>;

export const StockSnapshotSchema = z.object({
  symbol: z.string(),
  companyName: z.string(),
  currentPrice: z.number(),
  change: z.number().nullable(),
  changePercent: z.number().nullable(),
  dayHigh: z.number().nullable(),
  dayLow: z.number().nullable(),
  previousClose: z.number().nullable(),
  openPrice: z.number().nullable(),
  volume: z.number().nullable(),
  marketCap: z.number().nullable(),
  fiftyTwoWeekHigh: z.number().nullable(),
  fiftyTwoWeekLow: z.number().nullable(),
});

export type StockSnapshot = z.infer<typeof StockSnapshotSchema>;

export { TickerSchema };
