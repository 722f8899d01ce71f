import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { FmpClient } from '../fmp.js';
import { QuoteSchema, BatchQuoteSchema } from '../schemas/quotes.js';
import { wrapResponse } from './response.js';

export function registerQuoteTools(server: McpServer, fmp: FmpClient) {
  server.tool(
    'market_quote',
    'Get a real-time stock snapshot: price, change, day range, volume, market cap and 52-week range.',
    QuoteSchema.shape,
    async (params) => {
      const { symbol } = QuoteSchema.parse(params);
      return wrapResponse(await fmp.quote(symbol));
    },
  );

  server.tool(
    'market_batch_quote',
    'Get stock snapshots for several symbols in one request. Useful for the market section of a briefing.',
    BatchQuoteSchema.shape,
    async (params) => {
      const { symbols } = BatchQuoteSchema.parse(params);
      return wrapResponse(await fmp.quotes(symbols.split(',')));
    },
  );
}
