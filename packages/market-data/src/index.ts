#!/usr/bin/env node
import 'dotenv/config';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createNewsClient } from './news.js';
import { createFmpClient } from './fmp.js';
import { registerNewsTools } from './tools/news.js';
import { registerQuoteTools } from './tools/quotes.js';

const server = new McpServer({
  name: 'newsdesk-market-data',
  version: '0.1.0',
});

const news = createNewsClient({
  apiKey: process.env.NEWS_API_KEY ?? '',
  baseUrl: process.env.NEWS_API_BASE_URL || undefined,
});
const fmp = createFmpClient({
  apiKey: process.env.FMP_API_KEY ?? '',
  baseUrl: process.env.FMP_BASE_URL || undefined,
  rateLimitPerMinute: Number(process.env.FMP_RATE_LIMIT ?? 300),
});

registerNewsTools(server, news);
registerQuoteTools(server, fmp);

const transport = new StdioServerTransport();
await server.connect(transport);
