import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { NewsClient } from '../news.js';
import { TopHeadlinesSchema } from '../schemas/news.js';
import { wrapResponse } from './response.js';

export function registerNewsTools(server: McpServer, news: NewsClient) {
  server.tool(
    'news_top_headlines',
    'Get current top headlines from NewsAPI. Filter by category, country, sources or keywords. Returns normalised articles with title, description, source, url and publish time.',
    TopHeadlinesSchema.shape,
    async (params) => {
      const request = TopHeadlinesSchema.parse(params);
      const articles = await news.topHeadlines(request);
      return wrapResponse({ count: articles.length, articles });
    },
  );
}
