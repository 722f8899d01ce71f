// News and market data clients

export { createJsonClient, ProviderError, CacheTTL } from './client.js';
export type { JsonClient, JsonClientConfig, JsonRequestOptions, QueryValue } from './client.js';

export { createNewsClient, normalizeArticle, buildHeadlineQuery, NEWS_API_BASE } from './news.js';
export type { NewsClient, NewsClientConfig } from './news.js';

export { createFmpClient, toSnapshot, normalizeSymbols, FMP_BASE } from './fmp.js';
export type { FmpClient, FmpClientConfig } from './fmp.js';

export { NEWS_CATEGORIES, ArticleSchema, TopHeadlinesSchema } from './schemas/news.js';
export type { Article, NewsCategory, TopHeadlinesParams } from './schemas/news.js';
export { StockSnapshotSchema, TickerSchema } from './schemas/quotes.js';
export type { StockSnapshot } from './schemas/quotes.js';
