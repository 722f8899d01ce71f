export { BaseAgent, formatArticles } from './base-agent.js';
export type { Agent } from './base-agent.js';
export { AnalystAgent } from './analyst-agent.js';
export type { AnalystInput } from './analyst-agent.js';
export { FactCheckerAgent, parseConfidence } from './fact-checker-agent.js';
export type { FactCheckInput } from './fact-checker-agent.js';
export { TrendAgent, NO_ARTICLES_REPORT } from './trend-agent.js';
export type { TrendInput } from './trend-agent.js';
export { WriterAgent, cleanScript } from './writer-agent.js';
export type { WriterInput } from './writer-agent.js';
export { FinanceAgent } from './finance-agent.js';
export type { FinanceInput, QuoteSource } from './finance-agent.js';
export { FetcherAgent } from './fetcher-agent.js';
export type { HeadlineSource } from './fetcher-agent.js';
