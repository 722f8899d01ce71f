// Fetcher — top headlines for the briefing; no model involved

import type { Article, TopHeadlinesParams } from 'newsdesk-market-data';
import { PermanentError } from '../orchestrator/errors.js';
import type { Agent } from './base-agent.js';

export interface HeadlineSource {
  topHeadlines(params: TopHeadlinesParams, signal?: AbortSignal): Promise<Article[]>;
}

export class FetcherAgent implements Agent<TopHeadlinesParams, Article[]> {
  readonly name = 'fetcher';

  constructor(private readonly source: HeadlineSource) {}

  /** Throws PermanentError when the provider returns no articles */
  async run(params: TopHeadlinesParams, signal?: AbortSignal): Promise<Article[]> {
    const articles = await this.source.topHeadlines(params, signal);
    if (articles.length === 0) {
      const scope = params.sources ? `sources "${params.sources}"` : `category "${params.category ?? 'general'}"`;
      throw new PermanentError(`No articles found for ${scope}`);
    }
    return articles;
  }
}
