// Trend analyzer — recurring themes across the headlines

import type { Article } from 'newsdesk-market-data';
import type { LlmClient } from '../bridge/llm-client.js';
import { TrendReportSchema, TrendSchema, type Trend, type TrendReport } from '../types/briefing.js';
import { extractList, extractSection, parseJsonReply, splitBlocks } from '../utils/llm-output.js';
import { BaseAgent, formatArticles } from './base-agent.js';

export interface TrendInput {
  articles: readonly Article[];
}

export const NO_ARTICLES_REPORT: TrendReport = Object.freeze({
  trends: [],
  metaTrends: [],
  summary: 'No articles available for trend analysis.',
});

const INSTRUCTIONS = `You identify emerging trends in the news. A trend must be supported by at least one article;
rate its strength as weak, moderate or strong and give a timeframe (short-term, medium-term or long-term).`;

export class TrendAgent extends BaseAgent<TrendInput, TrendReport> {
  constructor(llm: LlmClient) {
    super('trend-analyzer', llm, INSTRUCTIONS);
  }

  override async run(input: TrendInput, signal?: AbortSignal): Promise<TrendReport> {
    if (input.articles.length === 0) return NO_ARTICLES_REPORT;
    return super.run(input, signal);
  }

  protected buildPrompt(input: TrendInput): string {
    return [
      'Identify trends in these articles:',
      formatArticles(input.articles),
      '',
      'Reply with JSON only. supportingArticles holds article numbers from the list above:',
      '{"trends": [{"name": "", "description": "", "strength": "moderate", "supportingArticles": [1], "timeframe": "short-term"}], "metaTrends": [""], "summary": ""}',
    ].join('\n');
  }

  protected parseOutput(reply: string): TrendReport {
    const json = parseJsonReply(reply, TrendReportSchema);
    if (json) return json;

    const trends: Trend[] = [];
    for (const block of splitBlocks(reply, 'Trend')) {
      const name = extractSection(block, 'Trend');
      if (!name) continue;
      const articleRefs = extractSection(block, 'Articles').match(/\d+/g) ?? [];
      trends.push(TrendSchema.parse({
        name,
        description: extractSection(block, 'Description'),
        strength: extractSection(block, 'Strength').toLowerCase(),
        supportingArticles: articleRefs.map(Number),
        timeframe: extractSection(block, 'Timeframe') || undefined,
      }));
    }

    return {
      trends,
      metaTrends: extractList(reply, 'Meta-trends'),
      summary: extractSection(reply, 'Summary'),
    };
  }
}
