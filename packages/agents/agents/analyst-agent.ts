// Analyst — insights, trends and implications across the fetched headlines

import type { Article } from 'newsdesk-market-data';
import type { LlmClient } from '../bridge/llm-client.js';
import { AnalysisSchema, type Analysis, type AnalysisDepth } from '../types/briefing.js';
import { extractList, extractSection, parseJsonReply } from '../utils/llm-output.js';
import { BaseAgent, formatArticles } from './base-agent.js';

export interface AnalystInput {
  articles: readonly Article[];
  depth: Exclude<AnalysisDepth, 'none'>;
}

const DEPTH_GUIDANCE: Record<AnalystInput['depth'], string> = {
  basic: 'Give 2-3 short insights and at most two trends. Keep it brief.',
  moderate: 'Give a paragraph of insights, up to four trends and up to four implications.',
  deep: 'Give a thorough analysis: context, second-order effects, up to six trends and six implications.',
};

const INSTRUCTIONS = `You are a news analyst. You read a set of headlines and explain what they mean together.
Stay factual, avoid speculation beyond what the articles support, and keep a neutral tone.`;

export class AnalystAgent extends BaseAgent<AnalystInput, Analysis> {
  constructor(llm: LlmClient) {
    super('analyst', llm, INSTRUCTIONS);
  }

  protected buildPrompt(input: AnalystInput): string {
    return [
      'Analyze these articles:',
      formatArticles(input.articles),
      '',
      DEPTH_GUIDANCE[input.depth],
      '',
      'Reply with JSON only:',
      '{"insights": "<text>", "trends": ["<trend>"], "implications": ["<implication>"]}',
    ].join('\n');
  }

  protected maxTokens(input: AnalystInput): number {
    return input.depth === 'deep' ? 2048 : 1024;
  }

  protected parseOutput(reply: string): Analysis {
    const json = parseJsonReply(reply, AnalysisSchema);
    if (json) return json;

    const trends = extractList(reply, 'Trends');
    const implications = extractList(reply, 'Implications');
    const insights = extractSection(reply, 'Insights')
      || (trends.length === 0 && implications.length === 0 ? reply.trim() : '');
    return { insights, trends, implications };
  }
}
