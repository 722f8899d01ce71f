// Writer — turns headlines plus whatever analysis is available into a narration script

import type { Article, StockSnapshot } from 'newsdesk-market-data';
import type { LlmClient } from '../bridge/llm-client.js';
import type { Analysis, FactCheck, Script, SummaryStyle, TrendReport } from '../types/briefing.js';
import { ScriptSchema } from '../types/briefing.js';
import { extractSection, parseJsonReply, truncateText } from '../utils/llm-output.js';
import { BaseAgent, formatArticles } from './base-agent.js';

export interface WriterInput {
  category: string;
  articles: readonly Article[];
  style: SummaryStyle;
  maxLength: number;
  analysis?: Analysis;
  factCheck?: FactCheck;
  trends?: TrendReport;
  quotes?: readonly StockSnapshot[];
  /** Context that was requested but could not be produced */
  missing?: readonly string[];
}

const STYLE_GUIDANCE: Record<SummaryStyle, string> = {
  formal: 'Use a formal, broadcast-news register.',
  conversational: 'Use a warm, conversational tone, as if talking to a listener over coffee.',
  brief: 'Be as brief as possible: one or two sentences per story.',
};

const INSTRUCTIONS = `You write news briefings that will be read aloud. Write plain sentences for the ear:
no markdown, no bullet points, no URLs, spell out abbreviations a listener would stumble on.`;

const ScriptReplySchema = ScriptSchema.pick({ script: true });

function formatQuote(q: StockSnapshot): string {
  const change = q.changePercent === null ? '' : ` (${q.changePercent >= 0 ? '+' : ''}${q.changePercent.toFixed(2)}%)`;
  return `${q.symbol} ${q.currentPrice.toFixed(2)}${change}`;
}

/** Strip markdown a model adds despite instructions */
export function cleanScript(text: string): string {
  return text
    .replace(/```[a-z]*\n?/gi, '')
    .replace(/^#+\s*/gm, '')
    .replace(/\*\*(.+?)\*\*/g, '$1')
    .replace(/^\s*[-*•]\s+/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export class WriterAgent extends BaseAgent<WriterInput, Script> {
  constructor(llm: LlmClient) {
    super('writer', llm, INSTRUCTIONS);
  }

  protected buildPrompt(input: WriterInput): string {
    const parts = [
      `Write a ${input.category} news briefing of at most ${input.maxLength} characters.`,
      STYLE_GUIDANCE[input.style],
      '',
      'Headlines:',
      formatArticles(input.articles),
    ];

    if (input.analysis) {
      parts.push('', 'Analysis:', input.analysis.insights);
      if (input.analysis.implications.length > 0) {
        parts.push('Implications: ' + input.analysis.implications.join('; '));
      }
    }
    if (input.factCheck && input.factCheck.verifications.length > 0) {
      parts.push('', 'Fact-check results:');
      for (const v of input.factCheck.verifications) {
        parts.push(`- ${v.claim}: ${v.assessment}`);
      }
    }
    if (input.trends && input.trends.trends.length > 0) {
      parts.push('', 'Trends: ' + input.trends.trends.map(t => `${t.name} (${t.strength})`).join(', '));
    }
    if (input.quotes && input.quotes.length > 0) {
      parts.push('', 'Market snapshot: ' + input.quotes.map(formatQuote).join(', '));
    }
    if (input.missing && input.missing.length > 0) {
      parts.push('', `Not available today: ${input.missing.join(', ')}. Do not mention them.`);
    }

    parts.push('', 'Reply with JSON only: {"script": "<text>"}');
    return parts.join('\n');
  }

  protected maxTokens(input: WriterInput): number {
    return Math.max(512, Math.ceil(input.maxLength / 2));
  }

  protected parseOutput(reply: string, input: WriterInput): Script {
    const json = parseJsonReply(reply, ScriptReplySchema);
    const raw = json?.script ?? (extractSection(reply, 'Script') || reply);
    const script = truncateText(cleanScript(raw), input.maxLength);
    return { script, characters: script.length };
  }
}
