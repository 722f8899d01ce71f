// Fact checker — picks the key claims in the headlines and assesses them

import type { Article } from 'newsdesk-market-data';
import type { LlmClient } from '../bridge/llm-client.js';
import { FactCheckSchema, VerificationSchema, type FactCheck, type Verification } from '../types/briefing.js';
import { extractList, extractSection, parseJsonReply, splitBlocks } from '../utils/llm-output.js';
import { BaseAgent, formatArticles } from './base-agent.js';

export interface FactCheckInput {
  articles: readonly Article[];
  maxClaims: number;
}

const INSTRUCTIONS = `You are a careful fact checker. Identify the most consequential factual claims in a set of
headlines and assess how well each is supported. Use one of: verified, partially_verified, unverified, disputed.`;

/** "0.8", "80%" or "80" → 0.8; anything else → 0.5 */
export function parseConfidence(raw: string): number {
  const m = /(\d+(?:\.\d+)?)\s*(%?)/.exec(raw);
  if (!m?.[1]) return 0.5;
  let value = Number(m[1]);
  if (m[2] === '%' || value > 1) value /= 100;
  return Math.min(1, Math.max(0, value));
}

export class FactCheckerAgent extends BaseAgent<FactCheckInput, FactCheck> {
  constructor(llm: LlmClient) {
    super('fact-checker', llm, INSTRUCTIONS);
  }

  protected buildPrompt(input: FactCheckInput): string {
    return [
      `Check at most ${input.maxClaims} claims from these articles:`,
      formatArticles(input.articles),
      '',
      'Reply with JSON only:',
      '{"verifications": [{"claim": "", "assessment": "", "explanation": "", "confidence": 0.0, "sources": [""]}], "summary": ""}',
    ].join('\n');
  }

  protected parseOutput(reply: string, input: FactCheckInput): FactCheck {
    const json = parseJsonReply(reply, FactCheckSchema);
    if (json) {
      return { ...json, verifications: json.verifications.slice(0, input.maxClaims) };
    }

    const verifications: Verification[] = [];
    for (const block of splitBlocks(reply, 'Claim')) {
      const claim = extractSection(block, 'Claim');
      if (!claim) continue;
      const sources = extractList(block, 'Sources');
      verifications.push(VerificationSchema.parse({
        claim,
        assessment: extractSection(block, 'Assessment').toLowerCase() || 'unverified',
        explanation: extractSection(block, 'Explanation'),
        confidence: parseConfidence(extractSection(block, 'Confidence')),
        sources: sources.length === 1 ? (sources[0] ?? '').split(/,\s*/) : sources,
      }));
    }

    return {
      verifications: verifications.slice(0, input.maxClaims),
      summary: extractSection(reply, 'Summary'),
    };
  }
}
