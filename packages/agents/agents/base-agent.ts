// Base agent — one model call per run, tolerant output parsing
// All model-backed agents extend this class

import type { Article } from 'newsdesk-market-data';
import type { LlmClient } from '../bridge/llm-client.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Agent');

export interface Agent<I, O> {
  readonly name: string;
  run(input: I, signal?: AbortSignal): Promise<O>;
}

export abstract class BaseAgent<I, O> implements Agent<I, O> {
  constructor(
    readonly name: string,
    protected readonly llm: LlmClient,
    protected readonly instructions: string,
  ) {}

  protected abstract buildPrompt(input: I): string;

  /** Must not throw: fall back to whatever can be recovered from the text */
  protected abstract parseOutput(reply: string, input: I): O;

  protected maxTokens(_input: I): number {
    return 1024;
  }

  async run(input: I, signal?: AbortSignal): Promise<O> {
    const prompt = this.buildPrompt(input);
    const started = Date.now();
    const reply = await this.llm.complete(
      { system: this.instructions, prompt, maxTokens: this.maxTokens(input) },
      signal,
    );
    log.debug('Model replied', {
      agent: this.name,
      model: this.llm.model,
      chars: reply.length,
      durationMs: Date.now() - started,
    });
    return this.parseOutput(reply, input);
  }
}

/** Numbered article digest used in prompts; numbering is 1-based */
export function formatArticles(articles: readonly Article[]): string {
  return articles
    .map((a, i) => `${i + 1}. ${a.title} (${a.source})\n   ${a.description}`)
    .join('\n');
}
