// Finance — market quotes for the requested symbols; no model involved

import type { StockSnapshot } from 'newsdesk-market-data';
import type { Agent } from './base-agent.js';

export interface QuoteSource {
  quotes(symbols: readonly string[], signal?: AbortSignal): Promise<StockSnapshot[]>;
}

export interface FinanceInput {
  symbols: readonly string[];
}

export class FinanceAgent implements Agent<FinanceInput, StockSnapshot[]> {
  readonly name = 'finance';

  constructor(private readonly source: QuoteSource) {}

  async run(input: FinanceInput, signal?: AbortSignal): Promise<StockSnapshot[]> {
    if (input.symbols.length === 0) return [];
    return this.source.quotes(input.symbols, signal);
  }
}
