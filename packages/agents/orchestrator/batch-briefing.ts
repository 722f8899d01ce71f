// Batch briefings — one briefing per category with concurrency control,
// plus a comparative digest across them

import type { NewsCategory } from 'newsdesk-market-data';
import { BriefingCoordinator, type BriefingCoordinatorConfig, type BriefingResult } from './coordinator.js';
import type { BriefingRequestInput } from '../types/briefing.js';
import type { ReportStatus } from '../types/run.js';
import { errorMessage } from '../utils/logger.js';

export interface BatchOptions {
  /** Max concurrent briefings (default: 3) */
  concurrency?: number;
  /** Progress callback */
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchProgress {
  completed: number;
  total: number;
  current: NewsCategory;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface CategoryResult {
  category: NewsCategory;
  result?: BriefingResult;
  /** Set when the briefing could not run at all */
  error?: string;
  durationMs: number;
}

export interface BatchResult {
  categories: CategoryResult[];
  comparative: string;
  totalDurationMs: number;
}

/** Aborted briefings count as failed alongside thrown errors */
function statusOf(r: CategoryResult): ReportStatus | 'error' {
  return r.result ? r.result.report.status : 'error';
}

export class BatchBriefing {
  private coordinator: BriefingCoordinator;

  constructor(config: BriefingCoordinatorConfig | BriefingCoordinator) {
    this.coordinator = config instanceof BriefingCoordinator ? config : new BriefingCoordinator(config);
  }

  async run(
    categories: readonly NewsCategory[],
    baseRequest: Omit<BriefingRequestInput, 'category'> = {},
    options: BatchOptions = {},
  ): Promise<BatchResult> {
    const { concurrency = 3, onProgress } = options;
    const window = Math.max(1, Math.floor(concurrency));
    const totalStart = Date.now();
    const results: CategoryResult[] = [];
    let settled = 0;

    for (let i = 0; i < categories.length; i += window) {
      const batch = categories.slice(i, i + window);

      const batchResults = await Promise.all(batch.map(async (category): Promise<CategoryResult> => {
        const start = Date.now();
        onProgress?.({ completed: settled, total: categories.length, current: category, status: 'running' });

        try {
          const result = await this.coordinator.run({ ...baseRequest, category });
          const failed = result.report.status === 'aborted';
          settled++;
          onProgress?.({
            completed: settled,
            total: categories.length,
            current: category,
            status: failed ? 'failed' : 'completed',
            ...(failed ? { error: result.report.abortReason } : {}),
          });
          return { category, result, durationMs: Date.now() - start };
        } catch (err) {
          const error = errorMessage(err);
          settled++;
          onProgress?.({ completed: settled, total: categories.length, current: category, status: 'failed', error });
          return { category, error, durationMs: Date.now() - start };
        }
      }));

      results.push(...batchResults);
    }

    return {
      categories: results,
      comparative: buildComparative(results),
      totalDurationMs: Date.now() - totalStart,
    };
  }
}

export function buildComparative(results: readonly CategoryResult[]): string {
  const usable = results.filter(r => statusOf(r) === 'complete' || statusOf(r) === 'partial');
  const failed = results.filter(r => !usable.includes(r));

  if (usable.length === 0) {
    return '## Comparative Digest\n\nNo briefings were produced.';
  }

  const lines: string[] = [
    '## Comparative Digest',
    '',
    `**Briefings produced:** ${usable.length}/${results.length}`,
    '',
    '| Category | Status | Sections | Duration |',
    '|----------|--------|----------|----------|',
  ];

  for (const r of usable) {
    const report = r.result?.report;
    if (!report) continue;
    const available = report.sections.filter(s => s.status === 'available').length;
    lines.push(`| ${r.category} | ${report.status} | ${available}/${report.sections.length} | ${(r.durationMs / 1000).toFixed(1)}s |`);
  }
  lines.push('');

  if (failed.length > 0) {
    lines.push('### Failed Briefings', '');
    for (const r of failed) {
      const reason = r.error ?? r.result?.report.abortReason ?? 'unknown error';
      lines.push(`- **${r.category}**: ${reason}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
