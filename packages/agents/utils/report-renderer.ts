// Markdown rendering of an aggregated briefing report

import { ArticleListSchema, QuoteListSchema, AnalysisSchema, FactCheckSchema, TrendReportSchema, ScriptSchema, AudioSchema } from '../types/briefing.js';
import type { BriefingRequest } from '../types/briefing.js';
import type { AggregatedReport, ReportSection } from '../types/run.js';

export const SECTION_TITLES: Readonly<Record<string, string>> = {
  'fetch': 'Headlines',
  'analyze': 'Analysis',
  'fact-check': 'Fact Check',
  'trend': 'Trends',
  'finance': 'Market Snapshot',
  'write': 'Script',
  'audio': 'Audio',
};

const STATUS_LABELS: Record<AggregatedReport['status'], string> = {
  complete: 'Complete',
  partial: 'Partial',
  aborted: 'Aborted',
};

function titleCase(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function sectionTitle(stage: string): string {
  return SECTION_TITLES[stage] ?? titleCase(stage);
}

function formatNumber(n: number | null, digits = 2): string {
  return n === null ? 'N/A' : n.toFixed(digits);
}

function jsonBlock(payload: unknown): string[] {
  return ['```json', JSON.stringify(payload, null, 2), '```'];
}

/** Body lines for an available section; unknown payload shapes render as JSON */
function renderPayload(stage: string, payload: unknown): string[] {
  switch (stage) {
    case 'fetch': {
      const parsed = ArticleListSchema.safeParse(payload);
      if (!parsed.success) break;
      return parsed.data.map((a, i) => `${i + 1}. [${a.title}](${a.url}) — ${a.source}`);
    }
    case 'analyze': {
      const parsed = AnalysisSchema.safeParse(payload);
      if (!parsed.success) break;
      const lines = [parsed.data.insights];
      if (parsed.data.trends.length > 0) {
        lines.push('', '**Trends**', ...parsed.data.trends.map(t => `- ${t}`));
      }
      if (parsed.data.implications.length > 0) {
        lines.push('', '**Implications**', ...parsed.data.implications.map(t => `- ${t}`));
      }
      return lines;
    }
    case 'fact-check': {
      const parsed = FactCheckSchema.safeParse(payload);
      if (!parsed.success) break;
      const lines = parsed.data.verifications.map(v =>
        `- **${v.claim}** — ${v.assessment} (confidence ${Math.round(v.confidence * 100)}%)${v.explanation ? `: ${v.explanation}` : ''}`);
      if (parsed.data.summary) lines.push('', parsed.data.summary);
      return lines.length > 0 ? lines : ['_No claims checked._'];
    }
    case 'trend': {
      const parsed = TrendReportSchema.safeParse(payload);
      if (!parsed.success) break;
      const lines = parsed.data.trends.map(t =>
        `- **${t.name}** (${t.strength}, ${t.timeframe})${t.description ? `: ${t.description}` : ''}`);
      if (parsed.data.metaTrends.length > 0) {
        lines.push('', `Meta-trends: ${parsed.data.metaTrends.join('; ')}`);
      }
      if (parsed.data.summary) lines.push('', parsed.data.summary);
      return lines;
    }
    case 'finance': {
      const parsed = QuoteListSchema.safeParse(payload);
      if (!parsed.success) break;
      return [
        '| Symbol | Company | Price | Change % |',
        '|--------|---------|-------|----------|',
        ...parsed.data.map(q =>
          `| ${q.symbol} | ${q.companyName} | ${formatNumber(q.currentPrice)} | ${formatNumber(q.changePercent)} |`),
      ];
    }
    case 'write': {
      const parsed = ScriptSchema.safeParse(payload);
      if (!parsed.success) break;
      return [parsed.data.script];
    }
    case 'audio': {
      const parsed = AudioSchema.safeParse(payload);
      if (!parsed.success) break;
      return [`Saved to \`${parsed.data.path}\` (${parsed.data.bytes} bytes, voice ${parsed.data.voice})`];
    }
  }
  return jsonBlock(payload);
}

function renderSection(section: ReportSection): string[] {
  const lines = [`## ${sectionTitle(section.stage)}`, ''];
  if (section.status === 'available') {
    lines.push(...renderPayload(section.stage, section.payload));
  } else {
    lines.push(`_Unavailable (${section.outcome.replace('_', ' ')}): ${section.reason}_`);
  }
  lines.push('');
  return lines;
}

export function renderBriefingMarkdown(report: AggregatedReport, request: BriefingRequest): string {
  const unavailable = report.sections.filter(s => s.status === 'unavailable').length;
  const statusLine = report.status === 'partial'
    ? `${STATUS_LABELS.partial} (${unavailable} of ${report.sections.length} sections unavailable)`
    : STATUS_LABELS[report.status];

  const lines: string[] = [
    `# ${titleCase(request.category)} News Briefing`,
    '',
    `**Status:** ${statusLine}`,
    `**Run:** ${report.runId}`,
    `**Generated:** ${report.finishedAt.toISOString()} (${(report.durationMs / 1000).toFixed(1)}s)`,
    '',
  ];

  if (report.status === 'aborted') {
    lines.push(`> **Briefing aborted:** ${report.abortReason ?? 'unknown reason'}`, '');
  }

  for (const section of report.sections) {
    lines.push(...renderSection(section));
  }

  lines.push('## Stage Status', '');
  lines.push('| Stage | Status | Detail |');
  lines.push('|-------|--------|--------|');
  for (const section of report.sections) {
    const status = section.status === 'available' ? 'success' : section.outcome;
    const detail = section.status === 'available' ? '' : section.reason.replace(/\|/g, '\\|');
    lines.push(`| ${section.stage} | ${status} | ${detail} |`);
  }
  lines.push('');
  lines.push(`Succeeded: ${report.counts.succeeded} · Failed: ${report.counts.failed} · Skipped: ${report.counts.skipped}`);

  return lines.join('\n') + '\n';
}
