import { describe, it, expect } from 'vitest';
import { renderBriefingMarkdown } from '../utils/report-renderer.js';
import { BriefingRequestSchema } from '../types/briefing.js';
import type { AggregatedReport, ReportSection } from '../types/run.js';
import { article, snapshot } from './helpers.js';

const request = BriefingRequestSchema.parse({ category: 'science' });

function report(sections: ReportSection[], extra: Partial<AggregatedReport> = {}): AggregatedReport {
  return {
    runId: 'run-7',
    status: 'partial',
    sections,
    counts: { succeeded: 2, failed: 1, skipped: 0 },
    startedAt: new Date('2026-03-01T10:00:00.000Z'),
    finishedAt: new Date('2026-03-01T10:00:02.500Z'),
    durationMs: 2500,
    ...extra,
  };
}

describe('renderBriefingMarkdown', () => {
  it('renders a partial briefing section by section', () => {
    const markdown = renderBriefingMarkdown(report([
      { stage: 'fetch', status: 'available', payload: [article(1)] },
      { stage: 'analyze', status: 'unavailable', outcome: 'soft_failure', reason: 'Permanent error: quota' },
      { stage: 'write', status: 'available', payload: { script: 'Hello.', characters: 6 } },
    ]), request);

    expect(markdown).toBe([
      '# Science News Briefing',
      '',
      '**Status:** Partial (1 of 3 sections unavailable)',
      '**Run:** run-7',
      '**Generated:** 2026-03-01T10:00:02.500Z (2.5s)',
      '',
      '## Headlines',
      '',
      '1. [Headline 1](https://news.test/1) — Source 1',
      '',
      '## Analysis',
      '',
      '_Unavailable (soft failure): Permanent error: quota_',
      '',
      '## Script',
      '',
      'Hello.',
      '',
      '## Stage Status',
      '',
      '| Stage | Status | Detail |',
      '|-------|--------|--------|',
      '| fetch | success |  |',
      '| analyze | soft_failure | Permanent error: quota |',
      '| write | success |  |',
      '',
      'Succeeded: 2 · Failed: 1 · Skipped: 0',
    ].join('\n') + '\n');
  });

  it('shows the abort reason', () => {
    const markdown = renderBriefingMarkdown(report([], {
      status: 'aborted',
      abortReason: 'Required stage "fetch" failed after 3 attempt(s): timeout',
    }), request);
    expect(markdown).toContain('**Status:** Aborted\n');
    expect(markdown).toContain('> **Briefing aborted:** Required stage "fetch" failed after 3 attempt(s): timeout\n');
  });

  it('renders market quotes as a table', () => {
    const markdown = renderBriefingMarkdown(report([
      { stage: 'finance', status: 'available', payload: [snapshot('NVDA', 120.5, null)] },
    ], { status: 'complete' }), request);
    expect(markdown).toContain('## Market Snapshot\n\n| Symbol | Company | Price | Change % |');
    expect(markdown).toContain('| NVDA | NVDA Inc | 120.50 | N/A |');
  });

  it('renders trends and fact checks', () => {
    const markdown = renderBriefingMarkdown(report([
      { stage: 'fact-check', status: 'available', payload: { verifications: [{ claim: 'Rates rose', assessment: 'verified', confidence: 0.9 }], summary: '' } },
      { stage: 'trend', status: 'available', payload: { trends: [{ name: 'Policy shift', strength: 'strong' }] } },
    ], { status: 'complete' }), request);
    expect(markdown).toContain('- **Rates rose** — verified (confidence 90%)\n');
    expect(markdown).toContain('- **Policy shift** (strong, short-term)\n');
  });

  it('falls back to JSON for unknown stages and unexpected payloads', () => {
    const markdown = renderBriefingMarkdown(report([
      { stage: 'weather', status: 'available', payload: { high: 21 } },
      { stage: 'write', status: 'available', payload: 'not a script object' },
    ], { status: 'complete' }), request);
    expect(markdown).toContain('## Weather\n\n```json\n{\n  "high": 21\n}\n```');
    expect(markdown).toContain('## Script\n\n```json\n"not a script object"\n```');
  });

  it('escapes pipes in the status table', () => {
    const markdown = renderBriefingMarkdown(report([
      { stage: 'trend', status: 'unavailable', outcome: 'skipped', reason: 'a|b' },
    ]), request);
    expect(markdown).toContain('| trend | skipped | a\\|b |');
  });
});
