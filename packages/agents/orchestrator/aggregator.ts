// Result aggregator — pure, read-only view of a finished run

import type { StageOutcome } from '../types/outcome.js';
import type { AggregatedReport, PipelineRun, ReportSection, ReportStatus } from '../types/run.js';

function toSection(stage: string, outcome: StageOutcome): ReportSection {
  if (outcome.status === 'success') {
    return Object.freeze({ stage, status: 'available', payload: outcome.payload });
  }
  return Object.freeze({ stage, status: 'unavailable', outcome: outcome.status, reason: outcome.reason });
}

/**
 * Merge stage outcomes into a report. Sections follow declared order.
 * An aborted run keeps only successes from layers before the aborting one.
 */
export function aggregate(run: PipelineRun): AggregatedReport {
  let succeeded = 0;
  let failed = 0;
  let skipped = 0;
  for (const outcome of run.stageOutcomes.values()) {
    if (outcome.status === 'success') succeeded++;
    else if (outcome.status === 'skipped') skipped++;
    else failed++;
  }

  let status: ReportStatus;
  let sections: ReportSection[];

  if (run.aborted) {
    status = 'aborted';
    const abortLayer = run.abortedAtLayer ?? run.layers.length;
    const earlier = new Set(run.layers.slice(0, abortLayer).flat());
    sections = [];
    for (const stage of run.stageOrder) {
      const outcome = run.stageOutcomes.get(stage);
      if (outcome?.status === 'success' && earlier.has(stage)) {
        sections.push(toSection(stage, outcome));
      }
    }
  } else {
    sections = [];
    for (const stage of run.stageOrder) {
      const outcome = run.stageOutcomes.get(stage);
      if (outcome) sections.push(toSection(stage, outcome));
    }
    status = succeeded === run.stageOrder.length ? 'complete' : 'partial';
  }

  return Object.freeze({
    runId: run.runId,
    status,
    sections: Object.freeze(sections),
    ...(run.aborted && run.abortReason ? { abortReason: run.abortReason } : {}),
    counts: Object.freeze({ succeeded, failed, skipped }),
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    durationMs: run.finishedAt.getTime() - run.startedAt.getTime(),
  });
}

export function findSection(report: AggregatedReport, stage: string): ReportSection | undefined {
  return report.sections.find(s => s.stage === stage);
}
