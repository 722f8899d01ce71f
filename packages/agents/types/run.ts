// PipelineRun — the record of one execution; AggregatedReport — its read-only view

import type { StageOutcome } from './outcome.js';

export interface PipelineRun {
  readonly runId: string;
  /** Stage names in declaration order */
  readonly stageOrder: readonly string[];
  readonly layers: readonly (readonly string[])[];
  readonly stageOutcomes: ReadonlyMap<string, StageOutcome>;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly aborted: boolean;
  readonly abortReason?: string;
  /** Index into `layers` of the layer that triggered the abort */
  readonly abortedAtLayer?: number;
}

export type ReportStatus = 'complete' | 'partial' | 'aborted';

export interface AvailableSection {
  readonly stage: string;
  readonly status: 'available';
  readonly payload: unknown;
}

export interface UnavailableSection {
  readonly stage: string;
  readonly status: 'unavailable';
  readonly outcome: 'soft_failure' | 'hard_failure' | 'skipped';
  readonly reason: string;
}

export type ReportSection = AvailableSection | UnavailableSection;

export interface AggregatedReport {
  readonly runId: string;
  readonly status: ReportStatus;
  readonly sections: readonly ReportSection[];
  readonly abortReason?: string;
  readonly counts: {
    readonly succeeded: number;
    readonly failed: number;
    readonly skipped: number;
  };
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly durationMs: number;
}
