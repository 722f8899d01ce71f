// Stage outcomes — every stage resolves to exactly one of these per run

export type StageOutcomeStatus = 'success' | 'soft_failure' | 'hard_failure' | 'skipped';

export interface StageSuccess {
  readonly status: 'success';
  readonly payload: unknown;
  readonly attempts: number;
  readonly durationMs: number;
}

export interface StageFailure {
  readonly status: 'soft_failure' | 'hard_failure';
  readonly stage: string;
  readonly reason: string;
  readonly lastError: string;
  readonly attempts: number;
  readonly durationMs: number;
}

export interface StageSkipped {
  readonly status: 'skipped';
  readonly reason: string;
}

export type StageOutcome = StageSuccess | StageFailure | StageSkipped;

export function isSuccess(outcome: StageOutcome | undefined): outcome is StageSuccess {
  return outcome?.status === 'success';
}

export function isHardFailure(outcome: StageOutcome | undefined): outcome is StageFailure {
  return outcome?.status === 'hard_failure';
}

/** Human-readable reason for anything that is not a success */
export function outcomeReason(outcome: StageOutcome): string {
  return outcome.status === 'success' ? '' : outcome.reason;
}
