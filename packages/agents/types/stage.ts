// Stage definitions — one unit of work in a pipeline

/** Stand-in for the payload of an optional stage that did not succeed */
export interface Unavailable {
  readonly kind: 'unavailable';
  readonly stage: string;
  readonly reason: string;
}

/**
 * Resolved upstream payloads keyed by stage name. A failed optional
 * dependency appears as an {@link Unavailable} marker.
 */
export type StageInputs = ReadonlyMap<string, unknown>;

/**
 * The external call behind a stage. Throw `TransientError` for failures worth
 * retrying and `PermanentError` for the rest; `signal` aborts on timeout.
 */
export type StageWork = (inputs: StageInputs, signal: AbortSignal) => Promise<unknown>;

export interface StageSpec {
  readonly name: string;
  readonly required: boolean;
  readonly dependsOn: readonly string[];
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly work: StageWork;
  readonly description?: string;
}

export interface PipelineDefinition {
  readonly stages: readonly StageSpec[];
  /** Topological layers; each layer only depends on earlier ones */
  readonly layers: readonly (readonly string[])[];
}

export function unavailable(stage: string, reason: string): Unavailable {
  return Object.freeze({ kind: 'unavailable', stage, reason });
}

export function isUnavailable(value: unknown): value is Unavailable {
  return typeof value === 'object'
    && value !== null
    && 'kind' in value
    && value.kind === 'unavailable';
}
