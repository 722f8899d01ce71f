// Stage executor — runs one stage with timeout and bounded retries
// Always resolves to a StageOutcome; errors never escape a stage

import { randomUUID } from 'node:crypto';
import type { StageInputs, StageSpec } from '../types/stage.js';
import type { StageOutcome } from '../types/outcome.js';
import { safeEmit, type DomainEventType, type EventBus } from '../types/events.js';
import { StageTimeoutError, isTransient } from './errors.js';
import { errorMessage } from '../utils/logger.js';

export interface ExecuteOptions {
  /** First retry delay; doubles per attempt (default: 500ms) */
  baseDelayMs?: number;
  /** Upper bound on a single retry delay (default: 30s) */
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  eventBus?: EventBus;
  runId?: string;
}

export const DEFAULT_BASE_DELAY_MS = 500;
export const DEFAULT_MAX_DELAY_MS = 30_000;

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/** Delay before the retry that follows attempt `attempt` (1-based) */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

export async function executeStage(
  stage: StageSpec,
  inputs: StageInputs,
  options: ExecuteOptions = {},
): Promise<StageOutcome> {
  const {
    baseDelayMs = DEFAULT_BASE_DELAY_MS,
    maxDelayMs = DEFAULT_MAX_DELAY_MS,
    sleep = defaultSleep,
    eventBus,
    runId = '',
  } = options;

  const emit = (type: DomainEventType, payload: Record<string, unknown>) => {
    safeEmit(eventBus, { eventId: randomUUID(), type, timestamp: new Date(), runId, payload: { stage: stage.name, ...payload } });
  };

  const missing = stage.dependsOn.filter(dep => !inputs.has(dep));
  if (missing.length > 0) {
    const reason = `Missing required input(s): ${missing.join(', ')}`;
    emit('StageSkipped', { reason });
    return { status: 'skipped', reason };
  }

  const maxAttempts = 1 + stage.maxRetries;
  const start = Date.now();
  let lastError = '';
  let attempts = 0;
  let transient = false;

  emit('StageStarted', { maxAttempts });

  while (attempts < maxAttempts) {
    attempts++;
    let payload: unknown;
    try {
      payload = await runAttempt(stage, inputs);
    } catch (err) {
      lastError = errorMessage(err);
      transient = isTransient(err);
      if (!transient || attempts >= maxAttempts) break;

      const delayMs = backoffDelay(attempts, baseDelayMs, maxDelayMs);
      emit('StageRetrying', { attempt: attempts, delayMs, error: lastError });
      await sleep(delayMs);
      continue;
    }

    const durationMs = Date.now() - start;
    emit('StageCompleted', { status: 'success', attempts, durationMs });
    return { status: 'success', payload, attempts, durationMs };
  }

  const durationMs = Date.now() - start;
  const status = stage.required ? 'hard_failure' : 'soft_failure';
  const reason = transient
    ? `Gave up after ${attempts} attempt(s): ${lastError}`
    : `Permanent error: ${lastError}`;
  emit('StageCompleted', { status, attempts, durationMs, error: lastError });
  return { status, stage: stage.name, reason, lastError, attempts, durationMs };
}

async function runAttempt(stage: StageSpec, inputs: StageInputs): Promise<unknown> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new StageTimeoutError(stage.name, stage.timeoutMs));
      controller.abort();
    }, stage.timeoutMs);
  });

  // async wrapper turns a synchronous throw into a rejection
  const work = (async () => stage.work(inputs, controller.signal))();

  try {
    return await Promise.race([work, timeout]);
  } catch (err) {
    // Only the timer aborts this controller; whatever the work threw in response is a timeout
    if (controller.signal.aborted) throw new StageTimeoutError(stage.name, stage.timeoutMs);
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
