import { describe, it, expect, vi } from 'vitest';
import { executeStage, backoffDelay } from '../orchestrator/stage-executor.js';
import { TransientError, PermanentError } from '../orchestrator/errors.js';
import { SimpleEventBus, type DomainEventType } from '../types/events.js';
import { unavailable } from '../types/stage.js';
import { stage, noSleep, hangUntilAborted } from './helpers.js';

describe('executeStage', () => {
  it('returns Success with payload and attempt count', async () => {
    const outcome = await executeStage(stage('fetch', { work: async () => ['a', 'b'] }), new Map());
    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success') return;
    expect(outcome.payload).toEqual(['a', 'b']);
    expect(outcome.attempts).toBe(1);
    expect(outcome.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('passes inputs through to the work function', async () => {
    const work = vi.fn(async (inputs: ReadonlyMap<string, unknown>) => inputs.get('fetch'));
    const outcome = await executeStage(stage('write', { dependsOn: ['fetch'], work }), new Map([['fetch', 42]]));
    expect(outcome).toMatchObject({ status: 'success', payload: 42 });
  });

  it('skips without invoking work when a dependency is missing', async () => {
    const work = vi.fn(async () => 'x');
    const outcome = await executeStage(stage('write', { dependsOn: ['fetch', 'analyze'], work }), new Map([['fetch', 1]]));
    expect(outcome).toEqual({ status: 'skipped', reason: 'Missing required input(s): analyze' });
    expect(work).not.toHaveBeenCalled();
  });

  it('treats an Unavailable marker as a present input', async () => {
    const work = vi.fn(async () => 'written');
    const inputs = new Map<string, unknown>([['analyze', unavailable('analyze', 'down')]]);
    const outcome = await executeStage(stage('write', { dependsOn: ['analyze'], work }), inputs);
    expect(outcome.status).toBe('success');
    expect(work).toHaveBeenCalledOnce();
  });

  it('retries transient errors and succeeds', async () => {
    const sleep = vi.fn(noSleep);
    const work = vi.fn()
      .mockRejectedValueOnce(new TransientError('busy'))
      .mockResolvedValueOnce('done');
    const outcome = await executeStage(stage('fetch', { maxRetries: 2, work }), new Map(), { sleep });
    expect(outcome).toMatchObject({ status: 'success', payload: 'done', attempts: 2 });
    expect(sleep).toHaveBeenCalledWith(500);
  });

  it('backs off exponentially and gives up after 1 + maxRetries attempts', async () => {
    const sleep = vi.fn(noSleep);
    const work = vi.fn(async () => {
      throw new TransientError('flaky');
    });
    const outcome = await executeStage(
      stage('trend', { required: false, maxRetries: 3, work }),
      new Map(),
      { sleep, baseDelayMs: 100 },
    );
    expect(work).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map(c => c[0])).toEqual([100, 200, 400]);
    expect(outcome).toMatchObject({
      status: 'soft_failure',
      stage: 'trend',
      attempts: 4,
      lastError: 'flaky',
      reason: 'Gave up after 4 attempt(s): flaky',
    });
  });

  it('caps the retry delay', async () => {
    const sleep = vi.fn(noSleep);
    const work = vi.fn(async () => {
      throw new TransientError('flaky');
    });
    await executeStage(stage('a', { maxRetries: 3, work }), new Map(), { sleep, baseDelayMs: 100, maxDelayMs: 250 });
    expect(sleep.mock.calls.map(c => c[0])).toEqual([100, 200, 250]);
  });

  it('stops immediately on a permanent error', async () => {
    const sleep = vi.fn(noSleep);
    const work = vi.fn(async () => {
      throw new PermanentError('bad key');
    });
    const outcome = await executeStage(stage('fetch', { maxRetries: 3, work }), new Map(), { sleep });
    expect(work).toHaveBeenCalledOnce();
    expect(sleep).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({
      status: 'hard_failure',
      attempts: 1,
      lastError: 'bad key',
      reason: 'Permanent error: bad key',
    });
  });

  it('treats unclassified errors as permanent', async () => {
    const work = vi.fn(async () => {
      throw new Error('boom');
    });
    const outcome = await executeStage(stage('a', { required: false, maxRetries: 2, work }), new Map(), { sleep: noSleep });
    expect(work).toHaveBeenCalledOnce();
    expect(outcome).toMatchObject({ status: 'soft_failure', attempts: 1, lastError: 'boom' });
  });

  it('catches synchronous throws from work', async () => {
    const outcome = await executeStage(stage('a', {
      work: () => {
        throw new PermanentError('sync');
      },
    }), new Map());
    expect(outcome).toMatchObject({ status: 'hard_failure', lastError: 'sync' });
  });

  it('times out an attempt, aborts its signal and retries', async () => {
    const signals: AbortSignal[] = [];
    const work = vi.fn((_inputs: ReadonlyMap<string, unknown>, signal: AbortSignal) => {
      signals.push(signal);
      return hangUntilAborted(signal);
    });
    const outcome = await executeStage(
      stage('slow', { timeoutMs: 20, maxRetries: 1, work }),
      new Map(),
      { sleep: noSleep },
    );
    expect(work).toHaveBeenCalledTimes(2);
    expect(signals.every(s => s.aborted)).toBe(true);
    expect(outcome).toMatchObject({
      status: 'hard_failure',
      attempts: 2,
      lastError: 'Stage "slow" timed out after 20ms',
    });
  });

  it('emits lifecycle events', async () => {
    const bus = new SimpleEventBus();
    const seen: DomainEventType[] = [];
    for (const type of ['StageStarted', 'StageRetrying', 'StageCompleted', 'StageSkipped'] as const) {
      bus.on(type, e => seen.push(e.type));
    }
    const work = vi.fn()
      .mockRejectedValueOnce(new TransientError('busy'))
      .mockResolvedValueOnce('ok');
    await executeStage(stage('a', { maxRetries: 1, work }), new Map(), { sleep: noSleep, eventBus: bus, runId: 'run-1' });
    await executeStage(stage('b', { dependsOn: ['a'] }), new Map(), { eventBus: bus });
    expect(seen).toEqual(['StageStarted', 'StageRetrying', 'StageCompleted', 'StageSkipped']);
  });

  it('keeps a success when an event handler throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const bus = new SimpleEventBus();
    bus.on('StageStarted', () => { throw new Error('handler broke'); });
    bus.on('StageCompleted', () => { throw new Error('handler broke'); });
    const work = vi.fn(async () => 'done');

    const outcome = await executeStage(stage('a', { maxRetries: 2, work }), new Map(), { eventBus: bus, sleep: noSleep });

    expect(outcome).toMatchObject({ status: 'success', payload: 'done', attempts: 1 });
    expect(work).toHaveBeenCalledOnce();
    vi.restoreAllMocks();
  });

  it('still resolves a failure when the event bus itself throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const bus = {
      emit: () => { throw new Error('bus down'); },
      on: () => {},
      off: () => {},
    };
    const outcome = await executeStage(
      stage('a', { work: async () => { throw new PermanentError('bad input'); } }),
      new Map(),
      { eventBus: bus },
    );
    expect(outcome).toMatchObject({ status: 'hard_failure', reason: 'Permanent error: bad input' });
    vi.restoreAllMocks();
  });
});

describe('backoffDelay', () => {
  it('doubles per attempt up to the cap', () => {
    expect(backoffDelay(1, 500, 30_000)).toBe(500);
    expect(backoffDelay(2, 500, 30_000)).toBe(1000);
    expect(backoffDelay(3, 500, 30_000)).toBe(2000);
    expect(backoffDelay(10, 500, 30_000)).toBe(30_000);
  });
});
