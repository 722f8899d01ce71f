// fetch → analyze → write, end to end through definePipeline, runPipeline and aggregate

import { describe, it, expect, vi } from 'vitest';
import { definePipeline } from '../orchestrator/stage-graph.js';
import { runPipeline } from '../orchestrator/scheduler.js';
import { aggregate } from '../orchestrator/aggregator.js';
import { PermanentError, TransientError } from '../orchestrator/errors.js';
import { isUnavailable, type StageWork } from '../types/stage.js';
import { stage, noSleep, hangUntilAborted } from './helpers.js';

function briefingPipeline(works: { fetch?: StageWork; analyze?: StageWork; write?: StageWork }, analyzeRetries = 0) {
  return definePipeline([
    stage('fetch', { maxRetries: 3, work: works.fetch ?? (async () => ['story one', 'story two']) }),
    stage('analyze', {
      required: false,
      dependsOn: ['fetch'],
      timeoutMs: 20,
      maxRetries: analyzeRetries,
      work: works.analyze ?? (async () => 'two stories'),
    }),
    stage('write', {
      dependsOn: ['fetch', 'analyze'],
      work: works.write ?? (async (inputs) => {
        const analysis = inputs.get('analyze');
        return isUnavailable(analysis) ? 'script without analysis' : `script with ${String(analysis)}`;
      }),
    }),
  ]);
}

describe('briefing pipeline scenarios', () => {
  it('degrades to partial when the optional analysis fails permanently', async () => {
    const def = briefingPipeline({
      analyze: async () => { throw new PermanentError('model rejected the request'); },
    });
    const report = aggregate(await runPipeline(def, { sleep: noSleep }));

    expect(report.status).toBe('partial');
    expect(report.sections).toEqual([
      { stage: 'fetch', status: 'available', payload: ['story one', 'story two'] },
      { stage: 'analyze', status: 'unavailable', outcome: 'soft_failure', reason: 'Permanent error: model rejected the request' },
      { stage: 'write', status: 'available', payload: 'script without analysis' },
    ]);
  });

  it('aborts when fetch exhausts its retries', async () => {
    const fetch = vi.fn(async () => { throw new TransientError('503 from provider'); });
    const downstream = vi.fn(async () => 'never');
    const def = briefingPipeline({ fetch, analyze: downstream, write: downstream });
    const run = await runPipeline(def, { sleep: noSleep });
    const report = aggregate(run);

    expect(fetch).toHaveBeenCalledTimes(4);
    expect(downstream).not.toHaveBeenCalled();
    expect(run.stageOutcomes.get('analyze')?.status).toBe('skipped');
    expect(run.stageOutcomes.get('write')?.status).toBe('skipped');
    expect(report.status).toBe('aborted');
    expect(report.abortReason).toBe('Required stage "fetch" failed after 4 attempt(s): 503 from provider');
    expect(report.sections).toEqual([]);
  });

  it('is complete when every stage succeeds, with sections in declared order', async () => {
    const report = aggregate(await runPipeline(briefingPipeline({}), { sleep: noSleep }));
    expect(report.status).toBe('complete');
    expect(report.sections.map(s => s.stage)).toEqual(['fetch', 'analyze', 'write']);
    expect(report.sections[2]).toEqual({ stage: 'write', status: 'available', payload: 'script with two stories' });
  });

  it('recovers when analysis times out twice and succeeds on the third attempt', async () => {
    let calls = 0;
    const analyze: StageWork = async (_inputs, signal) => {
      calls++;
      if (calls <= 2) return hangUntilAborted(signal);
      return 'late insight';
    };
    const run = await runPipeline(briefingPipeline({ analyze }, 3), { sleep: noSleep });

    expect(run.stageOutcomes.get('analyze')).toMatchObject({ status: 'success', payload: 'late insight', attempts: 3 });
    const report = aggregate(run);
    expect(report.status).toBe('complete');
    expect(report.counts).toEqual({ succeeded: 3, failed: 0, skipped: 0 });
  });
});
