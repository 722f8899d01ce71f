// Fan-out scheduler — walks the precomputed layers with a barrier between them
// Stages within a layer run concurrently; a required failure stops later layers

import { randomUUID } from 'node:crypto';
import type { PipelineDefinition, StageSpec } from '../types/stage.js';
import { unavailable } from '../types/stage.js';
import type { StageOutcome } from '../types/outcome.js';
import type { PipelineRun } from '../types/run.js';
import { safeEmit, type DomainEventType } from '../types/events.js';
import { executeStage, type ExecuteOptions } from './stage-executor.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Scheduler');

export interface RunOptions extends ExecuteOptions {
  runId?: string;
}

/**
 * Inputs for a stage: success payloads of its dependencies, an Unavailable
 * marker for optional dependencies that did not succeed, and nothing for
 * required ones that did not.
 */
export function collectInputs(
  stage: StageSpec,
  definition: PipelineDefinition,
  outcomes: ReadonlyMap<string, StageOutcome>,
): Map<string, unknown> {
  const inputs = new Map<string, unknown>();
  for (const dep of stage.dependsOn) {
    const outcome = outcomes.get(dep);
    if (!outcome) continue;
    if (outcome.status === 'success') {
      inputs.set(dep, outcome.payload);
      continue;
    }
    const depSpec = definition.stages.find(s => s.name === dep);
    if (depSpec && !depSpec.required) {
      inputs.set(dep, unavailable(dep, outcome.reason));
    }
  }
  return inputs;
}

export async function runPipeline(
  definition: PipelineDefinition,
  options: RunOptions = {},
): Promise<PipelineRun> {
  const runId = options.runId ?? randomUUID();
  const { eventBus } = options;
  const byName = new Map(definition.stages.map(s => [s.name, s]));
  const outcomes = new Map<string, StageOutcome>();
  const startedAt = new Date();

  const emit = (type: DomainEventType, payload: Record<string, unknown>) => {
    safeEmit(eventBus, { eventId: randomUUID(), type, timestamp: new Date(), runId, payload });
  };

  emit('PipelineStarted', { stages: definition.stages.map(s => s.name), layers: definition.layers });
  log.debug('Pipeline started', { runId, layers: definition.layers });

  let abort: { reason: string; layer: number; stage: string } | undefined;

  for (const [layerIndex, layer] of definition.layers.entries()) {
    if (abort) {
      const reason = `Skipped: pipeline aborted by required stage "${abort.stage}"`;
      for (const name of layer) {
        outcomes.set(name, { status: 'skipped', reason });
        emit('StageSkipped', { stage: name, reason });
      }
      continue;
    }

    // Inputs are resolved before dispatch so siblings never see each other
    const dispatched = layer.map(name => {
      const stage = byName.get(name);
      if (!stage) throw new Error(`Layer references undeclared stage "${name}"`);
      return { name, stage, inputs: collectInputs(stage, definition, outcomes) };
    });

    const results = await Promise.all(
      dispatched.map(({ stage, inputs }) => executeStage(stage, inputs, { ...options, runId })),
    );

    for (const [i, { name }] of dispatched.entries()) {
      const outcome = results[i];
      if (!outcome) continue;
      outcomes.set(name, outcome);
      if (outcome.status === 'hard_failure' && !abort) {
        abort = {
          stage: name,
          layer: layerIndex,
          reason: `Required stage "${name}" failed after ${outcome.attempts} attempt(s): ${outcome.lastError}`,
        };
      }
    }

    if (abort) {
      log.warn('Pipeline aborted', { runId, stage: abort.stage, reason: abort.reason });
      emit('PipelineAborted', { stage: abort.stage, layer: abort.layer, reason: abort.reason });
    }
  }

  const finishedAt = new Date();
  // Declaration order, one frozen outcome per stage; the map itself is read-only by type
  const stageOutcomes = new Map<string, StageOutcome>();
  for (const stage of definition.stages) {
    const outcome: StageOutcome = outcomes.get(stage.name) ?? { status: 'skipped', reason: 'Stage was never scheduled' };
    stageOutcomes.set(stage.name, Object.freeze({ ...outcome }));
  }

  emit('PipelineCompleted', {
    aborted: abort !== undefined,
    durationMs: finishedAt.getTime() - startedAt.getTime(),
  });

  return Object.freeze({
    runId,
    stageOrder: Object.freeze(definition.stages.map(s => s.name)),
    layers: definition.layers,
    stageOutcomes,
    startedAt,
    finishedAt,
    aborted: abort !== undefined,
    ...(abort ? { abortReason: abort.reason, abortedAtLayer: abort.layer } : {}),
  });
}
