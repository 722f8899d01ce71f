// Stage graph — validates stage specs and precomputes topological layers

import { z } from 'zod';
import type { PipelineDefinition, StageSpec } from '../types/stage.js';
import { PipelineConfigError } from './errors.js';

export const StageSpecSchema = z.object({
  name: z.string().min(1, 'stage name must not be empty'),
  required: z.boolean(),
  dependsOn: z.array(z.string()),
  timeoutMs: z.number().int().positive(),
  maxRetries: z.number().int().nonnegative(),
  work: z.function(),
  description: z.string().optional(),
});

/**
 * Validate a list of stages and freeze it into a PipelineDefinition.
 * Throws PipelineConfigError on duplicate names, unknown or self
 * dependencies, and cycles.
 */
export function definePipeline(stages: readonly StageSpec[]): PipelineDefinition {
  if (stages.length === 0) {
    throw new PipelineConfigError('A pipeline needs at least one stage');
  }

  const names = new Set<string>();
  for (const [index, stage] of stages.entries()) {
    const parsed = StageSpecSchema.safeParse(stage);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new PipelineConfigError(`Invalid stage at index ${index}: ${issues}`);
    }
    if (names.has(stage.name)) {
      throw new PipelineConfigError(`Duplicate stage name "${stage.name}"`);
    }
    names.add(stage.name);
  }

  for (const stage of stages) {
    for (const dep of stage.dependsOn) {
      if (dep === stage.name) {
        throw new PipelineConfigError(`Stage "${stage.name}" depends on itself`);
      }
      if (!names.has(dep)) {
        throw new PipelineConfigError(`Stage "${stage.name}" depends on unknown stage "${dep}"`);
      }
    }
  }

  const cycle = findCycle(stages);
  if (cycle) {
    throw new PipelineConfigError(`Dependency cycle: ${cycle.join(' -> ')}`);
  }

  const frozenStages = stages.map(s => Object.freeze({ ...s, dependsOn: Object.freeze([...s.dependsOn]) }));
  return Object.freeze({
    stages: Object.freeze(frozenStages),
    layers: Object.freeze(computeLayers(frozenStages).map(l => Object.freeze(l))),
  });
}

/**
 * Kahn layering: each layer holds the stages whose dependencies all sit in
 * earlier layers, in declaration order. Assumes an acyclic graph.
 */
export function computeLayers(stages: readonly StageSpec[]): string[][] {
  const placed = new Set<string>();
  const layers: string[][] = [];
  let remaining = [...stages];

  while (remaining.length > 0) {
    const layer = remaining.filter(s => s.dependsOn.every(d => placed.has(d)));
    if (layer.length === 0) {
      throw new PipelineConfigError(
        `Cannot layer stages: ${remaining.map(s => s.name).join(', ')}`,
      );
    }
    for (const s of layer) placed.add(s.name);
    layers.push(layer.map(s => s.name));
    remaining = remaining.filter(s => !placed.has(s.name));
  }

  return layers;
}

/** Depth-first search; returns the cycle path with its first node repeated */
function findCycle(stages: readonly StageSpec[]): string[] | null {
  const deps = new Map(stages.map(s => [s.name, s.dependsOn]));
  const state = new Map<string, 'visiting' | 'done'>();
  const path: string[] = [];

  function visit(name: string): string[] | null {
    const seen = state.get(name);
    if (seen === 'done') return null;
    if (seen === 'visiting') {
      return [...path.slice(path.indexOf(name)), name];
    }
    state.set(name, 'visiting');
    path.push(name);
    for (const dep of deps.get(name) ?? []) {
      const found = visit(dep);
      if (found) return found;
    }
    path.pop();
    state.set(name, 'done');
    return null;
  }

  for (const stage of stages) {
    const found = visit(stage.name);
    if (found) return found;
  }
  return null;
}
