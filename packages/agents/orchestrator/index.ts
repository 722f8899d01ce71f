export { TransientError, PermanentError, PipelineConfigError, StageTimeoutError, toStageError, isTransient } from './errors.js';
export { definePipeline, computeLayers, StageSpecSchema } from './stage-graph.js';
export { executeStage, backoffDelay } from './stage-executor.js';
export type { ExecuteOptions } from './stage-executor.js';
export { runPipeline, collectInputs } from './scheduler.js';
export type { RunOptions } from './scheduler.js';
export { aggregate, findSection } from './aggregator.js';
export { BriefingCoordinator, readInput, requireInput } from './coordinator.js';
export type { BriefingCoordinatorConfig, BriefingResult, BriefingPlan, PlannedStage } from './coordinator.js';
export { BatchBriefing, buildComparative } from './batch-briefing.js';
export type { BatchOptions, BatchProgress, BatchResult, CategoryResult } from './batch-briefing.js';
