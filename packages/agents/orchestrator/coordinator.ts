// Briefing coordinator — builds the stage plan for a request, runs it,
// aggregates the outcomes and renders the briefing

import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import {
  BriefingRequestSchema,
  ArticleListSchema,
  AnalysisSchema,
  FactCheckSchema,
  TrendReportSchema,
  QuoteListSchema,
  ScriptSchema,
  type BriefingRequest,
  type BriefingRequestInput,
} from '../types/briefing.js';
import type { PipelineDefinition, StageInputs, StageSpec, StageWork, Unavailable } from '../types/stage.js';
import { isUnavailable } from '../types/stage.js';
import type { AggregatedReport, PipelineRun } from '../types/run.js';
import { DOMAIN_EVENT_TYPES, SimpleEventBus, safeEmit, type EventBus } from '../types/events.js';
import { resolvePolicy, type BriefingStageName, type StagePolicyOverrides } from '../config/stages.js';
import type { LlmClient } from '../bridge/llm-client.js';
import type { SpeechClient } from '../bridge/speech-client.js';
import { FetcherAgent, type HeadlineSource } from '../agents/fetcher-agent.js';
import { FinanceAgent, type QuoteSource } from '../agents/finance-agent.js';
import { AnalystAgent } from '../agents/analyst-agent.js';
import { FactCheckerAgent } from '../agents/fact-checker-agent.js';
import { TrendAgent } from '../agents/trend-agent.js';
import { WriterAgent, type WriterInput } from '../agents/writer-agent.js';
import { PermanentError, toStageError } from './errors.js';
import { definePipeline } from './stage-graph.js';
import { runPipeline } from './scheduler.js';
import { aggregate } from './aggregator.js';
import { renderBriefingMarkdown } from '../utils/report-renderer.js';
import { briefingPath } from '../utils/output-writer.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Coordinator');

export interface BriefingCoordinatorConfig {
  headlines: HeadlineSource;
  /** Market quotes; the finance stage fails softly without it */
  quotes?: QuoteSource | null;
  /** Model for analysis and writing; model-backed stages fail without it */
  llm?: LlmClient | null;
  speech?: SpeechClient | null;
  /** Where audio files go (default: 'output') */
  outputDir?: string;
  policies?: StagePolicyOverrides;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onEvent?: (event: { type: string; runId: string; payload: unknown }) => void;
  now?: () => Date;
}

export interface BriefingResult {
  request: BriefingRequest;
  run: PipelineRun;
  report: AggregatedReport;
  markdown: string;
}

export interface PlannedStage {
  name: string;
  required: boolean;
  dependsOn: readonly string[];
  timeoutMs: number;
  maxRetries: number;
  description?: string;
}

export interface BriefingPlan {
  request: BriefingRequest;
  stages: PlannedStage[];
  layers: readonly (readonly string[])[];
}

/**
 * Typed view of an upstream payload: the parsed value, the Unavailable
 * marker, or undefined when the stage was not a dependency.
 */
export function readInput<S extends z.ZodTypeAny>(
  inputs: StageInputs,
  name: string,
  schema: S,
): z.output<S> | Unavailable | undefined {
  if (!inputs.has(name)) return undefined;
  const value = inputs.get(name);
  if (isUnavailable(value)) return value;
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new PermanentError(`Stage "${name}" produced an unexpected payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

/** Like readInput, but the value must be present and available */
export function requireInput<S extends z.ZodTypeAny>(
  inputs: StageInputs,
  name: string,
  schema: S,
): z.output<S> {
  const value = readInput(inputs, name, schema);
  if (value === undefined || isUnavailable(value)) {
    throw new PermanentError(`Input "${name}" is not available`);
  }
  return value;
}

/** Translates whatever a work body throws into the retry taxonomy */
function guarded(work: StageWork): StageWork {
  return async (inputs, signal) => {
    try {
      return await work(inputs, signal);
    } catch (err) {
      throw toStageError(err);
    }
  };
}

export class BriefingCoordinator {
  private eventBus: EventBus;
  private config: BriefingCoordinatorConfig;
  private fetcher: FetcherAgent;
  private now: () => Date;

  constructor(config: BriefingCoordinatorConfig) {
    this.config = config;
    this.eventBus = new SimpleEventBus();
    this.fetcher = new FetcherAgent(config.headlines);
    this.now = config.now ?? (() => new Date());

    if (config.onEvent) {
      const handler = config.onEvent;
      for (const type of DOMAIN_EVENT_TYPES) {
        this.eventBus.on(type, (e) => handler({ type: e.type, runId: e.runId, payload: e.payload }));
      }
    }
  }

  /** Validated stage plan for a request, without running anything */
  plan(input: BriefingRequestInput): BriefingPlan {
    const request = BriefingRequestSchema.parse(input);
    const definition = this.define(request);
    return {
      request,
      stages: definition.stages.map(({ name, required, dependsOn, timeoutMs, maxRetries, description }) => ({
        name, required, dependsOn, timeoutMs, maxRetries, description,
      })),
      layers: definition.layers,
    };
  }

  async run(input: BriefingRequestInput): Promise<BriefingResult> {
    const request = BriefingRequestSchema.parse(input);
    const definition = this.define(request);
    const runId = randomUUID();

    log.info('Briefing started', { runId, category: request.category, stages: definition.stages.length });

    const run = await runPipeline(definition, {
      runId,
      eventBus: this.eventBus,
      baseDelayMs: this.config.baseDelayMs,
      maxDelayMs: this.config.maxDelayMs,
      sleep: this.config.sleep,
    });
    const report = aggregate(run);

    safeEmit(this.eventBus, {
      eventId: randomUUID(),
      type: 'ReportAggregated',
      timestamp: new Date(),
      runId,
      payload: { status: report.status, counts: report.counts },
    });
    log.info('Briefing finished', { runId, status: report.status, ...report.counts });

    return { request, run, report, markdown: renderBriefingMarkdown(report, request) };
  }

  private define(request: BriefingRequest): PipelineDefinition {
    return definePipeline(this.buildStages(request));
  }

  private stage(name: BriefingStageName, dependsOn: string[], work: StageWork): StageSpec {
    const policy = resolvePolicy(name, this.config.policies);
    return {
      name,
      required: policy.required,
      dependsOn,
      timeoutMs: policy.timeoutMs,
      maxRetries: policy.maxRetries,
      description: policy.description,
      work: guarded(work),
    };
  }

  private requireLlm(): LlmClient {
    const llm = this.config.llm;
    if (!llm) throw new PermanentError('No language model configured (set ANTHROPIC_API_KEY)');
    return llm;
  }

  buildStages(request: BriefingRequest): StageSpec[] {
    const stages: StageSpec[] = [];
    const analysisStages: string[] = [];

    stages.push(this.stage('fetch', [], (_inputs, signal) =>
      this.fetcher.run({
        category: request.category,
        count: request.count,
        country: request.country,
        sources: request.sources,
        query: request.query,
        page: request.page,
      }, signal)));

    const analysisDepth = request.analysisDepth;
    if (analysisDepth !== 'none') {
      analysisStages.push('analyze');
      stages.push(this.stage('analyze', ['fetch'], (inputs, signal) => {
        const articles = requireInput(inputs, 'fetch', ArticleListSchema);
        return new AnalystAgent(this.requireLlm()).run({ articles, depth: analysisDepth }, signal);
      }));
    }

    if (request.useFactChecker) {
      analysisStages.push('fact-check');
      stages.push(this.stage('fact-check', ['fetch'], (inputs, signal) => {
        const articles = requireInput(inputs, 'fetch', ArticleListSchema);
        return new FactCheckerAgent(this.requireLlm()).run({ articles, maxClaims: request.maxFactClaims }, signal);
      }));
    }

    if (request.useTrendAnalyzer) {
      analysisStages.push('trend');
      stages.push(this.stage('trend', ['fetch'], (inputs, signal) => {
        const articles = requireInput(inputs, 'fetch', ArticleListSchema);
        return new TrendAgent(this.requireLlm()).run({ articles }, signal);
      }));
    }

    if (request.symbols.length > 0) {
      analysisStages.push('finance');
      stages.push(this.stage('finance', [], (_inputs, signal) => {
        const source = this.config.quotes;
        if (!source) throw new PermanentError('No market data source configured (set FMP_API_KEY)');
        return new FinanceAgent(source).run({ symbols: request.symbols }, signal);
      }));
    }

    stages.push(this.stage('write', ['fetch', ...analysisStages], (inputs, signal) => {
      const writerInput: WriterInput = {
        category: request.category,
        articles: requireInput(inputs, 'fetch', ArticleListSchema),
        style: request.summaryStyle,
        maxLength: request.maxLength,
      };
      const missing: string[] = [];
      const take = <S extends z.ZodTypeAny>(name: string, schema: S): z.output<S> | undefined => {
        const value = readInput(inputs, name, schema);
        if (isUnavailable(value)) {
          missing.push(name);
          return undefined;
        }
        return value;
      };
      writerInput.analysis = take('analyze', AnalysisSchema);
      writerInput.factCheck = take('fact-check', FactCheckSchema);
      writerInput.trends = take('trend', TrendReportSchema);
      writerInput.quotes = take('finance', QuoteListSchema);
      writerInput.missing = missing;
      return new WriterAgent(this.requireLlm()).run(writerInput, signal);
    }));

    if (request.generateAudio) {
      stages.push(this.stage('audio', ['write'], (inputs, signal) => {
        const { script } = requireInput(inputs, 'write', ScriptSchema);
        const speech = this.config.speech;
        if (!speech) throw new PermanentError('No speech client configured (set OPENAI_API_KEY)');
        const outPath = briefingPath(this.config.outputDir ?? 'output', request.category, this.now(), 'mp3');
        return speech.synthesize(script, request.voice, outPath, signal);
      }));
    }

    return stages;
  }
}
