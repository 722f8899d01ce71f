#!/usr/bin/env node
// Newsdesk — news briefing CLI
//
// Usage:
//   newsdesk brief --category technology --symbols AAPL,MSFT   # one briefing
//   newsdesk batch --categories business,science               # several, with a digest
//   newsdesk plan --no-trends                                  # show the stage plan
//   newsdesk help                                              # usage

import 'dotenv/config';
import { createNewsClient, createFmpClient } from 'newsdesk-market-data';
import { loadConfig, ConfigError, type NewsdeskConfig } from '../config/index.js';
import { BriefingCoordinator, type BriefingCoordinatorConfig } from '../orchestrator/coordinator.js';
import { BatchBriefing } from '../orchestrator/batch-briefing.js';
import { createLlmClient } from '../bridge/llm-client.js';
import { createSpeechClient } from '../bridge/speech-client.js';
import { saveBriefing } from '../utils/output-writer.js';
import { setLogLevel, errorMessage } from '../utils/logger.js';
import { parseBriefArgs, parseBatchArgs } from './args.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

function fail(message: string): never {
  console.error(`  ${c('red', 'Error:')} ${message}\n`);
  process.exit(1);
}

/** One stderr line per stage transition */
function printEvent(event: { type: string; payload: unknown }): void {
  const payload = typeof event.payload === 'object' && event.payload !== null ? event.payload : {};
  const stage = 'stage' in payload && typeof payload.stage === 'string' ? payload.stage : 'pipeline';
  let detail = event.type;
  if (event.type === 'StageRetrying' && 'error' in payload) detail = `retrying: ${String(payload.error)}`;
  if (event.type === 'StageCompleted' && 'status' in payload) detail = String(payload.status);
  if (event.type === 'StageSkipped' && 'reason' in payload) detail = `skipped: ${String(payload.reason)}`;
  if (event.type === 'PipelineAborted' && 'reason' in payload) detail = `aborted: ${String(payload.reason)}`;
  if (event.type === 'PipelineStarted' || event.type === 'PipelineCompleted' || event.type === 'StageStarted') {
    detail = event.type.replace(/^(Pipeline|Stage)/, '').toLowerCase();
  }
  process.stderr.write(`  ${c('magenta', `[${stage}]`)} ${c('dim', detail)}\n`);
}

// ── CLI class ───────────────────────────────────────────────────────

class NewsdeskCli {
  private config: NewsdeskConfig;

  constructor(config: NewsdeskConfig) {
    this.config = config;
    setLogLevel(config.logLevel);
  }

  async start(rawArgs: string[]): Promise<void> {
    if (rawArgs.length === 0 || rawArgs[0] === '--help' || rawArgs[0] === '-h') {
      this.printHelp();
      return;
    }

    const command = rawArgs[0];
    const rest = rawArgs.slice(1);

    switch (command) {
      case 'brief':
        await this.handleBrief(rest);
        break;
      case 'batch':
        await this.handleBatch(rest);
        break;
      case 'plan':
        this.handlePlan(rest);
        break;
      case 'help':
        this.printHelp();
        break;
      default:
        console.error(`Unknown command: ${command}\n`);
        this.printHelp();
        process.exit(1);
    }
  }

  private coordinatorConfig(outputDir: string): BriefingCoordinatorConfig {
    const { config } = this;
    return {
      headlines: createNewsClient({ apiKey: config.newsApiKey ?? '', baseUrl: config.newsApiBaseUrl }),
      quotes: config.fmpApiKey
        ? createFmpClient({ apiKey: config.fmpApiKey, baseUrl: config.fmpBaseUrl, rateLimitPerMinute: config.fmpRateLimit })
        : null,
      llm: createLlmClient({ apiKey: config.anthropicApiKey, model: config.model, temperature: config.temperature }),
      speech: createSpeechClient({ apiKey: config.openaiApiKey }),
      outputDir,
      baseDelayMs: config.retryBaseMs,
      onEvent: printEvent,
    };
  }

  // ── Subcommand: brief ───────────────────────────────────────────

  private async handleBrief(args: string[]): Promise<void> {
    const parsed = parseBriefArgs(args);
    if (!parsed.ok) fail(`${parsed.error}. Use "newsdesk help" for usage.`);
    const { request, outDir, help } = parsed.value;
    if (help) {
      this.printHelp();
      return;
    }
    if (!this.config.newsApiKey) fail('NEWS_API_KEY environment variable is required.');

    const outputDir = outDir ?? this.config.outputDir;
    const coordinator = new BriefingCoordinator(this.coordinatorConfig(outputDir));
    const startTime = Date.now();
    const { report, markdown } = await coordinator.run(request);
    const saved = await saveBriefing({ outputDir, category: request.category, markdown, report });
    const duration = ((Date.now() - startTime) / 1000).toFixed(1);

    console.log(markdown);

    if (report.status === 'aborted') {
      console.error(`\n  ${c('red', '✗')} ${c('bold', 'Aborted')} ${c('dim', `— ${report.abortReason ?? ''}`)}\n`);
      process.exitCode = 1;
    } else {
      const color = report.status === 'complete' ? 'green' : 'yellow';
      console.error(`\n  ${c(color, '✓')} ${c('bold', report.status === 'complete' ? 'Complete' : 'Partial')} ${c('dim', `— ${duration}s`)}`);
    }
    console.error(`  ${c('dim', 'Saved:')} ${saved.markdownPath}\n`);
  }

  // ── Subcommand: batch ───────────────────────────────────────────

  private async handleBatch(args: string[]): Promise<void> {
    const parsed = parseBatchArgs(args);
    if (!parsed.ok) fail(`${parsed.error}. Use "newsdesk help" for usage.`);
    const { request, categories, concurrency, outDir, help } = parsed.value;
    if (help) {
      this.printHelp();
      return;
    }
    if (!this.config.newsApiKey) fail('NEWS_API_KEY environment variable is required.');

    const outputDir = outDir ?? this.config.outputDir;
    const { category: _category, ...baseRequest } = request;
    const batch = new BatchBriefing({ ...this.coordinatorConfig(outputDir), onEvent: undefined });

    const result = await batch.run(categories, baseRequest, {
      concurrency,
      onProgress: (p) => {
        const mark = p.status === 'running' ? c('dim', '…') : p.status === 'completed' ? c('green', '✓') : c('red', '✗');
        process.stderr.write(`  ${mark} ${c('cyan', p.current)} ${c('dim', `(${p.completed}/${p.total})`)}${p.error ? ` ${p.error}` : ''}\n`);
      },
    });

    for (const entry of result.categories) {
      if (!entry.result) continue;
      const saved = await saveBriefing({
        outputDir,
        category: entry.category,
        markdown: entry.result.markdown,
        report: entry.result.report,
      });
      process.stderr.write(`  ${c('dim', 'Saved:')} ${saved.markdownPath}\n`);
    }

    console.log(result.comparative);
    const anyFailed = result.categories.some(r => !r.result || r.result.report.status === 'aborted');
    if (anyFailed) process.exitCode = 1;
  }

  // ── Subcommand: plan ────────────────────────────────────────────

  private handlePlan(args: string[]): void {
    const parsed = parseBriefArgs(args);
    if (!parsed.ok) fail(`${parsed.error}. Use "newsdesk help" for usage.`);

    const coordinator = new BriefingCoordinator(this.coordinatorConfig(this.config.outputDir));
    const plan = coordinator.plan(parsed.value.request);

    console.log(`\n  ${c('bold', `Plan for ${plan.request.category}`)} ${c('dim', `(${plan.stages.length} stages, ${plan.layers.length} layers)`)}\n`);
    for (const [i, layer] of plan.layers.entries()) {
      console.log(`    ${c('yellow', `Layer ${i}`)}`);
      for (const name of layer) {
        const stage = plan.stages.find(s => s.name === name);
        if (!stage) continue;
        const kind = stage.required ? c('red', 'required') : c('dim', 'optional');
        const deps = stage.dependsOn.length > 0 ? c('dim', ` ← ${stage.dependsOn.join(', ')}`) : '';
        console.log(`      ${c('dim', '●')} ${c('cyan', stage.name.padEnd(12, ' '))} ${kind}${deps}`);
      }
    }
    console.log();
  }

  // ── Help screen ─────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'Newsdesk')} — multi-agent news briefings

  ${c('bold', 'Usage:')}
    newsdesk brief [options]                  Produce one briefing
    newsdesk batch --categories a,b [options] Produce one briefing per category
    newsdesk plan [options]                   Show the stage plan without running it
    newsdesk help                             Show this help

  ${c('bold', 'Options:')}
    --category <name>      business, entertainment, general, health, science, sports, technology
    --count <n>            Articles to fetch, 1-10 (default: 5)
    --page <n>             Headline results page (default: 1)
    --country <cc>         2-letter country code
    --sources <ids>        Comma-separated NewsAPI source ids
    --query <text>         Keyword filter
    --symbols <A,B>        Tickers for the market snapshot
    --depth <d>            basic, moderate, deep, none (default: moderate)
    --style <s>            formal, conversational, brief (default: conversational)
    --max-length <n>       Script length in characters (default: 600)
    --max-claims <n>       Claims to fact-check, 1-10 (default: 5)
    --no-fact-check        Skip fact checking
    --no-trends            Skip trend analysis
    --audio                Synthesize an mp3 of the script
    --voice <v>            alloy, echo, fable, onyx, nova, shimmer
    --out <dir>            Output directory (default: NEWSDESK_OUTPUT_DIR or output)
    --concurrency <n>      Parallel briefings in batch mode (default: 3)

  ${c('bold', 'Environment:')}
    NEWS_API_KEY           Required. NewsAPI key.
    ANTHROPIC_API_KEY      Model for analysis and writing.
    FMP_API_KEY            Market quotes (optional).
    OPENAI_API_KEY         Speech synthesis (optional).

  ${c('bold', 'Examples:')}
    newsdesk brief --category technology --symbols AAPL,NVDA
    newsdesk brief --depth deep --style formal --audio
    newsdesk batch --categories business,science,health --concurrency 2
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

let config: NewsdeskConfig;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigError) fail(err.message);
  throw err;
}

const cli = new NewsdeskCli(config);
cli.start(process.argv.slice(2)).catch((err) => {
  console.error(`${c('red', 'Fatal:')} ${errorMessage(err)}`);
  process.exit(1);
});
