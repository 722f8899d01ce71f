// Newsdesk — multi-agent news briefings on a partial-failure aggregating pipeline
// Stages degrade independently; the report says exactly what is missing and why

export * from './orchestrator/index.js';
export * from './agents/index.js';
export * from './types/index.js';

export { createLlmClient, classifyLlmError } from './bridge/llm-client.js';
export type { LlmClient, LlmClientConfig, LlmRequest } from './bridge/llm-client.js';
export { createSpeechClient, OPENAI_SPEECH_URL } from './bridge/speech-client.js';
export type { SpeechClient, SpeechClientConfig, SpeechResult } from './bridge/speech-client.js';

export { loadConfig, ConfigError, STAGE_POLICIES, resolvePolicy } from './config/index.js';
export type { NewsdeskConfig, BriefingStageName, StagePolicy, StagePolicyOverrides } from './config/index.js';

export { renderBriefingMarkdown, SECTION_TITLES } from './utils/report-renderer.js';
export { saveBriefing, briefingPath, safeFileSegment } from './utils/output-writer.js';
export type { SaveBriefingOptions, SavedBriefing } from './utils/output-writer.js';
export { createLogger, setLogLevel, getLogLevel } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';

export { parseBriefArgs, parseBatchArgs } from './src/args.js';
export type { BriefArgs, BatchArgs, ParseResult } from './src/args.js';
