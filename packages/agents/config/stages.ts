// Default policy per briefing stage — required flag, timeout and retry budget

export type BriefingStageName =
  | 'fetch'
  | 'analyze'
  | 'fact-check'
  | 'trend'
  | 'finance'
  | 'write'
  | 'audio';

export interface StagePolicy {
  required: boolean;
  timeoutMs: number;
  maxRetries: number;
  description: string;
}

export const STAGE_POLICIES: Readonly<Record<BriefingStageName, StagePolicy>> = {
  'fetch': { required: true, timeoutMs: 15_000, maxRetries: 2, description: 'Fetch top headlines' },
  'analyze': { required: false, timeoutMs: 60_000, maxRetries: 1, description: 'Analyze headlines for insights' },
  'fact-check': { required: false, timeoutMs: 60_000, maxRetries: 1, description: 'Fact-check key claims' },
  'trend': { required: false, timeoutMs: 60_000, maxRetries: 1, description: 'Identify emerging trends' },
  'finance': { required: false, timeoutMs: 15_000, maxRetries: 2, description: 'Pull market quotes' },
  'write': { required: true, timeoutMs: 90_000, maxRetries: 2, description: 'Write the narration script' },
  'audio': { required: false, timeoutMs: 120_000, maxRetries: 1, description: 'Synthesize speech' },
};

export type StagePolicyOverrides = Partial<Record<BriefingStageName, Partial<Omit<StagePolicy, 'description'>>>>;

export function resolvePolicy(name: BriefingStageName, overrides: StagePolicyOverrides = {}): StagePolicy {
  return { ...STAGE_POLICIES[name], ...overrides[name] };
}
