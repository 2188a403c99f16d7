export interface ProviderSettings {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export interface LimitsConfig {
  maxTurns: number;
  maxParallelCalls: number;
  maxTokens: number;
  temperature: number;
}

export interface ToolsConfig {
  grepMaxLines: number;
  grepTimeoutMs: number;
  grepContextLines: number;
  structureMaxDepth: number;
  structureMaxEntries: number;
  structureMaxLines: number;
}

export type EmptyFinishPolicy = "accept" | "nudge";

export interface BehaviorConfig {
  emptyFinish: EmptyFinishPolicy;
}

export interface LoggingConfig {
  directory?: string;
  debug: boolean;
}

export interface WarpGrepConfig {
  apiKey?: string;
  provider: ProviderSettings;
  limits: LimitsConfig;
  tools: ToolsConfig;
  behavior: BehaviorConfig;
  logging: LoggingConfig;
}

export const DEFAULT_PROVIDER: ProviderSettings = {
  baseUrl: "https://api.morphllm.com/v1",
  model: "morph-warp-grep-v1",
  timeoutMs: 60_000,
};

export const DEFAULT_LIMITS: LimitsConfig = {
  maxTurns: 4,
  maxParallelCalls: 8,
  maxTokens: 4096,
  temperature: 0,
};

export const DEFAULT_TOOLS: ToolsConfig = {
  grepMaxLines: 150,
  grepTimeoutMs: 10_000,
  grepContextLines: 1,
  structureMaxDepth: 3,
  structureMaxEntries: 20,
  structureMaxLines: 100,
};

export const DEFAULT_BEHAVIOR: BehaviorConfig = {
  emptyFinish: "accept",
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

export const DEFAULT_CONFIG: WarpGrepConfig = {
  provider: DEFAULT_PROVIDER,
  limits: DEFAULT_LIMITS,
  tools: DEFAULT_TOOLS,
  behavior: DEFAULT_BEHAVIOR,
  logging: DEFAULT_LOGGING,
};
