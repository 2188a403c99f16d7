import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import {
  createConfigFileNotFoundError,
  createInvalidConfigError,
  createInvalidConfigValueError,
  WarpGrepError,
} from "../runtime/SearchErrors.js";
import {
  DEFAULT_BEHAVIOR,
  DEFAULT_LIMITS,
  DEFAULT_LOGGING,
  DEFAULT_PROVIDER,
  DEFAULT_TOOLS,
  type BehaviorConfig,
  type EmptyFinishPolicy,
  type LimitsConfig,
  type LoggingConfig,
  type ProviderSettings,
  type ToolsConfig,
  type WarpGrepConfig,
} from "./Config.js";

export interface ConfigSource {
  apiKey?: string;
  provider?: Partial<ProviderSettings>;
  limits?: Partial<LimitsConfig>;
  tools?: Partial<ToolsConfig>;
  behavior?: Partial<BehaviorConfig>;
  logging?: Partial<LoggingConfig>;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigSource;
  configPath?: string;
}

export const CONFIG_FILE_CANDIDATES = [
  "warpgrep.config.json",
  "warpgrep.config.yaml",
  "warpgrep.config.yml",
  ".warpgreprc",
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseNumberStrict = (value: string | undefined, label: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createInvalidConfigValueError(label, "number");
  }
  return parsed;
};

const parseBooleanStrict = (value: string | undefined, label: string): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw createInvalidConfigValueError(label, "boolean");
};

const parseEmptyFinish = (value: string | undefined, label: string): EmptyFinishPolicy | undefined => {
  if (value === undefined || value === "") return undefined;
  if (value === "accept" || value === "nudge") return value;
  throw createInvalidConfigValueError(label, "\"accept\" or \"nudge\"");
};

const normalizeNumberField = (value: unknown, label: string): number | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw createInvalidConfigValueError(label, "number");
  }
  return value;
};

const normalizeStringField = (value: unknown, label: string): string | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw createInvalidConfigValueError(label, "string");
  }
  return value;
};

const normalizeBooleanField = (value: unknown, label: string): boolean | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw createInvalidConfigValueError(label, "boolean");
  }
  return value;
};

const normalizeSection = (value: unknown, label: string): Record<string, unknown> | undefined => {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw createInvalidConfigValueError(label, "object");
  }
  return value;
};

/** Only defined values are copied, so a source never shadows a lower-precedence one with undefined. */
const assignDefined = <T extends object, K extends keyof T>(target: T, key: K, value: T[K]): void => {
  if (value !== undefined) target[key] = value;
};

export const normalizeConfigSource = (value: unknown, label = "config"): ConfigSource => {
  if (!isRecord(value)) {
    throw createInvalidConfigValueError(label, "object");
  }
  const source: ConfigSource = {};
  assignDefined(source, "apiKey", normalizeStringField(value.apiKey, `${label}.apiKey`));

  const provider = normalizeSection(value.provider, `${label}.provider`);
  if (provider) {
    const section: Partial<ProviderSettings> = {};
    assignDefined(section, "baseUrl", normalizeStringField(provider.baseUrl, `${label}.provider.baseUrl`));
    assignDefined(section, "model", normalizeStringField(provider.model, `${label}.provider.model`));
    assignDefined(
      section,
      "timeoutMs",
      normalizeNumberField(provider.timeoutMs, `${label}.provider.timeoutMs`),
    );
    source.provider = section;
  }

  const limits = normalizeSection(value.limits, `${label}.limits`);
  if (limits) {
    const section: Partial<LimitsConfig> = {};
    for (const key of ["maxTurns", "maxParallelCalls", "maxTokens", "temperature"] as const) {
      assignDefined(section, key, normalizeNumberField(limits[key], `${label}.limits.${key}`));
    }
    source.limits = section;
  }

  const tools = normalizeSection(value.tools, `${label}.tools`);
  if (tools) {
    const section: Partial<ToolsConfig> = {};
    for (const key of [
      "grepMaxLines",
      "grepTimeoutMs",
      "grepContextLines",
      "structureMaxDepth",
      "structureMaxEntries",
      "structureMaxLines",
    ] as const) {
      assignDefined(section, key, normalizeNumberField(tools[key], `${label}.tools.${key}`));
    }
    source.tools = section;
  }

  const behavior = normalizeSection(value.behavior, `${label}.behavior`);
  if (behavior) {
    const section: Partial<BehaviorConfig> = {};
    const emptyFinish = normalizeStringField(behavior.emptyFinish, `${label}.behavior.emptyFinish`);
    assignDefined(section, "emptyFinish", parseEmptyFinish(emptyFinish, `${label}.behavior.emptyFinish`));
    source.behavior = section;
  }

  const logging = normalizeSection(value.logging, `${label}.logging`);
  if (logging) {
    const section: Partial<LoggingConfig> = {};
    assignDefined(section, "directory", normalizeStringField(logging.directory, `${label}.logging.directory`));
    assignDefined(section, "debug", normalizeBooleanField(logging.debug, `${label}.logging.debug`));
    source.logging = section;
  }

  return source;
};

export const findConfigFile = (cwd: string): string | undefined => {
  for (const candidate of CONFIG_FILE_CANDIDATES) {
    const candidatePath = path.join(cwd, candidate);
    if (existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
};

const readConfigFile = async (configPath: string): Promise<ConfigSource | undefined> => {
  const content = await readFile(configPath, "utf8");
  if (!content.trim()) return undefined;
  let parsed: unknown;
  try {
    parsed = path.extname(configPath) === ".json" ? JSON.parse(content) : YAML.parse(content);
  } catch (error) {
    throw new WarpGrepError({
      code: "configuration",
      message: `Invalid config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      remediation: ["Fix the syntax of the config file."],
      details: { configPath },
      name: "ConfigurationError",
    });
  }
  return normalizeConfigSource(parsed, path.basename(configPath));
};

const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => {
  const config: ConfigSource = {};
  assignDefined(config, "apiKey", env.MORPH_API_KEY || undefined);

  const provider: Partial<ProviderSettings> = {};
  assignDefined(provider, "baseUrl", env.WARPGREP_BASE_URL || undefined);
  assignDefined(provider, "model", env.WARPGREP_MODEL || undefined);
  assignDefined(provider, "timeoutMs", parseNumberStrict(env.WARPGREP_TIMEOUT_MS, "WARPGREP_TIMEOUT_MS"));
  config.provider = provider;

  const limits: Partial<LimitsConfig> = {};
  assignDefined(limits, "maxTurns", parseNumberStrict(env.WARPGREP_MAX_TURNS, "WARPGREP_MAX_TURNS"));
  assignDefined(
    limits,
    "maxParallelCalls",
    parseNumberStrict(env.WARPGREP_MAX_PARALLEL_CALLS, "WARPGREP_MAX_PARALLEL_CALLS"),
  );
  assignDefined(limits, "maxTokens", parseNumberStrict(env.WARPGREP_MAX_TOKENS, "WARPGREP_MAX_TOKENS"));
  config.limits = limits;

  const tools: Partial<ToolsConfig> = {};
  assignDefined(
    tools,
    "grepTimeoutMs",
    parseNumberStrict(env.WARPGREP_GREP_TIMEOUT_MS, "WARPGREP_GREP_TIMEOUT_MS"),
  );
  assignDefined(
    tools,
    "grepMaxLines",
    parseNumberStrict(env.WARPGREP_GREP_MAX_LINES, "WARPGREP_GREP_MAX_LINES"),
  );
  config.tools = tools;

  const behavior: Partial<BehaviorConfig> = {};
  assignDefined(
    behavior,
    "emptyFinish",
    parseEmptyFinish(env.WARPGREP_EMPTY_FINISH, "WARPGREP_EMPTY_FINISH"),
  );
  config.behavior = behavior;

  const logging: Partial<LoggingConfig> = {};
  assignDefined(logging, "directory", env.WARPGREP_LOG_DIR || undefined);
  assignDefined(logging, "debug", parseBooleanStrict(env.WARPGREP_DEBUG, "WARPGREP_DEBUG"));
  config.logging = logging;
  return config;
};

const mergeConfigs = (...sources: Array<ConfigSource | undefined>): WarpGrepConfig => {
  const merged: WarpGrepConfig = {
    provider: { ...DEFAULT_PROVIDER },
    limits: { ...DEFAULT_LIMITS },
    tools: { ...DEFAULT_TOOLS },
    behavior: { ...DEFAULT_BEHAVIOR },
    logging: { ...DEFAULT_LOGGING },
  };
  for (const source of sources) {
    if (!source) continue;
    if (source.apiKey) merged.apiKey = source.apiKey;
    merged.provider = { ...merged.provider, ...source.provider };
    merged.limits = { ...merged.limits, ...source.limits };
    merged.tools = { ...merged.tools, ...source.tools };
    merged.behavior = { ...merged.behavior, ...source.behavior };
    merged.logging = { ...merged.logging, ...source.logging };
  }
  return merged;
};

const assertValid = (config: WarpGrepConfig): void => {
  const errors: string[] = [];
  const positiveInteger = (value: number, label: string): void => {
    if (!Number.isInteger(value) || value < 1) errors.push(label);
  };
  const nonNegative = (value: number, label: string): void => {
    if (value < 0) errors.push(label);
  };

  if (!config.provider.baseUrl) errors.push("provider.baseUrl");
  if (!config.provider.model) errors.push("provider.model");
  positiveInteger(config.provider.timeoutMs, "provider.timeoutMs");
  positiveInteger(config.limits.maxTurns, "limits.maxTurns");
  positiveInteger(config.limits.maxParallelCalls, "limits.maxParallelCalls");
  positiveInteger(config.limits.maxTokens, "limits.maxTokens");
  nonNegative(config.limits.temperature, "limits.temperature");
  positiveInteger(config.tools.grepMaxLines, "tools.grepMaxLines");
  positiveInteger(config.tools.grepTimeoutMs, "tools.grepTimeoutMs");
  nonNegative(config.tools.grepContextLines, "tools.grepContextLines");
  positiveInteger(config.tools.structureMaxDepth, "tools.structureMaxDepth");
  positiveInteger(config.tools.structureMaxEntries, "tools.structureMaxEntries");
  positiveInteger(config.tools.structureMaxLines, "tools.structureMaxLines");

  if (errors.length) {
    throw createInvalidConfigError(errors);
  }
};

export const loadConfig = async (options: LoadConfigOptions = {}): Promise<WarpGrepConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  let configPath: string | undefined;
  if (options.configPath) {
    configPath = path.resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw createConfigFileNotFoundError(configPath);
    }
  } else {
    configPath = findConfigFile(cwd);
  }
  const fileConfig = configPath ? await readConfigFile(configPath) : undefined;
  const envConfig = loadEnvConfig(env);

  const overrides = options.overrides
    ? normalizeConfigSource(options.overrides, "overrides")
    : undefined;

  const merged = mergeConfigs(fileConfig, envConfig, overrides);
  assertValid(merged);
  return merged;
};
