import { randomUUID } from "node:crypto";
import { stat } from "node:fs/promises";
import path from "node:path";
import { loadConfig, type ConfigSource } from "./config/ConfigLoader.js";
import type { WarpGrepConfig } from "./config/Config.js";
import { OpenAiCompatibleProvider } from "./providers/OpenAiCompatibleProvider.js";
import type { Provider } from "./providers/ProviderTypes.js";
import { createEventPrinter } from "./runtime/EventFormatter.js";
import { RunLogger } from "./runtime/RunLogger.js";
import {
  createMissingCredentialError,
  createRepoNotFoundError,
  isWarpGrepError,
  type WarpGrepError,
} from "./runtime/SearchErrors.js";
import { SearchOrchestrator } from "./runtime/SearchOrchestrator.js";
import type { SearchEventListener, WarpGrepResult } from "./runtime/SearchTypes.js";

export interface SearchOptions {
  /** Emits turn-by-turn diagnostics; never changes control flow. */
  debug?: boolean;
  apiKey?: string;
  /** Replaces the HTTP model client; no credential is required then. */
  provider?: Provider;
  config?: ConfigSource;
  configPath?: string;
  onEvent?: SearchEventListener;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const toResult = (error: WarpGrepError, turns = 0): WarpGrepResult => ({
  success: false,
  error: error.message,
  errorKind: error.code,
  turns,
});

const isDirectory = async (target: string): Promise<boolean> => {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
};

const resolveListener = (options: SearchOptions, config: WarpGrepConfig): SearchEventListener | undefined => {
  if (options.onEvent) return options.onEvent;
  if (!config.logging.debug) return undefined;
  return createEventPrinter((line) => {
    process.stderr.write(`${line}\n`);
  });
};

export const search = async (
  query: string,
  repoRootPath: string,
  options: SearchOptions = {},
): Promise<WarpGrepResult> => {
  const cwd = options.cwd ?? process.cwd();
  let config: WarpGrepConfig;
  try {
    config = await loadConfig({
      cwd,
      env: options.env,
      configPath: options.configPath,
      overrides: {
        ...options.config,
        apiKey: options.apiKey ?? options.config?.apiKey,
        logging: { ...options.config?.logging, debug: options.debug ?? options.config?.logging?.debug },
      },
    });
  } catch (error) {
    if (isWarpGrepError(error)) return toResult(error);
    throw error;
  }

  if (!options.provider && !config.apiKey) {
    return toResult(createMissingCredentialError());
  }

  const repoRoot = path.resolve(cwd, repoRootPath);
  if (!(await isDirectory(repoRoot))) {
    return toResult(createRepoNotFoundError(repoRoot));
  }

  const provider =
    options.provider ??
    new OpenAiCompatibleProvider({
      model: config.provider.model,
      apiKey: config.apiKey,
      baseUrl: config.provider.baseUrl,
      timeoutMs: config.provider.timeoutMs,
    });
  const sessionId = randomUUID();
  const logger = config.logging.directory
    ? new RunLogger(cwd, config.logging.directory, sessionId)
    : undefined;

  const orchestrator = new SearchOrchestrator({
    provider,
    repoRoot,
    limits: config.limits,
    tools: config.tools,
    behavior: config.behavior,
    logger,
    onEvent: resolveListener(options, config),
    sessionId,
  });
  return orchestrator.search(query);
};
