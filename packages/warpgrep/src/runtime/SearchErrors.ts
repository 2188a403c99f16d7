export type WarpGrepErrorCode = "configuration" | "transport" | "budget_exhausted";

export type WarpGrepErrorDetails = Record<string, unknown>;

type WarpGrepErrorInput = {
  code: WarpGrepErrorCode;
  message: string;
  remediation: string[];
  details?: WarpGrepErrorDetails;
  name?: string;
};

export class WarpGrepError extends Error {
  readonly code: WarpGrepErrorCode;
  readonly remediation: string[];
  readonly details?: WarpGrepErrorDetails;

  constructor({ code, message, remediation, details, name }: WarpGrepErrorInput) {
    super(message);
    this.name = name ?? "WarpGrepError";
    this.code = code;
    this.remediation = remediation;
    this.details = details;
  }
}

export class ProviderError extends WarpGrepError {
  readonly status?: number;

  constructor(message: string, status?: number, body?: string) {
    super({
      code: "transport",
      message,
      remediation: ["Check the model endpoint, credential and network connectivity."],
      details: { status, body },
      name: "ProviderError",
    });
    this.status = status;
  }
}

export const isWarpGrepError = (error: unknown): error is WarpGrepError =>
  error instanceof WarpGrepError;

export const createMissingCredentialError = (variable = "MORPH_API_KEY"): WarpGrepError =>
  new WarpGrepError({
    code: "configuration",
    message: `${variable} not set`,
    remediation: [`export ${variable}="<key>"`, "or pass apiKey explicitly."],
    details: { variable },
    name: "ConfigurationError",
  });

export const createRepoNotFoundError = (repoRoot: string): WarpGrepError =>
  new WarpGrepError({
    code: "configuration",
    message: `Repository not found: ${repoRoot}`,
    remediation: ["Pass an existing directory as the repository root."],
    details: { repoRoot },
    name: "ConfigurationError",
  });

export const createInvalidConfigError = (fields: string[]): WarpGrepError =>
  new WarpGrepError({
    code: "configuration",
    message: `Invalid config values: ${fields.join(", ")}`,
    remediation: ["Fix the listed values in the config file, environment or options."],
    details: { fields },
    name: "ConfigurationError",
  });

export const createConfigFileNotFoundError = (configPath: string): WarpGrepError =>
  new WarpGrepError({
    code: "configuration",
    message: `Config file not found: ${configPath}`,
    remediation: ["Check the --config path, or omit it to use warpgrep.config.* in the working directory."],
    details: { configPath },
    name: "ConfigurationError",
  });

export const createBudgetExhaustedError = (maxTurns: number): WarpGrepError =>
  new WarpGrepError({
    code: "budget_exhausted",
    message: `Search did not complete within max turns (${maxTurns})`,
    remediation: ["Narrow the query or raise limits.maxTurns."],
    details: { maxTurns },
  });

export const createInvalidConfigValueError = (label: string, expected: string): WarpGrepError =>
  new WarpGrepError({
    code: "configuration",
    message: `Invalid ${label}: expected ${expected}.`,
    remediation: [`Set ${label} to a valid ${expected}.`],
    details: { field: label, expected },
    name: "ConfigurationError",
  });
