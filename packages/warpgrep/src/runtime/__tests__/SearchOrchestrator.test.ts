import test from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { EMPTY_FINISH_NUDGE, NO_TOOL_CALLS_NUDGE } from "../../prompts/SearchPrompts.js";
import type { Provider, ProviderRequest, ProviderResponse } from "../../providers/ProviderTypes.js";
import { RunLogger } from "../RunLogger.js";
import { ProviderError } from "../SearchErrors.js";
import { SearchOrchestrator } from "../SearchOrchestrator.js";
import type { SearchEvent } from "../SearchTypes.js";

class ScriptedProvider implements Provider {
  name = "scripted";
  requests: ProviderRequest[] = [];

  constructor(private script: Array<string | Error>) {}

  async generate(request: ProviderRequest): Promise<ProviderResponse> {
    this.requests.push(request);
    const next = this.script.shift() ?? "";
    if (next instanceof Error) throw next;
    return { message: { role: "assistant", content: next } };
  }
}

const AUTH_SOURCE = "export const login = () => true;\n";

const createRepo = (): string => {
  const repoRoot = mkdtempSync(path.join(os.tmpdir(), "warpgrep-orchestrator-"));
  mkdirSync(path.join(repoRoot, "src"), { recursive: true });
  writeFileSync(path.join(repoRoot, "src", "auth.ts"), AUTH_SOURCE, "utf8");
  writeFileSync(path.join(repoRoot, "src", "db.ts"), "export const db = {};\n", "utf8");
  return repoRoot;
};

const lastMessage = (request: ProviderRequest | undefined): string | undefined =>
  request?.messages[request.messages.length - 1]?.content;

test("search explores then finishes with contexts", { concurrency: false }, async () => {
  const repoRoot = createRepo();
  const provider = new ScriptedProvider([
    "<tool_call>map src</tool_call>\n<list_directory><path>src</path></list_directory>",
    "<finish><file><path>src/auth.ts</path><lines>1-1</lines></file></finish>",
  ]);
  const orchestrator = new SearchOrchestrator({ provider, repoRoot });

  const result = await orchestrator.search("where is login implemented");

  assert.deepEqual(result, {
    success: true,
    contexts: [{ file: "src/auth.ts", content: "1|export const login = () => true;", lines: "1-1" }],
    summary: "Found 1 relevant code section(s) in 2 turn(s)",
    turns: 2,
  });
  assert.equal(provider.requests.length, 2);

  const [first, second] = provider.requests;
  assert.equal(first?.messages.length, 2);
  assert.equal(first?.messages[0]?.role, "system");
  assert.equal(first?.temperature, 0);
  assert.equal(first?.maxTokens, 4096);
  assert.equal(
    first?.messages[1]?.content,
    `<repo_structure>\n${path.basename(repoRoot)}/\n  src/\n    auth.ts\n    db.ts\n</repo_structure>\n\n` +
      "<search_string>\nwhere is login implemented\n</search_string>",
  );
  assert.deepEqual(
    second?.messages.map((message) => message.role),
    ["system", "user", "assistant", "user"],
  );
  assert.equal(
    lastMessage(second),
    "<list_directory_result path=\"src\">\nauth.ts\ndb.ts\n</list_directory_result>",
  );
});

test("search fails after the turn budget when no calls are made", { concurrency: false }, async () => {
  const repoRoot = createRepo();
  const provider = new ScriptedProvider(["I am not sure", "", "still thinking", "no idea"]);
  const orchestrator = new SearchOrchestrator({ provider, repoRoot });

  const result = await orchestrator.search("anything");

  assert.deepEqual(result, {
    success: false,
    error: "Search did not complete within max turns (4)",
    errorKind: "budget_exhausted",
    turns: 4,
  });
  assert.equal(provider.requests.length, 4);
  assert.equal(lastMessage(provider.requests[1]), NO_TOOL_CALLS_NUDGE);
});

test("search never calls the model more than maxTurns times", { concurrency: false }, async () => {
  const repoRoot = createRepo();
  const provider = new ScriptedProvider(
    Array.from({ length: 5 }, () => "<grep><pattern>login</pattern></grep>"),
  );
  const orchestrator = new SearchOrchestrator({ provider, repoRoot, limits: { maxTurns: 2 } });

  const result = await orchestrator.search("login");

  assert.equal(result.success, false);
  assert.equal(result.error, "Search did not complete within max turns (2)");
  assert.equal(result.turns, 2);
  assert.equal(provider.requests.length, 2);
  assert.match(provider.requests[0]?.messages[0]?.content ?? "", /You have exactly 2 turn\(s\)/);
});

test("finish wins over other calls in the same turn", { concurrency: false }, async () => {
  const repoRoot = createRepo();
  const provider = new ScriptedProvider([
    "<grep><pattern>login</pattern></grep><finish><file><path>src/auth.ts</path></file></finish>",
  ]);
  const events: SearchEvent[] = [];
  const orchestrator = new SearchOrchestrator({
    provider,
    repoRoot,
    onEvent: (event) => events.push(event),
  });

  const result = await orchestrator.search("login");

  assert.deepEqual(result, {
    success: true,
    contexts: [{ file: "src/auth.ts", content: "1|export const login = () => true;" }],
    summary: "Found 1 relevant code section(s) in 1 turn(s)",
    turns: 1,
  });
  assert.deepEqual(
    events.map((event) => event.type),
    ["session_start", "turn_start", "model_response", "tool_calls_parsed", "finished"],
  );
  const parsed = events.find((event) => event.type === "tool_calls_parsed");
  assert.deepEqual(parsed?.type === "tool_calls_parsed" ? parsed.tools : undefined, ["grep", "finish"]);
});

test("a transport failure ends the search at the current turn", { concurrency: false }, async () => {
  const repoRoot = createRepo();
  const provider = new ScriptedProvider([
    "<read><path>src/auth.ts</path></read>",
    new ProviderError("API error (500): upstream unavailable", 500, "upstream unavailable"),
  ]);
  const orchestrator = new SearchOrchestrator({ provider, repoRoot });

  const result = await orchestrator.search("login");

  assert.deepEqual(result, {
    success: false,
    error: "API error (500): upstream unavailable",
    errorKind: "transport",
    turns: 2,
  });
});

test("an empty finish is accepted by default", { concurrency: false }, async () => {
  const repoRoot = createRepo();
  const provider = new ScriptedProvider(["<finish></finish>"]);
  const orchestrator = new SearchOrchestrator({ provider, repoRoot });

  assert.deepEqual(await orchestrator.search("login"), {
    success: true,
    contexts: [],
    summary: "Found 0 relevant code section(s) in 1 turn(s)",
    turns: 1,
  });
});

test("an empty finish is nudged when configured", { concurrency: false }, async () => {
  const repoRoot = createRepo();
  const provider = new ScriptedProvider([
    "<finish><file><lines>1-2</lines></file></finish>",
    "<finish><file><path>src/db.ts</path></file></finish>",
  ]);
  const orchestrator = new SearchOrchestrator({
    provider,
    repoRoot,
    behavior: { emptyFinish: "nudge" },
  });

  const result = await orchestrator.search("database");

  assert.equal(result.success, true);
  assert.equal(result.turns, 2);
  assert.equal(lastMessage(provider.requests[1]), EMPTY_FINISH_NUDGE);
});

test("finish entries keep their order, duplicates and read errors", { concurrency: false }, async () => {
  const repoRoot = createRepo();
  const provider = new ScriptedProvider([
    "<finish>" +
      "<file><path>src/db.ts</path></file>" +
      "<file><path>src/auth.ts</path></file>" +
      "<file><path>src/db.ts</path></file>" +
      "<file><path>src/gone.ts</path></file>" +
      "</finish>",
  ]);
  const orchestrator = new SearchOrchestrator({ provider, repoRoot });

  const result = await orchestrator.search("modules");

  assert.deepEqual(
    result.contexts?.map((context) => [context.file, context.content]),
    [
      ["src/db.ts", "1|export const db = {};"],
      ["src/auth.ts", "1|export const login = () => true;"],
      ["src/db.ts", "1|export const db = {};"],
      ["src/gone.ts", "Error: File not found: src/gone.ts"],
    ],
  );
  assert.equal(result.summary, "Found 4 relevant code section(s) in 1 turn(s)");
});

test("search writes an event log and transcript when a logger is set", { concurrency: false }, async () => {
  const repoRoot = createRepo();
  const logRoot = mkdtempSync(path.join(os.tmpdir(), "warpgrep-orchestrator-logs-"));
  const logger = new RunLogger(logRoot, "logs", "session-1");
  const provider = new ScriptedProvider(["<finish><file><path>src/auth.ts</path></file></finish>"]);
  const orchestrator = new SearchOrchestrator({ provider, repoRoot, logger });

  await orchestrator.search("login");

  assert.equal(orchestrator.sessionId, "session-1");
  const events = readFileSync(logger.logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line).type);
  assert.deepEqual(events, ["session_start", "turn_start", "model_response", "tool_calls_parsed", "finished"]);

  const transcriptPath = path.join(logRoot, "logs", "session-1-transcript.json");
  assert.ok(existsSync(transcriptPath));
  const transcript = JSON.parse(readFileSync(transcriptPath, "utf8"));
  assert.equal(transcript.sessionId, "session-1");
  assert.equal(transcript.messages.length, 3);
});

test("a failing logger is dropped and the search still returns", { concurrency: false }, async () => {
  const repoRoot = createRepo();
  const logRoot = mkdtempSync(path.join(os.tmpdir(), "warpgrep-orchestrator-logs-"));
  writeFileSync(path.join(logRoot, "blocker"), "", "utf8");
  const logger = new RunLogger(logRoot, "blocker/logs", "session-2");
  const provider = new ScriptedProvider(["<finish><file><path>src/auth.ts</path></file></finish>"]);
  const events: SearchEvent[] = [];
  const orchestrator = new SearchOrchestrator({
    provider,
    repoRoot,
    logger,
    onEvent: (event) => events.push(event),
  });

  const result = await orchestrator.search("login");

  assert.equal(result.success, true);
  assert.equal(result.turns, 1);
  assert.deepEqual(
    events.map((event) => event.type),
    ["session_start", "log_failed", "turn_start", "model_response", "tool_calls_parsed", "finished"],
  );
  const failure = events[1];
  assert.match(failure?.type === "log_failed" ? failure.error : "", /ENOTDIR/);
});

test("finish entries with a leading slash resolve inside the repository", { concurrency: false }, async () => {
  const repoRoot = createRepo();
  const provider = new ScriptedProvider([
    "<finish><file><path>/src/auth.ts</path></file></finish>",
  ]);
  const orchestrator = new SearchOrchestrator({ provider, repoRoot });

  const result = await orchestrator.search("login");

  assert.deepEqual(result.contexts, [
    { file: "/src/auth.ts", content: "1|export const login = () => true;" },
  ]);
});
