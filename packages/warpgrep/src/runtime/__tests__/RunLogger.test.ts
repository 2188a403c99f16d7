import test from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { RunLogger } from "../RunLogger.js";

test("RunLogger records search events as JSONL", { concurrency: false }, async () => {
  const baseDir = mkdtempSync(path.join(os.tmpdir(), "warpgrep-logs-"));
  const logger = new RunLogger(baseDir, "logs", "run-1");
  await logger.record({ type: "turn_start", turn: 1, maxTurns: 4 });
  await logger.record({ type: "nudge", turn: 1, reason: "no_tool_calls" });

  assert.equal(logger.logPath, path.join(baseDir, "logs", "run-1.jsonl"));
  const records = readFileSync(logger.logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line));
  assert.equal(records.length, 2);
  assert.equal(records[0].type, "turn_start");
  assert.equal(records[0].sessionId, "run-1");
  assert.equal(records[0].maxTurns, 4);
  assert.equal(typeof records[0].timestamp, "string");
  assert.equal(records[1].reason, "no_tool_calls");
});

test("RunLogger writes the session transcript", { concurrency: false }, async () => {
  const baseDir = mkdtempSync(path.join(os.tmpdir(), "warpgrep-logs-"));
  const logger = new RunLogger(baseDir, "logs", "run-2");
  const transcriptPath = await logger.writeTranscript([
    { role: "system", content: "prompt" },
    { role: "user", content: "query" },
  ]);

  assert.ok(existsSync(transcriptPath));
  assert.equal(path.basename(transcriptPath), "run-2-transcript.json");
  const transcript = JSON.parse(readFileSync(transcriptPath, "utf8"));
  assert.equal(transcript.sessionId, "run-2");
  assert.deepEqual(transcript.messages[1], { role: "user", content: "query" });
});

test("RunLogger rejects when the log directory cannot be created", { concurrency: false }, async () => {
  const baseDir = mkdtempSync(path.join(os.tmpdir(), "warpgrep-logs-"));
  writeFileSync(path.join(baseDir, "blocker"), "", "utf8");
  const logger = new RunLogger(baseDir, "blocker/logs", "run-3");
  await assert.rejects(() => logger.record({ type: "turn_start", turn: 1, maxTurns: 4 }), /ENOTDIR/);
});
