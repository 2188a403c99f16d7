import { promises as fs } from "node:fs";
import path from "node:path";
import type { SearchEvent } from "./SearchTypes.js";

export type RunLogRecord = SearchEvent & { sessionId: string; timestamp: string };

/** Appends search events as JSONL to `<dir>/<sessionId>.jsonl`; transcripts go beside it. */
export class RunLogger {
  readonly logPath: string;
  readonly logDir: string;
  readonly sessionId: string;

  constructor(baseDir: string, logDir: string, sessionId: string) {
    this.logDir = path.resolve(baseDir, logDir);
    this.sessionId = sessionId;
    this.logPath = path.join(this.logDir, `${sessionId}.jsonl`);
  }

  async record(event: SearchEvent): Promise<void> {
    await fs.mkdir(this.logDir, { recursive: true });
    const entry: RunLogRecord = {
      ...event,
      sessionId: this.sessionId,
      timestamp: new Date().toISOString(),
    };
    await fs.appendFile(this.logPath, `${JSON.stringify(entry)}\n`, "utf8");
  }

  async writeTranscript(messages: ReadonlyArray<{ role: string; content: string }>): Promise<string> {
    await fs.mkdir(this.logDir, { recursive: true });
    const filePath = path.join(this.logDir, `${this.sessionId}-transcript.json`);
    await fs.writeFile(filePath, JSON.stringify({ sessionId: this.sessionId, messages }, null, 2), "utf8");
    return filePath;
  }
}
