import type { ProviderMessage } from "../providers/ProviderTypes.js";

/**
 * State of one search invocation: the turn counter and the append-only message
 * history. Never shared between invocations and never persisted.
 */
export class SearchSession {
  readonly sessionId: string;
  readonly repoRoot: string;
  readonly startedAt: number;
  private history: Array<Readonly<ProviderMessage>> = [];
  private currentTurn = 0;

  constructor(sessionId: string, repoRoot: string) {
    this.sessionId = sessionId;
    this.repoRoot = repoRoot;
    this.startedAt = Date.now();
  }

  get turn(): number {
    return this.currentTurn;
  }

  beginTurn(): number {
    this.currentTurn += 1;
    return this.currentTurn;
  }

  append(message: ProviderMessage): void {
    this.history.push(Object.freeze({ role: message.role, content: message.content }));
  }

  get messages(): ReadonlyArray<Readonly<ProviderMessage>> {
    return this.history;
  }

  /** Copy of the history for a provider request. */
  snapshot(): ProviderMessage[] {
    return this.history.map((message) => ({ role: message.role, content: message.content }));
  }
}
