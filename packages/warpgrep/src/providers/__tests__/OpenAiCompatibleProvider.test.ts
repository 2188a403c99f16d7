import test from "node:test";
import assert from "node:assert/strict";
import { ProviderError } from "../../runtime/SearchErrors.js";
import { OpenAiCompatibleProvider } from "../OpenAiCompatibleProvider.js";
import type { ProviderRequest } from "../ProviderTypes.js";

interface CapturedRequest {
  url: string;
  body: string;
  headers: Headers;
}

type FetchHandler = (captured: CapturedRequest, signal?: AbortSignal | null) => Promise<Response>;

const withStubbedFetch = async (handler: FetchHandler, fn: () => Promise<void>): Promise<void> => {
  const original = globalThis.fetch;
  globalThis.fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> =>
    handler(
      {
        url: String(input),
        body: typeof init?.body === "string" ? init.body : "",
        headers: new Headers(init?.headers),
      },
      init?.signal,
    );

  try {
    await fn();
  } finally {
    globalThis.fetch = original;
  }
};

const jsonResponse = (payload: unknown, status = 200): Response =>
  new Response(JSON.stringify(payload), { status, headers: { "content-type": "application/json" } });

const request: ProviderRequest = {
  messages: [
    { role: "system", content: "search agent" },
    { role: "user", content: "find login" },
  ],
  maxTokens: 128,
  temperature: 0,
};

test("OpenAiCompatibleProvider posts chat completions and returns content", { concurrency: false }, async () => {
  const calls: CapturedRequest[] = [];
  await withStubbedFetch(
    async (incoming) => {
      calls.push(incoming);
      return jsonResponse({
        choices: [{ message: { role: "assistant", content: "<grep><pattern>login</pattern></grep>" } }],
        usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
      });
    },
    async () => {
      const provider = new OpenAiCompatibleProvider({
        model: "test-model",
        apiKey: "test-secret",
        baseUrl: "http://127.0.0.1:9999/v1",
      });
      const result = await provider.generate(request);

      assert.equal(result.message.content, "<grep><pattern>login</pattern></grep>");
      assert.deepEqual(result.usage, { inputTokens: 3, outputTokens: 2, totalTokens: 5 });
    },
  );

  const [captured] = calls;
  assert.equal(calls.length, 1);
  assert.equal(captured?.url, "http://127.0.0.1:9999/v1/chat/completions");
  assert.equal(captured?.headers.get("authorization"), "Bearer test-secret");
  assert.deepEqual(JSON.parse(captured?.body ?? "{}"), {
    model: "test-model",
    messages: request.messages,
    temperature: 0,
    max_tokens: 128,
  });
});

test("OpenAiCompatibleProvider omits authorization without a key", { concurrency: false }, async () => {
  const authorizations: Array<string | null> = [];
  await withStubbedFetch(
    async (incoming) => {
      authorizations.push(incoming.headers.get("authorization"));
      return jsonResponse({ choices: [{ message: { content: null } }] });
    },
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model", baseUrl: "http://127.0.0.1:9999/v1/" });
      const result = await provider.generate(request);
      assert.equal(result.message.content, "");
    },
  );
  assert.deepEqual(authorizations, [null]);
});

test("OpenAiCompatibleProvider raises ProviderError on HTTP errors", { concurrency: false }, async () => {
  await withStubbedFetch(
    async () => new Response("rate limited", { status: 429 }),
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model" });
      await assert.rejects(provider.generate(request), (error: unknown) => {
        assert.ok(error instanceof ProviderError);
        assert.equal(error.message, "API error (429): rate limited");
        assert.equal(error.status, 429);
        assert.equal(error.code, "transport");
        return true;
      });
    },
  );
});

test("OpenAiCompatibleProvider rejects responses without choices", { concurrency: false }, async () => {
  await withStubbedFetch(
    async () => jsonResponse({ choices: [] }),
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model" });
      await assert.rejects(provider.generate(request), /Model response missing choices/);
    },
  );
});

test("OpenAiCompatibleProvider reports network failures", { concurrency: false }, async () => {
  await withStubbedFetch(
    async () => {
      throw new TypeError("fetch failed");
    },
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model" });
      await assert.rejects(provider.generate(request), /^ProviderError: Model request failed: fetch failed$/);
    },
  );
});

test("OpenAiCompatibleProvider aborts after the timeout", { concurrency: false }, async () => {
  await withStubbedFetch(
    (_incoming, signal) =>
      new Promise<Response>((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("aborted")));
      }),
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model", timeoutMs: 20 });
      await assert.rejects(provider.generate(request), /Model request timed out after 20ms/);
    },
  );
});
