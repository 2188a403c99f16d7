import { ProviderError } from "../runtime/SearchErrors.js";
import type {
  Provider,
  ProviderConfig,
  ProviderRequest,
  ProviderResponse,
} from "./ProviderTypes.js";

interface OpenAiResponse {
  choices?: Array<{
    message?: {
      role?: string;
      content?: string | null;
    };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

const normalizeBaseUrl = (baseUrl?: string): string => {
  const root = baseUrl ?? "https://api.morphllm.com/v1";
  return root.endsWith("/") ? root : `${root}/`;
};

export class OpenAiCompatibleProvider implements Provider {
  name = "openai-compatible";

  constructor(private config: ProviderConfig) {}

  async generate(request: ProviderRequest): Promise<ProviderResponse> {
    const url = new URL("chat/completions", normalizeBaseUrl(this.config.baseUrl)).toString();

    const headers: Record<string, string> = {
      "content-type": "application/json",
    };
    if (this.config.apiKey) {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    }

    const body = {
      model: this.config.model,
      messages: request.messages.map((message) => ({
        role: message.role,
        content: message.content,
      })),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    };

    const controller = new AbortController();
    const timeoutMs = this.config.timeoutMs ?? 60_000;
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method: "POST",
          headers,
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        if (controller.signal.aborted) {
          throw new ProviderError(`Model request timed out after ${timeoutMs}ms`);
        }
        throw new ProviderError(
          `Model request failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      }

      if (!response.ok) {
        const errorBody = await response.text().catch(() => "");
        throw new ProviderError(`API error (${response.status}): ${errorBody}`, response.status, errorBody);
      }

      const raw = (await response.json()) as OpenAiResponse;
      const choice = raw.choices?.[0]?.message;
      if (!choice) {
        throw new ProviderError("Model response missing choices", response.status);
      }

      return {
        message: {
          role: "assistant",
          content: choice.content ?? "",
        },
        usage: raw.usage
          ? {
              inputTokens: raw.usage.prompt_tokens,
              outputTokens: raw.usage.completion_tokens,
              totalTokens: raw.usage.total_tokens,
            }
          : undefined,
        raw,
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}
