export type ProviderRole = "system" | "user" | "assistant";

export interface ProviderMessage {
  role: ProviderRole;
  content: string;
}

export interface ProviderUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface ProviderRequest {
  messages: ProviderMessage[];
  maxTokens?: number;
  temperature?: number;
}

export interface ProviderResponse {
  message: ProviderMessage;
  usage?: ProviderUsage;
  raw?: unknown;
}

export interface ProviderConfig {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface Provider {
  name: string;
  generate(request: ProviderRequest): Promise<ProviderResponse>;
}
