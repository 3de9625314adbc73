import { CompletionProviderError, isTimeoutError } from "./errors.js";

export const DEFAULT_COMPLETION_TIMEOUT_MS = 20_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface CompletionProvider {
  readonly name: string;
  readonly configured: boolean;
  complete(prompt: string): Promise<string>;
}

type ProviderRequest = {
  url: string;
  headers: Record<string, string>;
  body: unknown;
};

export type HttpProviderOptions = {
  apiKey?: string;
  baseUrl: string;
  model: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

abstract class HttpCompletionProvider implements CompletionProvider {
  abstract readonly name: string;
  protected readonly apiKey: string | undefined;
  protected readonly baseUrl: string;
  protected readonly model: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  protected constructor(options: HttpProviderOptions) {
    this.apiKey = options.apiKey?.trim() || undefined;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get configured(): boolean {
    return this.apiKey !== undefined;
  }

  protected abstract buildRequest(apiKey: string, prompt: string): ProviderRequest;

  protected abstract extractText(payload: unknown): string | null;

  async complete(prompt: string): Promise<string> {
    if (!this.apiKey) {
      throw new CompletionProviderError({
        provider: this.name,
        reason: "not_configured",
        message: `Completion provider ${this.name} has no API key configured`
      });
    }

    const request = this.buildRequest(this.apiKey, prompt);
    let response: Response;
    try {
      response = await this.fetchImpl(request.url, {
        method: "POST",
        headers: {
          ...request.headers,
          "Content-Type": "application/json"
        },
        body: JSON.stringify(request.body),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new CompletionProviderError({
        provider: this.name,
        reason: isTimeoutError(error) ? "timeout" : "network",
        cause: error
      });
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new CompletionProviderError({
        provider: this.name,
        reason: "http_status",
        status: response.status,
        message: `Completion provider ${this.name} failed: status=${response.status} body=${body.slice(0, 500)}`
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new CompletionProviderError({
        provider: this.name,
        reason: isTimeoutError(error) ? "timeout" : "malformed_response",
        cause: error
      });
    }

    const text = this.extractText(payload);
    if (text === null) {
      throw new CompletionProviderError({ provider: this.name, reason: "malformed_response" });
    }
    if (text.length === 0) {
      throw new CompletionProviderError({ provider: this.name, reason: "empty_response" });
    }
    return text;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function collectTextParts(parts: unknown, key: "content" | "parts"): string[] | null {
  if (!Array.isArray(parts)) {
    return null;
  }
  const segments: string[] = [];
  for (const item of parts) {
    if (!isRecord(item)) {
      continue;
    }
    const nested = item[key];
    if (!Array.isArray(nested)) {
      continue;
    }
    for (const content of nested) {
      if (isRecord(content) && typeof content.text === "string" && content.text.trim().length > 0) {
        segments.push(content.text.trim());
      }
    }
  }
  return segments;
}

export class OpenAIResponsesProvider extends HttpCompletionProvider {
  readonly name = "openai";

  constructor(options: HttpProviderOptions) {
    super(options);
  }

  protected buildRequest(apiKey: string, prompt: string): ProviderRequest {
    return {
      url: `${this.baseUrl}/responses`,
      headers: { Authorization: `Bearer ${apiKey}` },
      body: {
        model: this.model,
        temperature: 0,
        input: [
          {
            role: "user",
            content: [{ type: "input_text", text: prompt }]
          }
        ]
      }
    };
  }

  protected extractText(payload: unknown): string | null {
    if (!isRecord(payload)) {
      return null;
    }
    if (typeof payload.output_text === "string" && payload.output_text.trim().length > 0) {
      return payload.output_text.trim();
    }
    const segments = collectTextParts(payload.output, "content");
    if (segments === null) {
      return typeof payload.output_text === "string" ? "" : null;
    }
    return segments.join("\n").trim();
  }
}

export class GeminiProvider extends HttpCompletionProvider {
  readonly name = "gemini";

  constructor(options: HttpProviderOptions) {
    super(options);
  }

  protected buildRequest(apiKey: string, prompt: string): ProviderRequest {
    return {
      url: `${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent?key=${encodeURIComponent(apiKey)}`,
      headers: {},
      body: {
        contents: [{ role: "user", parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: 0.3,
          maxOutputTokens: 512,
          topP: 0.9,
          topK: 40
        }
      }
    };
  }

  protected extractText(payload: unknown): string | null {
    if (!isRecord(payload) || !Array.isArray(payload.candidates)) {
      return null;
    }
    const [first] = payload.candidates;
    if (first === undefined) {
      return "";
    }
    if (!isRecord(first)) {
      return null;
    }
    const segments = collectTextParts([first.content], "parts");
    return segments === null ? null : segments.join("").trim();
  }
}
