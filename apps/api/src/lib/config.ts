import { fileURLToPath } from "node:url";
import {
  DEFAULT_COMPLETION_TIMEOUT_MS,
  GeminiProvider,
  OpenAIResponsesProvider,
  type CompletionProvider,
  type FetchLike
} from "./completion-provider.js";
import { DEFAULT_MATCH_LIMIT, MAX_MATCH_LIMIT } from "./matcher.js";

const DEFAULT_PORT = 8086;
const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../../data/services.json", import.meta.url));

export type CompletionProviderName = "openai" | "gemini";

export type ApiConfig = {
  port: number;
  host: string;
  logLevel: string;
  catalogPath: string;
  matchLimit: number;
  completion: {
    provider: CompletionProviderName;
    apiKey?: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };
};

function parsePositiveInteger(name: string, value: string | undefined, fallback: number): number {
  if (!value?.trim()) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }

  return parsed;
}

function parseProviderName(value: string | undefined): CompletionProviderName {
  const normalized = value?.trim().toLowerCase() || "openai";
  if (normalized !== "openai" && normalized !== "gemini") {
    throw new Error("COMPLETION_PROVIDER must be one of: openai, gemini");
  }
  return normalized;
}

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const provider = parseProviderName(env.COMPLETION_PROVIDER);
  const matchLimit = parsePositiveInteger("MATCH_LIMIT", env.MATCH_LIMIT, DEFAULT_MATCH_LIMIT);
  if (matchLimit > MAX_MATCH_LIMIT) {
    throw new Error(`MATCH_LIMIT must be at most ${MAX_MATCH_LIMIT}`);
  }

  const port = parsePositiveInteger("PORT", env.PORT, DEFAULT_PORT);
  if (port > 65_535) {
    throw new Error("PORT must be at most 65535");
  }

  const timeoutMs = parsePositiveInteger("COMPLETION_TIMEOUT_MS", env.COMPLETION_TIMEOUT_MS, DEFAULT_COMPLETION_TIMEOUT_MS);

  const completion =
    provider === "openai"
      ? {
          provider,
          apiKey: env.OPENAI_API_KEY?.trim() || undefined,
          baseUrl: env.OPENAI_API_BASE_URL?.trim() || "https://api.openai.com/v1",
          model: env.OPENAI_RESPONSES_MODEL?.trim() || env.OPENAI_MODEL?.trim() || "gpt-4.1-mini",
          timeoutMs
        }
      : {
          provider,
          apiKey: env.GEMINI_API_KEY?.trim() || undefined,
          baseUrl: env.GEMINI_API_BASE_URL?.trim() || "https://generativelanguage.googleapis.com/v1beta",
          model: env.GEMINI_MODEL?.trim() || "gemini-2.0-flash",
          timeoutMs
        };

  return {
    port,
    host: env.HOST?.trim() || "0.0.0.0",
    logLevel: env.LOG_LEVEL?.trim() || "info",
    catalogPath: env.CATALOG_PATH?.trim() || DEFAULT_CATALOG_PATH,
    matchLimit,
    completion
  };
}

export function createCompletionProvider(config: ApiConfig["completion"], fetchImpl?: FetchLike): CompletionProvider {
  const options = {
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    model: config.model,
    timeoutMs: config.timeoutMs,
    fetchImpl
  };
  return config.provider === "gemini" ? new GeminiProvider(options) : new OpenAIResponsesProvider(options);
}
