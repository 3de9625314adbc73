const MAX_MESSAGE_CHARS = 500;
const MAX_STACK_CHARS = 2000;

export class DataLoadError extends Error {
  readonly source: string;
  readonly path?: string;

  constructor(input: { source: string; message: string; path?: string; cause?: unknown }) {
    super(
      input.path ? `${input.message} at ${input.path} (source=${input.source})` : `${input.message} (source=${input.source})`,
      { cause: input.cause }
    );
    this.name = "DataLoadError";
    this.source = input.source;
    this.path = input.path;
  }
}

export type CompletionFailureReason =
  | "timeout"
  | "http_status"
  | "malformed_response"
  | "empty_response"
  | "network"
  | "not_configured";

export class CompletionProviderError extends Error {
  readonly provider: string;
  readonly reason: CompletionFailureReason;
  readonly status?: number;

  constructor(input: {
    provider: string;
    reason: CompletionFailureReason;
    status?: number;
    message?: string;
    cause?: unknown;
  }) {
    super(input.message ?? `Completion provider ${input.provider} failed: ${input.reason}`, { cause: input.cause });
    this.name = "CompletionProviderError";
    this.provider = input.provider;
    this.reason = input.reason;
    this.status = input.status;
  }
}

export type SerializedError = {
  name: string;
  message: string;
  reason?: string;
  status?: number;
  stack?: string;
};

function truncate(value: string | undefined, maxChars: number): string | undefined {
  if (!value) {
    return undefined;
  }
  return value.length > maxChars ? `${value.slice(0, maxChars)}…` : value;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof CompletionProviderError) {
    return {
      name: error.name,
      message: truncate(error.message, MAX_MESSAGE_CHARS) ?? "Unknown error",
      reason: error.reason,
      status: error.status,
      stack: truncate(error.stack, MAX_STACK_CHARS)
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: truncate(error.message, MAX_MESSAGE_CHARS) ?? "Unknown error",
      stack: truncate(error.stack, MAX_STACK_CHARS)
    };
  }

  return {
    name: "UnknownError",
    message: truncate(String(error), MAX_MESSAGE_CHARS) ?? "Unknown error"
  };
}

export function isTimeoutError(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }
  const withName = error as { name?: unknown; code?: unknown };
  return withName.name === "TimeoutError" || withName.code === "ETIMEDOUT";
}
