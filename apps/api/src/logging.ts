import type { FastifyBaseLogger } from "fastify";
import type { AnswerStage, CorrelationId } from "@civic-assist/shared";

export type CoreLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export type StructuredLogContext = {
  correlationId?: CorrelationId;
  stage?: AnswerStage;
  provider?: string;
};

export type StructuredLogDetails = {
  elapsedMs?: number;
  matchCount?: number;
  referenceCount?: number;
  serviceCount?: number;
  errorClass?: string;
  errorReason?: string;
  errorMessage?: string;
};

export type StructuredLogEvent = StructuredLogContext & StructuredLogDetails & { event: string };

// Only the known context keys are copied so callers can pass wider objects.
export function toStructuredLogEvent(
  context: StructuredLogContext,
  event: string,
  details: StructuredLogDetails = {}
): StructuredLogEvent {
  return {
    correlationId: context.correlationId,
    stage: context.stage,
    provider: context.provider,
    event,
    ...details
  };
}
