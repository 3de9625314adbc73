import {
  newCorrelationId,
  type CorrelationId,
  type MatchResult,
  type ResponseEnvelope
} from "@civic-assist/shared";
import { toStructuredLogEvent, type CoreLogger } from "../logging.js";
import type { ServiceCatalog } from "./catalog.js";
import type { CompletionProvider } from "./completion-provider.js";
import { CompletionProviderError, isTimeoutError } from "./errors.js";
import { matchServices, type MatchWeights } from "./matcher.js";
import { composePrompt } from "./prompt.js";

export type AnswerOrchestratorOptions = {
  catalog: ServiceCatalog;
  provider: CompletionProvider;
  logger: CoreLogger;
  matchLimit?: number;
  weights?: MatchWeights;
  now?: () => Date;
};

export type AnswerOptions = {
  correlationId?: CorrelationId;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Returns the candidate ids that appear in `text` as whole tokens, in
 * candidate order. `service-41` does not match inside `service-410`.
 */
export function extractServiceReferences(text: string, candidateIds: readonly string[]): string[] {
  const references: string[] = [];
  for (const id of candidateIds) {
    if (references.includes(id)) {
      continue;
    }
    const pattern = new RegExp(`(?<![A-Za-z0-9_-])${escapeRegExp(id)}(?![A-Za-z0-9_-])`);
    if (pattern.test(text)) {
      references.push(id);
    }
  }
  return references;
}

export class AnswerOrchestrator {
  private readonly catalog: ServiceCatalog;
  private readonly provider: CompletionProvider;
  private readonly logger: CoreLogger;
  private readonly matchLimit: number | undefined;
  private readonly weights: MatchWeights | undefined;
  private readonly now: () => Date;

  constructor(options: AnswerOrchestratorOptions) {
    this.catalog = options.catalog;
    this.provider = options.provider;
    this.logger = options.logger;
    this.matchLimit = options.matchLimit;
    this.weights = options.weights;
    this.now = options.now ?? (() => new Date());
  }

  match(question: string): MatchResult {
    return matchServices(question, this.catalog, { limit: this.matchLimit, weights: this.weights });
  }

  async answer(question: string, options: AnswerOptions = {}): Promise<ResponseEnvelope> {
    const correlationId = options.correlationId ?? newCorrelationId();
    const context = { correlationId, provider: this.provider.name };
    const matchResult = this.match(question);
    const shortlistIds = matchResult.matches.map((match) => match.record.id);

    this.logger.debug(
      toStructuredLogEvent({ ...context, stage: "match" }, "services_matched", {
        matchCount: shortlistIds.length
      }),
      "Matched catalog services"
    );

    const prompt = composePrompt(question, matchResult);
    const startedAt = Date.now();

    let rawText: string;
    try {
      rawText = await this.provider.complete(prompt);
      if (rawText.trim().length === 0) {
        throw new CompletionProviderError({ provider: this.provider.name, reason: "empty_response" });
      }
    } catch (error) {
      const providerError =
        error instanceof CompletionProviderError
          ? error
          : new CompletionProviderError({
              provider: this.provider.name,
              reason: isTimeoutError(error) ? "timeout" : "network",
              cause: error
            });

      this.logger.error(
        toStructuredLogEvent({ ...context, stage: "complete" }, "completion_failed", {
          elapsedMs: Date.now() - startedAt,
          errorClass: providerError.name,
          errorReason: providerError.reason,
          errorMessage: providerError.message
        }),
        "Completion provider call failed"
      );
      throw providerError;
    }

    const serviceReferences = extractServiceReferences(rawText, shortlistIds);

    this.logger.info(
      toStructuredLogEvent({ ...context, stage: "extract_references" }, "answer_completed", {
        elapsedMs: Date.now() - startedAt,
        matchCount: shortlistIds.length,
        referenceCount: serviceReferences.length
      }),
      "Generated answer"
    );

    return {
      response: rawText,
      timestamp: this.now().toISOString(),
      serviceReferences
    };
  }
}
