import type { FastifyPluginAsync } from "fastify";
import { newCorrelationId, parseCorrelationId } from "@civic-assist/shared";
import type { AnswerOrchestrator } from "../lib/answer.js";
import { CompletionProviderError, serializeError } from "../lib/errors.js";

export const MAX_MESSAGE_CHARS = 2000;
export const PROVIDER_FALLBACK_MESSAGE =
  "Sorry, I'm having trouble answering right now. Please try again in a little while.";

type ChatBody = {
  message?: unknown;
};

type ChatRoutesOptions = {
  orchestrator: AnswerOrchestrator;
};

function readMessage(value: unknown): string | null {
  if (typeof value !== "string" || value.trim().length === 0) {
    return null;
  }
  return value;
}

const chatRoutes: FastifyPluginAsync<ChatRoutesOptions> = async (app, options) => {
  app.post<{ Body: ChatBody }>("/chat", async (request, reply) => {
    const message = readMessage(request.body?.message);
    if (!message) {
      return reply.code(400).send({ error: "Message cannot be empty" });
    }
    if (message.trim().length > MAX_MESSAGE_CHARS) {
      return reply.code(400).send({ error: `Message must be at most ${MAX_MESSAGE_CHARS} characters` });
    }

    const correlationId = parseCorrelationId(request.headers["x-correlation-id"]) ?? newCorrelationId();
    request.log.info({ correlationId, preview: message.slice(0, 50) }, "Received chat request");

    try {
      const envelope = await options.orchestrator.answer(message, { correlationId });
      return reply.send({
        response: envelope.response,
        timestamp: envelope.timestamp,
        service_references: envelope.serviceReferences
      });
    } catch (error) {
      if (error instanceof CompletionProviderError) {
        return reply.code(502).send({ error: "completion_provider_failed", response: PROVIDER_FALLBACK_MESSAGE });
      }
      request.log.error({ error: serializeError(error), correlationId }, "Chat request failed");
      return reply.code(500).send({ error: "Failed to generate response" });
    }
  });
};

export default chatRoutes;
