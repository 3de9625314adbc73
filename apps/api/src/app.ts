import Fastify, { type FastifyInstance } from "fastify";
import { AnswerOrchestrator } from "./lib/answer.js";
import type { ServiceCatalog } from "./lib/catalog.js";
import type { CompletionProvider } from "./lib/completion-provider.js";
import chatRoutes from "./routes/chat.js";
import healthRoutes from "./routes/health.js";
import serviceRoutes from "./routes/services.js";

export type BuildAppInput = {
  catalog: ServiceCatalog;
  provider: CompletionProvider;
  logLevel?: string;
  matchLimit?: number;
  now?: () => Date;
};

export async function buildApp(input: BuildAppInput): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: input.logLevel ?? "info"
    }
  });

  const orchestrator = new AnswerOrchestrator({
    catalog: input.catalog,
    provider: input.provider,
    logger: app.log,
    matchLimit: input.matchLimit,
    now: input.now
  });

  await app.register(healthRoutes, { catalog: input.catalog, provider: input.provider, now: input.now });
  await app.register(serviceRoutes, { catalog: input.catalog, now: input.now });
  await app.register(chatRoutes, { orchestrator });

  return app;
}
