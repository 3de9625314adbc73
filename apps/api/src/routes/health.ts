import type { FastifyPluginAsync } from "fastify";
import type { ServiceCatalog } from "../lib/catalog.js";
import type { CompletionProvider } from "../lib/completion-provider.js";

type HealthRoutesOptions = {
  catalog: ServiceCatalog;
  provider: CompletionProvider;
  now?: () => Date;
};

const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (app, options) => {
  const now = options.now ?? (() => new Date());

  app.get("/health", async () => {
    return {
      status: "healthy",
      completion_provider: options.provider.name,
      api_key: options.provider.configured ? "configured" : "missing",
      catalog: "loaded",
      services: options.catalog.size,
      timestamp: now().toISOString()
    };
  });
};

export default healthRoutes;
