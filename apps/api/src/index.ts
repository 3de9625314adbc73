import { buildApp } from "./app.js";
import { ServiceCatalog, JsonFileServiceLoader } from "./lib/catalog.js";
import { createCompletionProvider, loadApiConfig } from "./lib/config.js";
import { serializeError } from "./lib/errors.js";
import { toStructuredLogEvent } from "./logging.js";

async function main() {
  const config = loadApiConfig();
  const catalog = await ServiceCatalog.load(new JsonFileServiceLoader(), config.catalogPath);
  const provider = createCompletionProvider(config.completion);

  const app = await buildApp({
    catalog,
    provider,
    logLevel: config.logLevel,
    matchLimit: config.matchLimit
  });

  app.log.info(
    toStructuredLogEvent({ provider: provider.name }, "catalog_loaded", { serviceCount: catalog.size }),
    "Service catalog loaded"
  );
  if (!provider.configured) {
    app.log.warn({ provider: provider.name }, "Completion provider API key missing; chat requests will fail");
  }

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.error({ error: serializeError(err) }, "api failed to listen");
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  // Startup failed before the Fastify logger existed (bad config or catalog).
  // eslint-disable-next-line no-console
  console.error(JSON.stringify({ event: "startup_failed", error: serializeError(err) }));
  process.exit(1);
});
