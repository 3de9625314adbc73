import type { FastifyPluginAsync } from "fastify";
import type { ServiceCatalog } from "../lib/catalog.js";
import { matchServices, resolveMatchLimit } from "../lib/matcher.js";

type SearchQuerystring = {
  query?: unknown;
  limit?: unknown;
};

type ServiceRoutesOptions = {
  catalog: ServiceCatalog;
  now?: () => Date;
};

function asNonEmptyString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function asOptionalLimit(value: unknown): number | undefined {
  if (value == null) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }
  return resolveMatchLimit(parsed);
}

const serviceRoutes: FastifyPluginAsync<ServiceRoutesOptions> = async (app, options) => {
  const now = options.now ?? (() => new Date());

  app.get<{ Querystring: SearchQuerystring }>("/services/search", async (request, reply) => {
    const query = asNonEmptyString(request.query.query);
    if (!query) {
      return reply.code(400).send({ error: "query is required" });
    }

    const result = matchServices(query, options.catalog, { limit: asOptionalLimit(request.query.limit) });
    return reply.send({
      query,
      results: result.matches.map((match) => ({
        id: match.record.id,
        title: match.record.title,
        department: match.record.department ?? null,
        score: match.score
      })),
      timestamp: now().toISOString()
    });
  });

  app.get<{ Params: { id: string } }>("/services/:id", async (request, reply) => {
    const record = options.catalog.get(request.params.id);
    if (!record) {
      return reply.code(404).send({ error: "Service not found" });
    }
    return reply.send(record);
  });
};

export default serviceRoutes;
