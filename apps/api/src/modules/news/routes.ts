import type { FastifyInstance } from "fastify";
import { v4 as uuidv4 } from "uuid";
import {
  flexibleStrategy,
  type InteractionEvent,
  type RankedStrategy
} from "@geonews/retrieval";

import {
  articleIdParamsSchema,
  createNewsSchemas,
  interactionBodySchema,
  type RetrievalSettings
} from "./schemas.js";
import {
  serializeArticle,
  serializeInteraction,
  serializeQueryResult,
  serializeTrending
} from "./serialize.js";

const PREFIX = "/api/v1/news";

export async function registerNewsRoutes(app: FastifyInstance, settings: RetrievalSettings) {
  const schemas = createNewsSchemas(settings);

  async function listing(strategy: RankedStrategy, limit: number) {
    const articles = await app.engine.retrieve(strategy, { limit });
    return {
      strategy,
      count: articles.length,
      articles: articles.map(serializeArticle)
    };
  }

  app.post(`${PREFIX}/query`, async (request) => {
    const body = schemas.queryBody.parse(request.body);
    const coordinate =
      body.latitude !== undefined && body.longitude !== undefined
        ? { latitude: body.latitude, longitude: body.longitude }
        : undefined;

    const result = await app.engine.query({
      text: body.query,
      coordinate,
      radiusKm: body.radius,
      limit: body.limit,
      filters: body.filters
    });
    return serializeQueryResult(result);
  });

  app.get(`${PREFIX}/category`, async (request) => {
    const query = schemas.categoryQuery.parse(request.query);
    return listing({ kind: "category", category: query.category }, query.limit);
  });

  app.get(`${PREFIX}/source`, async (request) => {
    const query = schemas.sourceQuery.parse(request.query);
    return listing({ kind: "source", source: query.source }, query.limit);
  });

  app.get(`${PREFIX}/search`, async (request) => {
    const query = schemas.searchQuery.parse(request.query);
    return listing({ kind: "search", text: query.q }, query.limit);
  });

  app.get(`${PREFIX}/score`, async (request) => {
    const query = schemas.scoreQuery.parse(request.query);
    return listing({ kind: "score", minScore: query.minScore }, query.limit);
  });

  app.get(`${PREFIX}/nearby`, async (request) => {
    const query = schemas.nearbyQuery.parse(request.query);
    return listing(
      {
        kind: "nearby",
        center: { latitude: query.lat, longitude: query.lon },
        radiusKm: query.radius
      },
      query.limit
    );
  });

  app.get(`${PREFIX}/filter`, async (request) => {
    const query = schemas.filterQuery.parse(request.query);
    const coordinate =
      query.lat !== undefined && query.lon !== undefined
        ? { latitude: query.lat, longitude: query.lon }
        : undefined;

    const strategy = flexibleStrategy(
      {
        category: query.category,
        source: query.source,
        minScore: query.minScore,
        maxScore: query.maxScore
      },
      { text: query.q, coordinate, radiusKm: query.radius }
    );
    return listing(strategy, query.limit);
  });

  app.get(`${PREFIX}/trending`, async (request) => {
    const query = schemas.trendingQuery.parse(request.query);
    const lookup = await app.engine.trending(
      { latitude: query.lat, longitude: query.lon },
      { limit: query.limit, forceRefresh: query.forceRefresh }
    );
    return serializeTrending(lookup);
  });

  app.get(`${PREFIX}/:id`, async (request, reply) => {
    const params = articleIdParamsSchema.parse(request.params);
    const article = await app.store.articles.findById(params.id);

    if (!article) {
      return reply.code(404).send({
        error: "NotFound",
        message: `Article ${params.id} not found`
      });
    }
    return serializeArticle(article);
  });

  app.post(`${PREFIX}/:id/interactions`, async (request, reply) => {
    const params = articleIdParamsSchema.parse(request.params);
    const body = interactionBodySchema.parse(request.body);
    const article = await app.store.articles.findById(params.id);

    if (!article) {
      return reply.code(404).send({
        error: "NotFound",
        message: `Article ${params.id} not found`
      });
    }

    const event: InteractionEvent = {
      id: uuidv4(),
      articleId: article.id,
      kind: body.kind,
      occurredAt: new Date(),
      userId: body.userId ?? null,
      userLocation:
        body.latitude !== undefined && body.longitude !== undefined
          ? { latitude: body.latitude, longitude: body.longitude }
          : null
    };
    await app.store.interactions.append([event]);
    return reply.code(201).send(serializeInteraction(event));
  });
}
