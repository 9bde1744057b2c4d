import Fastify, {
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest
} from "fastify";
import cors from "@fastify/cors";
import type { Logger } from "@geonews/logger";
import {
  CircuitState,
  HttpEntityAnalyzer,
  type EntityAnalyzer,
  type RetrievalEngine
} from "@geonews/retrieval";
import type { Repositories } from "@geonews/store";

import enginePlugin from "./plugins/engine.js";
import errorsPlugin from "./plugins/errors.js";
import storePlugin from "./plugins/store.js";
import { registerNewsRoutes } from "./modules/news/routes.js";
import type { RetrievalSettings } from "./modules/news/schemas.js";
import { metrics } from "./metrics/registry.js";

declare module "fastify" {
  interface FastifyRequest {
    metricsStopTimer?: ReturnType<typeof metrics.httpRequestDuration.startTimer>;
  }
}

export type ServerDependencies = {
  logger: Logger;
  repositories: Repositories;
  storeKind: "postgres" | "memory";
  engine: RetrievalEngine;
  analyzer: EntityAnalyzer;
  retrieval: RetrievalSettings;
};

export function nlpStatus(analyzer: EntityAnalyzer) {
  if (!(analyzer instanceof HttpEntityAnalyzer)) {
    return "disabled";
  }
  return analyzer.getCircuitState() === CircuitState.OPEN ? "degraded" : "up";
}

export async function buildServer(deps: ServerDependencies) {
  const server = Fastify({
    logger: false,
    loggerInstance: deps.logger
  }) as unknown as FastifyInstance;

  await server.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
    credentials: false
  });
  await server.register(errorsPlugin);
  await server.register(storePlugin, { repositories: deps.repositories });
  await server.register(enginePlugin, { engine: deps.engine });

  server.addHook("onRequest", (request, _reply, done) => {
    const route = request.routeOptions.url ?? request.url;
    request.metricsStopTimer = metrics.httpRequestDuration.startTimer({
      method: request.method,
      route,
      status_code: "pending"
    });
    done();
  });

  server.addHook(
    "onResponse",
    (request: FastifyRequest, reply: FastifyReply, done) => {
      const statusCode = reply.statusCode.toString();
      const route = request.routeOptions.url ?? request.url;

      metrics.httpRequestCounter.inc({
        method: request.method,
        route,
        status_code: statusCode
      });

      if (request.metricsStopTimer) {
        request.metricsStopTimer({
          method: request.method,
          route,
          status_code: statusCode
        });
      }

      done();
    }
  );

  server.get("/health", async () => {
    return {
      status: "ok",
      service: "api",
      timestamp: new Date().toISOString(),
      checks: {
        store: await verifyStore(server),
        storeKind: deps.storeKind,
        nlp: nlpStatus(deps.analyzer)
      }
    };
  });

  server.get("/metrics", async (_, reply) => {
    reply.header("Content-Type", metrics.registry.contentType);
    return metrics.registry.metrics();
  });

  await registerNewsRoutes(server, deps.retrieval);

  return server;
}

async function verifyStore(server: FastifyInstance) {
  try {
    await server.store.articles.count();
    return "up";
  } catch (error) {
    server.log.error({ err: error }, "Store health check failed");
    return "down";
  }
}
