import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import type { RetrievalEngine } from "@geonews/retrieval";

declare module "fastify" {
  interface FastifyInstance {
    engine: RetrievalEngine;
  }
}

export type EnginePluginOptions = {
  engine: RetrievalEngine;
};

async function enginePlugin(fastify: FastifyInstance, options: EnginePluginOptions) {
  fastify.decorate("engine", options.engine);
}

export default fp(enginePlugin, {
  name: "engine"
});
