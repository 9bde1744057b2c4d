import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import type { Repositories } from "@geonews/store";

declare module "fastify" {
  interface FastifyInstance {
    store: Repositories;
  }
}

export type StorePluginOptions = {
  repositories: Repositories;
};

async function storePlugin(fastify: FastifyInstance, options: StorePluginOptions) {
  fastify.decorate("store", options.repositories);

  fastify.addHook("onClose", async () => {
    await options.repositories.close();
  });
}

export default fp(storePlugin, {
  name: "store"
});
