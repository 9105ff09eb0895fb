import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import { BuilderRegistry } from "../services/builder-registry.js";
import { cnnBuilder } from "../services/builders/cnn-builder.js";
import { mlpBuilder } from "../services/builders/mlp-builder.js";
import { rnnBuilder } from "../services/builders/rnn-builder.js";

declare module "fastify" {
  interface FastifyInstance {
    builders: BuilderRegistry;
  }
}

export default fp(async function buildersPlugin(fastify: FastifyInstance) {
  const registry = new BuilderRegistry(
    fastify.serverConfig.buildersDir,
    [mlpBuilder, rnnBuilder, cnnBuilder],
    fastify.log,
  );
  await registry.load();
  fastify.decorate("builders", registry);
});
