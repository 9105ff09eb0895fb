import path from "node:path";
import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import { MetadataStore } from "../services/metadata-store.js";
import { TrainableUnitRegistry } from "../services/unit-registry.js";

declare module "fastify" {
  interface FastifyInstance {
    units: TrainableUnitRegistry;
  }
}

export default fp(async function unitsPlugin(fastify: FastifyInstance) {
  const { dataDir } = fastify.serverConfig;
  const units = new TrainableUnitRegistry(
    new MetadataStore(path.join(dataDir, "models")),
    fastify.builders,
    fastify.selector,
    fastify.engine,
    path.join(dataDir, "exports"),
    fastify.log,
  );

  await units.restore();
  fastify.decorate("units", units);
  fastify.addHook("onClose", async () => {
    units.dispose();
  });
});
