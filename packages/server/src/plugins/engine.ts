import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import type { NumericEngine } from "../services/numeric-engine.js";
import { TfjsEngine } from "../services/tfjs-engine.js";

declare module "fastify" {
  interface FastifyInstance {
    engine: NumericEngine;
  }
}

export interface EnginePluginOptions {
  /** Replaces the tfjs engine, e.g. with a test double. */
  engine?: NumericEngine;
}

export default fp<EnginePluginOptions>(async function enginePlugin(
  fastify: FastifyInstance,
  opts: EnginePluginOptions,
) {
  const engine = opts.engine ?? new TfjsEngine(fastify.log);
  fastify.decorate("engine", engine);
  fastify.log.info({ backend: engine.backendName() }, "Numeric engine ready");
});
