import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import websocket from "@fastify/websocket";
import { API_PREFIX, type ServerConfig } from "./config.js";
import type { DeviceProbe } from "./services/device-probe.js";
import type { NumericEngine } from "./services/numeric-engine.js";
import corsPlugin from "./plugins/cors.js";
import errorHandlerPlugin from "./plugins/error-handler.js";
import enginePlugin from "./plugins/engine.js";
import devicesPlugin from "./plugins/devices.js";
import buildersPlugin from "./plugins/builders.js";
import unitsPlugin from "./plugins/units.js";
import progressPlugin from "./plugins/progress.js";
import jobsPlugin from "./plugins/jobs.js";
import healthRoutes from "./routes/health.js";
import gpuRoutes from "./routes/gpu.js";
import modelsRoutes from "./routes/models.js";
import trainingRoutes from "./routes/training.js";
import pluginsRoutes from "./routes/plugins.js";
import wsRoutes from "./routes/ws.js";

declare module "fastify" {
  interface FastifyInstance {
    serverConfig: ServerConfig;
  }
}

export interface AppOptions {
  config: ServerConfig;
  logger?: FastifyServerOptions["logger"];
  /** Test seams; production uses tfjs and the host probes. */
  engine?: NumericEngine;
  probes?: { accelerators: DeviceProbe[]; cpu: DeviceProbe };
}

/** Construct the server with every component wired. Does not listen. */
export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    bodyLimit: 50 * 1024 * 1024, // inline datasets can be large
    logger: opts.logger ?? false,
  });

  fastify.decorate("serverConfig", opts.config);

  // Plugins (order matters: each component plugin reads the ones before it)
  await fastify.register(corsPlugin);
  await fastify.register(errorHandlerPlugin);
  await fastify.register(websocket);
  await fastify.register(enginePlugin, { engine: opts.engine });
  await fastify.register(devicesPlugin, { probes: opts.probes });
  await fastify.register(buildersPlugin);
  await fastify.register(unitsPlugin);
  await fastify.register(progressPlugin);
  await fastify.register(jobsPlugin);

  // Routes
  await fastify.register(healthRoutes);
  await fastify.register(gpuRoutes, { prefix: API_PREFIX });
  await fastify.register(modelsRoutes, { prefix: API_PREFIX });
  await fastify.register(trainingRoutes, { prefix: API_PREFIX });
  await fastify.register(pluginsRoutes, { prefix: API_PREFIX });
  await fastify.register(wsRoutes);

  return fastify;
}
