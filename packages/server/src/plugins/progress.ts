import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import { errorMessage } from "../errors.js";
import { ProgressBroadcaster } from "../services/progress-broadcaster.js";

declare module "fastify" {
  interface FastifyInstance {
    broadcaster: ProgressBroadcaster;
  }
}

export default fp(async function progressPlugin(fastify: FastifyInstance) {
  const { deliveryTimeoutMs, heartbeatIntervalMs } = fastify.serverConfig;
  const broadcaster = new ProgressBroadcaster(fastify.log, {
    deliveryTimeoutMs,
    heartbeatIntervalMs,
  });

  fastify.selector.onSelection((device) => {
    broadcaster.broadcast({ type: "device_selected", data: device }).catch((err: unknown) => {
      fastify.log.warn({ err: errorMessage(err) }, "Device selection broadcast failed");
    });
  });

  fastify.decorate("broadcaster", broadcaster);
  fastify.addHook("onClose", async () => {
    broadcaster.close();
  });
});
