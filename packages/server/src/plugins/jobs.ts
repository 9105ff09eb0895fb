import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import { JobCoordinator } from "../services/job-coordinator.js";
import { UnitConcurrencyPolicy } from "../services/job-policy.js";
import { JobStore } from "../services/job-store.js";

declare module "fastify" {
  interface FastifyInstance {
    jobs: JobCoordinator;
  }
}

export default fp(async function jobsPlugin(fastify: FastifyInstance) {
  const { maxJobsPerUnit, epochYieldMs } = fastify.serverConfig;
  const coordinator = new JobCoordinator(
    new JobStore(),
    fastify.units,
    fastify.broadcaster,
    new UnitConcurrencyPolicy(maxJobsPerUnit),
    fastify.log,
    { epochYieldMs },
  );

  fastify.decorate("jobs", coordinator);
  fastify.addHook("onClose", async () => {
    await coordinator.shutdown();
  });
});
