import type { FastifyInstance } from "fastify";
import type {
  DeleteJobResponse,
  JobControlResponse,
  JobMetricsReport,
  JobResponse,
  JobsListResponse,
  StartJobResponse,
} from "@neurodeck/shared";
import { listJobsQuery, startJobBody } from "../schemas.js";

export default async function trainingRoutes(fastify: FastifyInstance) {
  const { jobs } = fastify;

  /** POST /api/v1/training/start — returns as soon as the job is queued. */
  fastify.post<{ Reply: StartJobResponse }>("/training/start", async (request, reply) => {
    const body = startJobBody.parse(request.body);
    const jobId = jobs.start(
      body.modelId,
      body.datasetConfig,
      body.trainingConfig,
      body.validationConfig,
    );
    return reply.status(202).send({ jobId, status: jobs.status(jobId).status });
  });

  /** GET /api/v1/training?status= */
  fastify.get<{ Reply: JobsListResponse }>("/training", async (request) => {
    const { status } = listJobsQuery.parse(request.query);
    const list = jobs.list(status);
    return { jobs: list, total: list.length };
  });

  /** GET /api/v1/training/:jobId — full record including history. */
  fastify.get<{ Params: { jobId: string }; Reply: JobResponse }>(
    "/training/:jobId",
    async (request) => ({ job: jobs.status(request.params.jobId) }),
  );

  /** GET /api/v1/training/:jobId/metrics */
  fastify.get<{ Params: { jobId: string }; Reply: JobMetricsReport }>(
    "/training/:jobId/metrics",
    async (request) => jobs.metrics(request.params.jobId),
  );

  fastify.post<{ Params: { jobId: string }; Reply: JobControlResponse }>(
    "/training/:jobId/stop",
    async (request) => jobs.stop(request.params.jobId),
  );

  fastify.post<{ Params: { jobId: string }; Reply: JobControlResponse }>(
    "/training/:jobId/pause",
    async (request) => jobs.pause(request.params.jobId),
  );

  fastify.post<{ Params: { jobId: string }; Reply: JobControlResponse }>(
    "/training/:jobId/resume",
    async (request) => jobs.resume(request.params.jobId),
  );

  /** DELETE /api/v1/training/:jobId — finished jobs only. */
  fastify.delete<{ Params: { jobId: string }; Reply: DeleteJobResponse }>(
    "/training/:jobId",
    async (request) => {
      const { jobId } = request.params;
      jobs.delete(jobId);
      return { jobId, deleted: true };
    },
  );
}
