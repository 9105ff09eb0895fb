import type { FastifyInstance } from "fastify";
import type {
  DeleteUnitResponse,
  ExportResponse,
  UnitResponse,
  UnitsListResponse,
} from "@neurodeck/shared";
import { createUnitBody, exportQuery, listUnitsQuery, updateUnitBody } from "../schemas.js";
import { resolveExportFormat } from "../services/unit-registry.js";

export default async function modelsRoutes(fastify: FastifyInstance) {
  const { units } = fastify;

  /** POST /api/v1/models — build a unit on the current device. */
  fastify.post<{ Reply: UnitResponse }>("/models", async (request, reply) => {
    const body = createUnitBody.parse(request.body);
    const id = await units.create(
      body.name,
      body.modelType,
      body.architecture,
      body.hyperparameters,
      body.description,
    );
    return reply.status(201).send({ model: units.get(id) });
  });

  /** GET /api/v1/models?skip&limit */
  fastify.get<{ Reply: UnitsListResponse }>("/models", async (request) => {
    const { skip, limit } = listUnitsQuery.parse(request.query);
    return { models: units.list(skip, limit), total: units.count() };
  });

  /** GET /api/v1/models/:modelId */
  fastify.get<{ Params: { modelId: string }; Reply: UnitResponse }>(
    "/models/:modelId",
    async (request) => ({ model: units.get(request.params.modelId) }),
  );

  /** PUT /api/v1/models/:modelId — rename, describe or retag. */
  fastify.put<{ Params: { modelId: string }; Reply: UnitResponse }>(
    "/models/:modelId",
    async (request) => {
      const patch = updateUnitBody.parse(request.body);
      return { model: await units.update(request.params.modelId, patch) };
    },
  );

  /** DELETE /api/v1/models/:modelId — refused while a job holds the unit. */
  fastify.delete<{ Params: { modelId: string }; Reply: DeleteUnitResponse }>(
    "/models/:modelId",
    async (request) => {
      const { modelId } = request.params;
      await units.delete(modelId);
      return { modelId, deleted: true };
    },
  );

  /** POST /api/v1/models/:modelId/export?format=native|json */
  fastify.post<{ Params: { modelId: string }; Reply: ExportResponse }>(
    "/models/:modelId/export",
    async (request) => {
      const { modelId } = request.params;
      const { format } = exportQuery.parse(request.query);
      const exportPath = await units.export(modelId, format);
      return { modelId, format: resolveExportFormat(format), exportPath };
    },
  );
}
