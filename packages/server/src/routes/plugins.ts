import type { FastifyInstance } from "fastify";
import type {
  BuilderCategoriesResponse,
  BuilderResponse,
  BuildersListResponse,
} from "@neurodeck/shared";

export default async function pluginsRoutes(fastify: FastifyInstance) {
  const { builders } = fastify;

  /** GET /api/v1/plugins — every loaded model builder. */
  fastify.get<{ Reply: BuildersListResponse }>("/plugins", async () => {
    const plugins = builders.list();
    return { plugins, total: plugins.length };
  });

  /** GET /api/v1/plugins/categories */
  fastify.get<{ Reply: BuilderCategoriesResponse }>("/plugins/categories", async () => ({
    categories: builders.categories(),
  }));

  /** GET /api/v1/plugins/:pluginId — manifest with its enabled flag. */
  fastify.get<{ Params: { pluginId: string }; Reply: BuilderResponse }>(
    "/plugins/:pluginId",
    async (request) => ({ plugin: builders.get(request.params.pluginId) }),
  );

  fastify.post<{ Params: { pluginId: string }; Reply: BuilderResponse }>(
    "/plugins/:pluginId/enable",
    async (request) => ({ plugin: builders.setEnabled(request.params.pluginId, true) }),
  );

  fastify.post<{ Params: { pluginId: string }; Reply: BuilderResponse }>(
    "/plugins/:pluginId/disable",
    async (request) => ({ plugin: builders.setEnabled(request.params.pluginId, false) }),
  );
}
