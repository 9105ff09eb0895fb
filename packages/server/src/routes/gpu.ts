import type { FastifyInstance } from "fastify";
import type {
  BenchmarkResult,
  Device,
  DeviceSelectionResponse,
  DeviceSettingsResponse,
  DeviceView,
  DevicesResponse,
  EngineMemoryResponse,
} from "@neurodeck/shared";
import { benchmarkQuery, preferenceBody, selectDeviceBody } from "../schemas.js";

export default async function gpuRoutes(fastify: FastifyInstance) {
  const { selector, catalog } = fastify;

  function devicesResponse(): DevicesResponse {
    const devices = selector.views();
    return {
      devices,
      selectedDeviceId: selector.current()?.id ?? null,
      gpuAvailable: devices.some((d) => d.backend !== "cpu_fallback"),
      totalDevices: devices.length,
    };
  }

  function selection(device: Device): DeviceSelectionResponse {
    return { device: selector.view(device), preference: selector.currentPreference() };
  }

  /** GET /api/v1/gpu — catalog with live figures for the selected device. */
  fastify.get<{ Reply: DevicesResponse }>("/gpu", async () => {
    await selector.refreshCurrent();
    return devicesResponse();
  });

  /** GET /api/v1/gpu/settings — current device, candidates and preferences. */
  fastify.get<{ Reply: DeviceSettingsResponse }>("/gpu/settings", async () => selector.settings());

  /** POST /api/v1/gpu/discover — re-run every probe. */
  fastify.post<{ Reply: DevicesResponse }>("/gpu/discover", async () => {
    await selector.rediscover();
    return devicesResponse();
  });

  /** GET /api/v1/gpu/benchmark?size&iterations */
  fastify.get<{ Reply: BenchmarkResult }>("/gpu/benchmark", async (request) => {
    const query = benchmarkQuery.parse(request.query);
    return selector.benchmark(
      query.size ?? fastify.serverConfig.benchmarkSize,
      query.iterations ?? fastify.serverConfig.benchmarkIterations,
    );
  });

  /** GET /api/v1/gpu/memory — engine tensor bookkeeping. */
  fastify.get<{ Reply: EngineMemoryResponse }>("/gpu/memory", async () => ({
    deviceId: fastify.engine.boundDeviceId(),
    engineBackend: fastify.engine.backendName(),
    ...fastify.engine.memory(),
  }));

  /** GET /api/v1/gpu/:deviceId */
  fastify.get<{ Params: { deviceId: string }; Reply: DeviceView }>(
    "/gpu/:deviceId",
    async (request) => {
      const { deviceId } = request.params;
      if (selector.current()?.id === deviceId) await selector.refreshCurrent();
      return selector.view(catalog.get(deviceId));
    },
  );

  /** POST /api/v1/gpu/select-device { deviceId } */
  fastify.post<{ Reply: DeviceSelectionResponse }>("/gpu/select-device", async (request) => {
    const { deviceId } = selectDeviceBody.parse(request.body);
    return selection(await selector.selectById(deviceId));
  });

  /** POST /api/v1/gpu/:deviceId/select */
  fastify.post<{ Params: { deviceId: string }; Reply: DeviceSelectionResponse }>(
    "/gpu/:deviceId/select",
    async (request) => {
      return selection(await selector.selectById(request.params.deviceId));
    },
  );

  /** POST /api/v1/gpu/preference { preference } */
  fastify.post<{ Reply: DeviceSelectionResponse }>("/gpu/preference", async (request) => {
    const { preference } = preferenceBody.parse(request.body);
    return selection(await selector.applyPreference(preference));
  });

  /** POST /api/v1/gpu/auto-select */
  fastify.post<{ Reply: DeviceSelectionResponse }>("/gpu/auto-select", async () => {
    return selection(await selector.autoSelect());
  });
}
