import os from "node:os";
import type { FastifyInstance } from "fastify";
import type {
  DetailedHealthResponse,
  HealthResponse,
  RootResponse,
} from "@neurodeck/shared";
import { API_PREFIX, SERVICE_NAME, SERVICE_VERSION } from "../config.js";

function hostMemoryPercent(): number {
  const total = os.totalmem();
  return Math.round(((total - os.freemem()) / total) * 1000) / 10;
}

/** One-minute load average as a share of all cores; 0 where unsupported. */
function hostCpuPercent(): number {
  const [load] = os.loadavg();
  const cores = os.cpus().length || 1;
  return Math.min(100, Math.round((load / cores) * 1000) / 10);
}

export default async function healthRoutes(fastify: FastifyInstance) {
  /** GET / — service banner. */
  fastify.get<{ Reply: RootResponse }>("/", async () => ({
    name: SERVICE_NAME,
    version: SERVICE_VERSION,
    status: "running",
    health: `${API_PREFIX}/health`,
    websocket: "/ws",
  }));

  /** GET /api/v1/health — liveness plus host load. */
  fastify.get<{ Reply: HealthResponse }>(`${API_PREFIX}/health`, async () => {
    const accelerators = fastify.catalog.list().filter((d) => d.backend !== "cpu_fallback");
    return {
      status: "healthy",
      version: SERVICE_VERSION,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      gpuAvailable: accelerators.length > 0,
      gpuCount: accelerators.length,
      memoryUsagePercent: hostMemoryPercent(),
      cpuUsagePercent: hostCpuPercent(),
    };
  });

  /** GET /api/v1/health/detailed — per-component counters. */
  fastify.get<{ Reply: DetailedHealthResponse }>(`${API_PREFIX}/health/detailed`, async () => {
    const builders = fastify.builders.list();
    return {
      status: "healthy",
      components: {
        devices: {
          discovered: fastify.catalog.list().length,
          selectedDeviceId: fastify.selector.current()?.id ?? null,
          engineBackend: fastify.engine.backendName(),
        },
        units: { activeModels: fastify.units.count() },
        jobs: {
          total: fastify.jobs.list().length,
          running: fastify.jobs.list("running").length,
        },
        builders: {
          loaded: builders.length,
          enabled: builders.filter((b) => b.enabled).length,
        },
        connections: {
          global: fastify.broadcaster.connectionCount(),
          subscribedJobs: fastify.broadcaster.subscribedJobCount(),
        },
      },
    };
  });
}
