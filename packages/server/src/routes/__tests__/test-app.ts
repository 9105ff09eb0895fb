import fsp from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { fileURLToPath } from "node:url";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../../app.js";
import type { ServerConfig } from "../../config.js";
import { CPU_DEVICE, FakeEngine, StubProbe, makeDevice } from "../../services/__tests__/fakes.js";

// ---------------------------------------------------------------------------
// In-process app for route tests
// ---------------------------------------------------------------------------

const BUILDERS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../../builders",
);

export const AMD_GPU = makeDevice({
  id: "opencl:0",
  name: "Test Radeon",
  vendor: "amd",
  performanceScore: 500,
});

const cleanups: string[] = [];

export async function cleanupTmpDirs(): Promise<void> {
  for (const dir of cleanups.splice(0)) {
    await fsp.rm(dir, { recursive: true, force: true });
  }
}

export function testConfig(dataDir: string): ServerConfig {
  return {
    port: 8000,
    host: "localhost",
    logLevel: "silent",
    logPretty: false,
    projectRoot: dataDir,
    dataDir,
    buildersDir: BUILDERS_DIR,
    devicePreference: "auto",
    probeTimeoutMs: 1000,
    benchmarkSize: 16,
    benchmarkIterations: 1,
    epochYieldMs: 0,
    deliveryTimeoutMs: 1000,
    heartbeatIntervalMs: 60_000,
    maxJobsPerUnit: 1,
  };
}

export async function buildTestApp(
  engine = new FakeEngine(),
  overrides: Partial<ServerConfig> = {},
): Promise<{ app: FastifyInstance; engine: FakeEngine; dataDir: string }> {
  const dataDir = await fsp.mkdtemp(path.join(os.tmpdir(), "route-test-"));
  cleanups.push(dataDir);
  const app = await buildApp({
    config: { ...testConfig(dataDir), ...overrides },
    engine,
    probes: {
      accelerators: [new StubProbe("open_compute", "opencl", [AMD_GPU])],
      cpu: new StubProbe("cpu_fallback", "cpu", [CPU_DEVICE]),
    },
  });
  await app.ready();
  return { app, engine, dataDir };
}

/** Create a 4→8→3 MLP and return its id. */
export async function createTinyModel(app: FastifyInstance, name = "tiny"): Promise<string> {
  const resp = await app.inject({
    method: "POST",
    url: "/api/v1/models",
    payload: { name, modelType: "mlp", architecture: { layers: [4, 8, 3] } },
  });
  if (resp.statusCode !== 201) throw new Error(`create failed: ${resp.body}`);
  return resp.json().model.id;
}
