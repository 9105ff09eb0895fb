import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import { isDevicePreference } from "../config.js";
import { errorMessage } from "../errors.js";
import { ExecFileRunner } from "../services/command-runner.js";
import { DeviceCatalog } from "../services/device-catalog.js";
import { nodeHostInfo, type DeviceProbe } from "../services/device-probe.js";
import { DeviceSelector } from "../services/device-selector.js";
import { AppleProbe } from "../services/probes/apple-probe.js";
import { CpuProbe } from "../services/probes/cpu-probe.js";
import { NvidiaProbe } from "../services/probes/nvidia-probe.js";
import { OpenClProbe } from "../services/probes/opencl-probe.js";
import { RocmProbe } from "../services/probes/rocm-probe.js";

declare module "fastify" {
  interface FastifyInstance {
    catalog: DeviceCatalog;
    selector: DeviceSelector;
  }
}

export interface DevicesPluginOptions {
  /** Replaces the host probes, e.g. with stubs in tests. */
  probes?: { accelerators: DeviceProbe[]; cpu: DeviceProbe };
}

function defaultProbes(timeoutMs: number): { accelerators: DeviceProbe[]; cpu: DeviceProbe } {
  const runner = new ExecFileRunner(timeoutMs);
  return {
    accelerators: [
      new NvidiaProbe(runner, nodeHostInfo),
      new RocmProbe(runner, nodeHostInfo),
      new OpenClProbe(runner),
      new AppleProbe(runner, nodeHostInfo),
    ],
    cpu: new CpuProbe(nodeHostInfo),
  };
}

export default fp<DevicesPluginOptions>(async function devicesPlugin(
  fastify: FastifyInstance,
  opts: DevicesPluginOptions,
) {
  const config = fastify.serverConfig;
  const probes = opts.probes ?? defaultProbes(config.probeTimeoutMs);
  const catalog = new DeviceCatalog(probes.accelerators, probes.cpu, fastify.log);
  const selector = new DeviceSelector(catalog, fastify.engine, fastify.log);

  await catalog.discover();

  const preference = isDevicePreference(config.devicePreference)
    ? config.devicePreference
    : "auto";
  try {
    await selector.applyPreference(preference);
  } catch (err) {
    fastify.log.warn(
      { preference, err: errorMessage(err) },
      "Configured device preference cannot be satisfied, falling back to auto",
    );
    await selector.autoSelect();
  }

  fastify.decorate("catalog", catalog);
  fastify.decorate("selector", selector);
});
