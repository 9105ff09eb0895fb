import type { Device } from "@neurodeck/shared";
import type { CommandRunner } from "../command-runner.js";
import {
  bytesToMb,
  clampScore,
  mbToGb,
  parseNumber,
  vendorFromName,
  type DeviceProbe,
} from "../device-probe.js";

type RawDevice = Map<string, string>;

/**
 * Enumerates GPU-type OpenCL devices from `clinfo --raw`. Lines look like
 * `[NV/0] CL_DEVICE_NAME  NVIDIA GeForce RTX 3080`; platform-level lines
 * use `*` in place of the device index.
 */
export class OpenClProbe implements DeviceProbe {
  readonly backend = "open_compute" as const;
  readonly tag = "opencl";

  constructor(private runner: CommandRunner) {}

  isAvailable(): boolean {
    return true;
  }

  async probe(): Promise<Device[]> {
    const stdout = await this.runner.run("clinfo", ["--raw"]);
    const gpus = parseClinfo(stdout).filter((raw) =>
      /GPU/.test(raw.get("CL_DEVICE_TYPE") ?? ""),
    );
    return gpus.map((raw, index) => this.toDevice(index, raw));
  }

  private toDevice(index: number, raw: RawDevice): Device {
    const name = raw.get("CL_DEVICE_NAME") ?? "OpenCL device";
    const memoryMb = bytesToMb(parseNumber(raw.get("CL_DEVICE_GLOBAL_MEM_SIZE")) ?? 0);
    const computeUnits = parseNumber(raw.get("CL_DEVICE_MAX_COMPUTE_UNITS")) ?? 0;
    const extensions = raw.get("CL_DEVICE_EXTENSIONS") ?? "";
    const isDiscrete = raw.get("CL_DEVICE_HOST_UNIFIED_MEMORY") !== "CL_TRUE";

    return {
      id: `${this.tag}:${index}`,
      name,
      vendor: vendorFromName(raw.get("CL_DEVICE_VENDOR") ?? "", name),
      backend: this.backend,
      computeUnits,
      memoryMb,
      // OpenCL has no free-memory query
      availableMemoryMb: memoryMb,
      memoryUsagePercent: 0,
      driverVersion: raw.get("CL_DRIVER_VERSION") ?? "unknown",
      performanceScore: clampScore(
        mbToGb(memoryMb) * 20 + computeUnits * 2 + (isDiscrete ? 50 : 0),
      ),
      isDiscrete,
      supportsHalfPrecision: extensions.includes("cl_khr_fp16"),
      supportsInt8: extensions.includes("cl_khr_integer_dot_product"),
      maxWorkGroupSize: parseNumber(raw.get("CL_DEVICE_MAX_WORK_GROUP_SIZE")) ?? 0,
    };
  }
}

/** Group `clinfo --raw` lines into per-device property maps, in output order. */
export function parseClinfo(stdout: string): RawDevice[] {
  const devices = new Map<string, RawDevice>();
  for (const line of stdout.split("\n")) {
    const match = line.match(/^\s*\[([^/\]]+)\/(\d+)\]\s+(CL_\w+)\s*(.*)$/);
    if (!match) continue;
    const [, platform, index, key, value] = match;
    const deviceKey = `${platform}/${index}`;
    let device = devices.get(deviceKey);
    if (!device) {
      device = new Map();
      devices.set(deviceKey, device);
    }
    if (!device.has(key)) device.set(key, value.trim());
  }
  return [...devices.values()];
}
