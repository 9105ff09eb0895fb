import type { Device } from "@neurodeck/shared";
import type { CommandRunner } from "../command-runner.js";
import {
  clampScore,
  mbToGb,
  parseNumber,
  usagePercent,
  type DeviceProbe,
  type HostInfo,
  type LiveDeviceFields,
} from "../device-probe.js";

const QUERY_FIELDS = [
  "index",
  "name",
  "memory.total",
  "memory.free",
  "utilization.gpu",
  "temperature.gpu",
  "power.draw",
  "driver_version",
  "compute_cap",
];

const LIVE_FIELDS = [
  "memory.total",
  "memory.free",
  "utilization.gpu",
  "temperature.gpu",
  "power.draw",
];

/** Queries nvidia-smi for CUDA-capable devices. */
export class NvidiaProbe implements DeviceProbe {
  readonly backend = "native_accel" as const;
  readonly tag = "cuda";

  constructor(
    private runner: CommandRunner,
    private host: HostInfo,
  ) {}

  isAvailable(): boolean {
    return this.host.platform === "linux" || this.host.platform === "win32";
  }

  async probe(): Promise<Device[]> {
    const stdout = await this.runner.run("nvidia-smi", [
      `--query-gpu=${QUERY_FIELDS.join(",")}`,
      "--format=csv,noheader,nounits",
    ]);
    return csvRows(stdout).map((row) => this.toDevice(row));
  }

  async refresh(device: Device): Promise<Partial<LiveDeviceFields>> {
    const index = device.id.slice(this.tag.length + 1);
    const stdout = await this.runner.run("nvidia-smi", [
      `--id=${index}`,
      `--query-gpu=${LIVE_FIELDS.join(",")}`,
      "--format=csv,noheader,nounits",
    ]);
    const [row] = csvRows(stdout);
    if (!row) return {};
    const [total, free, util, temp, power] = row;
    const memoryMb = parseNumber(total) ?? device.memoryMb;
    const availableMemoryMb = parseNumber(free) ?? device.availableMemoryMb;
    return {
      availableMemoryMb,
      memoryUsagePercent: usagePercent(memoryMb, availableMemoryMb),
      utilizationPercent: parseNumber(util),
      temperatureC: parseNumber(temp),
      powerW: parseNumber(power),
    };
  }

  private toDevice(row: string[]): Device {
    const [index, name, total, free, util, temp, power, driver, cap] = row;
    const memoryMb = parseNumber(total) ?? 0;
    const availableMemoryMb = parseNumber(free) ?? memoryMb;
    const capability = parseNumber(cap) ?? 0;

    return {
      id: `${this.tag}:${parseNumber(index) ?? 0}`,
      name: name || "NVIDIA GPU",
      vendor: "nvidia",
      backend: this.backend,
      // nvidia-smi does not report the SM count
      computeUnits: 0,
      memoryMb,
      availableMemoryMb,
      memoryUsagePercent: usagePercent(memoryMb, availableMemoryMb),
      utilizationPercent: parseNumber(util),
      temperatureC: parseNumber(temp),
      powerW: parseNumber(power),
      driverVersion: driver || "unknown",
      computeCapability: cap && capability > 0 ? cap : undefined,
      performanceScore: clampScore(mbToGb(memoryMb) * 25 + capability * 60),
      isDiscrete: true,
      supportsHalfPrecision: capability >= 5.3,
      supportsInt8: capability >= 6.1,
      maxWorkGroupSize: 1024,
    };
  }
}

function csvRows(stdout: string): string[][] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => line.split(",").map((cell) => cell.trim()));
}
