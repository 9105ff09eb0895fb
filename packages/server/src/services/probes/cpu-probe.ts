import type { Device } from "@neurodeck/shared";
import {
  bytesToMb,
  clampScore,
  mbToGb,
  usagePercent,
  vendorFromName,
  type DeviceProbe,
  type HostInfo,
  type LiveDeviceFields,
} from "../device-probe.js";

const CPU_SCORE_CAP = 200;

/** The host CPU. Always available; the catalog always lists it. */
export class CpuProbe implements DeviceProbe {
  readonly backend = "cpu_fallback" as const;
  readonly tag = "cpu";

  constructor(private host: HostInfo) {}

  isAvailable(): boolean {
    return true;
  }

  async probe(): Promise<Device[]> {
    const models = this.host.cpuModels();
    const cores = Math.max(1, models.length);
    const name = models[0]?.trim() || "CPU";
    const memoryMb = bytesToMb(this.host.totalMemBytes());
    const live = await this.refresh();

    return [
      {
        id: `${this.tag}:0`,
        name,
        vendor: vendorFromName(name),
        backend: this.backend,
        computeUnits: cores,
        memoryMb,
        availableMemoryMb: live.availableMemoryMb,
        memoryUsagePercent: live.memoryUsagePercent,
        driverVersion: `${this.host.platform}-${this.host.arch} ${this.host.release}`,
        performanceScore: clampScore(
          Math.min(CPU_SCORE_CAP, cores * 5 + mbToGb(memoryMb)),
        ),
        isDiscrete: false,
        supportsHalfPrecision: false,
        supportsInt8: true,
        maxWorkGroupSize: cores,
      },
    ];
  }

  async refresh(): Promise<Pick<LiveDeviceFields, "availableMemoryMb" | "memoryUsagePercent">> {
    const memoryMb = bytesToMb(this.host.totalMemBytes());
    const availableMemoryMb = bytesToMb(this.host.freeMemBytes());
    return {
      availableMemoryMb,
      memoryUsagePercent: usagePercent(memoryMb, availableMemoryMb),
    };
  }
}

/** Minimal CPU record used when the CPU probe itself fails. */
export function fallbackCpuDevice(): Device {
  return {
    id: "cpu:0",
    name: "CPU",
    vendor: "unknown",
    backend: "cpu_fallback",
    computeUnits: 1,
    memoryMb: 0,
    availableMemoryMb: 0,
    memoryUsagePercent: 0,
    driverVersion: "unknown",
    performanceScore: 0,
    isDiscrete: false,
    supportsHalfPrecision: false,
    supportsInt8: false,
    maxWorkGroupSize: 1,
  };
}
