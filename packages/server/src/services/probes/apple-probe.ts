import type { Device } from "@neurodeck/shared";
import type { CommandRunner } from "../command-runner.js";
import {
  bytesToMb,
  clampScore,
  mbToGb,
  parseNumber,
  usagePercent,
  type DeviceProbe,
  type HostInfo,
  type LiveDeviceFields,
} from "../device-probe.js";

/**
 * Apple-silicon GPU. Memory is shared with the host, so totals come from
 * the OS and the core count from system_profiler.
 */
export class AppleProbe implements DeviceProbe {
  readonly backend = "unified_memory" as const;
  readonly tag = "metal";

  constructor(
    private runner: CommandRunner,
    private host: HostInfo,
  ) {}

  isAvailable(): boolean {
    return this.host.platform === "darwin" && this.host.arch === "arm64";
  }

  async probe(): Promise<Device[]> {
    const stdout = await this.runner.run("system_profiler", [
      "SPDisplaysDataType",
      "-json",
    ]);
    const entries = displayEntries(JSON.parse(stdout));
    const memoryMb = bytesToMb(this.host.totalMemBytes());
    const live = await this.refresh();

    return entries.map((entry, index) => {
      const cores = parseNumber(entry.sppci_cores) ?? 0;
      return {
        id: `${this.tag}:${index}`,
        name: entry.sppci_model ?? "Apple GPU",
        vendor: "apple",
        backend: this.backend,
        computeUnits: cores,
        memoryMb,
        availableMemoryMb: live.availableMemoryMb,
        memoryUsagePercent: live.memoryUsagePercent,
        driverVersion: `macOS ${this.host.release}`,
        performanceScore: clampScore(mbToGb(memoryMb) * 10 + cores * 15 + 150),
        isDiscrete: false,
        supportsHalfPrecision: true,
        supportsInt8: true,
        maxWorkGroupSize: 1024,
      };
    });
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

interface DisplayEntry {
  sppci_model?: string;
  sppci_cores?: string;
}

function displayEntries(parsed: unknown): DisplayEntry[] {
  if (typeof parsed !== "object" || parsed === null) return [];
  const list: unknown = Reflect.get(parsed, "SPDisplaysDataType");
  if (!Array.isArray(list)) return [];
  const entries: DisplayEntry[] = [];
  for (const item of list) {
    if (typeof item !== "object" || item === null) continue;
    const model: unknown = Reflect.get(item, "sppci_model");
    const cores: unknown = Reflect.get(item, "sppci_cores");
    entries.push({
      sppci_model: typeof model === "string" ? model : undefined,
      sppci_cores:
        typeof cores === "string" || typeof cores === "number" ? String(cores) : undefined,
    });
  }
  return entries;
}
