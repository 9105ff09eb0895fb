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

const ROCM_ARGS = [
  "--showproductname",
  "--showmeminfo",
  "vram",
  "--showtemp",
  "--showpower",
  "--showuse",
  "--showdriverversion",
  "--json",
];

type CardFields = Record<string, string>;

/** Reads AMD devices from `rocm-smi --json`. */
export class RocmProbe implements DeviceProbe {
  readonly backend = "vendor_bridge" as const;
  readonly tag = "rocm";

  constructor(
    private runner: CommandRunner,
    private host: HostInfo,
  ) {}

  isAvailable(): boolean {
    return this.host.platform === "linux";
  }

  async probe(): Promise<Device[]> {
    const report = await this.readReport();
    const driver = pick(report.get("system") ?? {}, /driver version/i) ?? "unknown";
    const devices: Device[] = [];
    for (const [key, card] of report) {
      const index = key.match(/^card(\d+)$/)?.[1];
      if (index === undefined) continue;
      devices.push(this.toDevice(Number(index), card, driver));
    }
    return devices.sort((a, b) => a.id.localeCompare(b.id, undefined, { numeric: true }));
  }

  async refresh(device: Device): Promise<Partial<LiveDeviceFields>> {
    const report = await this.readReport();
    const card = report.get(`card${device.id.slice(this.tag.length + 1)}`);
    if (!card) return {};
    return liveFields(card, device.memoryMb);
  }

  private async readReport(): Promise<Map<string, CardFields>> {
    const stdout = await this.runner.run("rocm-smi", ROCM_ARGS);
    const parsed: unknown = JSON.parse(stdout);
    const report = new Map<string, CardFields>();
    if (!isRecord(parsed)) return report;
    for (const [key, value] of Object.entries(parsed)) {
      if (isRecord(value)) report.set(key, stringFields(value));
    }
    return report;
  }

  private toDevice(index: number, card: CardFields, driver: string): Device {
    const memoryMb = bytesToMb(parseNumber(pick(card, /vram total memory/i)) ?? 0);
    const live = liveFields(card, memoryMb);
    const name =
      pick(card, /card series/i) ?? pick(card, /card model/i) ?? "AMD GPU";

    return {
      id: `${this.tag}:${index}`,
      name,
      vendor: "amd",
      backend: this.backend,
      computeUnits: 0,
      memoryMb,
      availableMemoryMb: live.availableMemoryMb,
      memoryUsagePercent: live.memoryUsagePercent,
      temperatureC: live.temperatureC,
      powerW: live.powerW,
      utilizationPercent: live.utilizationPercent,
      driverVersion: driver,
      performanceScore: clampScore(mbToGb(memoryMb) * 25 + 100),
      isDiscrete: true,
      supportsHalfPrecision: true,
      supportsInt8: true,
      maxWorkGroupSize: 1024,
    };
  }
}

function liveFields(card: CardFields, memoryMb: number): LiveDeviceFields {
  const usedMb = bytesToMb(parseNumber(pick(card, /vram total used memory/i)) ?? 0);
  const availableMemoryMb = Math.max(0, memoryMb - usedMb);
  return {
    availableMemoryMb,
    memoryUsagePercent: usagePercent(memoryMb, availableMemoryMb),
    temperatureC: parseNumber(pick(card, /^temperature.*\(c\)$/i)),
    powerW: parseNumber(pick(card, /power.*\(w\)$/i)),
    utilizationPercent: parseNumber(pick(card, /gpu use \(%\)/i)),
  };
}

function pick(fields: CardFields, pattern: RegExp): string | undefined {
  for (const [key, value] of Object.entries(fields)) {
    if (pattern.test(key)) return value;
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringFields(value: Record<string, unknown>): CardFields {
  const fields: CardFields = {};
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === "string" || typeof raw === "number") {
      fields[key] = String(raw);
    }
  }
  return fields;
}
