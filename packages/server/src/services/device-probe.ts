import os from "node:os";

import type { BackendKind, Device, DeviceVendor } from "@neurodeck/shared";

/** Live fields a probe may refresh without re-running discovery. */
export type LiveDeviceFields = Pick<
  Device,
  | "availableMemoryMb"
  | "memoryUsagePercent"
  | "temperatureC"
  | "powerW"
  | "utilizationPercent"
>;

export interface DeviceProbe {
  readonly backend: BackendKind;
  /** Prefix for device ids surfaced by this probe. */
  readonly tag: string;
  isAvailable(): boolean;
  probe(): Promise<Device[]>;
  refresh?(device: Device): Promise<Partial<LiveDeviceFields>>;
}

/** Host facts the probes need; swapped for a fixed value in tests. */
export interface HostInfo {
  platform: NodeJS.Platform;
  arch: string;
  release: string;
  cpuModels(): string[];
  totalMemBytes(): number;
  freeMemBytes(): number;
}

export const nodeHostInfo: HostInfo = {
  platform: process.platform,
  arch: process.arch,
  release: os.release(),
  cpuModels: () => os.cpus().map((cpu) => cpu.model),
  totalMemBytes: () => os.totalmem(),
  freeMemBytes: () => os.freemem(),
};

export const MAX_SCORE = 1000;

export function clampScore(raw: number): number {
  if (!Number.isFinite(raw)) return 0;
  return Math.min(MAX_SCORE, Math.max(0, Math.round(raw)));
}

export function bytesToMb(bytes: number): number {
  return Math.round(bytes / (1024 * 1024));
}

export function mbToGb(mb: number): number {
  return mb / 1024;
}

export function usagePercent(totalMb: number, availableMb: number): number {
  if (totalMb <= 0) return 0;
  return Math.round(((totalMb - availableMb) / totalMb) * 1000) / 10;
}

const VENDOR_PATTERNS: Array<[RegExp, DeviceVendor]> = [
  [/nvidia|geforce|quadro|tesla|rtx/i, "nvidia"],
  [/amd|radeon|advanced micro devices|instinct/i, "amd"],
  [/intel|iris|arc\b|uhd graphics/i, "intel"],
  [/apple/i, "apple"],
];

export function vendorFromName(...names: string[]): DeviceVendor {
  const haystack = names.join(" ");
  for (const [pattern, vendor] of VENDOR_PATTERNS) {
    if (pattern.test(haystack)) return vendor;
  }
  return "unknown";
}

/** Parse a numeric tool field; placeholders like "[N/A]" yield undefined. */
export function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const match = raw.trim().match(/^-?\d+(\.\d+)?/);
  return match ? Number(match[0]) : undefined;
}
