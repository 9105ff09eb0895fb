import type { FastifyBaseLogger } from "fastify";
import type { BackendKind, Device } from "@neurodeck/shared";
import { DeviceNotFoundError, errorMessage } from "../errors.js";
import type { DeviceProbe, LiveDeviceFields } from "./device-probe.js";
import { fallbackCpuDevice } from "./probes/cpu-probe.js";

/** Accelerator probes contribute devices in this order; CPU always last. */
const BACKEND_PRIORITY: BackendKind[] = [
  "native_accel",
  "vendor_bridge",
  "open_compute",
  "unified_memory",
];

/** Drops anything a probe returned beyond the live fields. */
function pickLiveFields(patch: Partial<LiveDeviceFields>): Partial<LiveDeviceFields> {
  const picked: Partial<LiveDeviceFields> = {};
  if (patch.availableMemoryMb !== undefined) picked.availableMemoryMb = patch.availableMemoryMb;
  if (patch.memoryUsagePercent !== undefined) picked.memoryUsagePercent = patch.memoryUsagePercent;
  if (patch.temperatureC !== undefined) picked.temperatureC = patch.temperatureC;
  if (patch.powerW !== undefined) picked.powerW = patch.powerW;
  if (patch.utilizationPercent !== undefined) picked.utilizationPercent = patch.utilizationPercent;
  return picked;
}

/**
 * Aggregates every discovery backend into one ordered device list.
 * A failing backend is logged and skipped; the host CPU is always present
 * exactly once.
 */
export class DeviceCatalog {
  private devices: Device[] = [];
  private discovered = false;
  private inflight: Promise<Device[]> | null = null;
  private accelerators: DeviceProbe[];

  constructor(
    probes: DeviceProbe[],
    private cpuProbe: DeviceProbe,
    private log: FastifyBaseLogger,
  ) {
    this.accelerators = probes
      .filter((p) => p.backend !== "cpu_fallback")
      .sort(
        (a, b) =>
          BACKEND_PRIORITY.indexOf(a.backend) - BACKEND_PRIORITY.indexOf(b.backend),
      );
  }

  /** Re-run every probe and replace the catalog. Concurrent calls share one run. */
  discover(): Promise<Device[]> {
    if (!this.inflight) {
      this.inflight = this.runDiscovery().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  hasDiscovered(): boolean {
    return this.discovered;
  }

  list(): Device[] {
    return this.devices.map((d) => ({ ...d }));
  }

  find(deviceId: string): Device | undefined {
    const device = this.devices.find((d) => d.id === deviceId);
    return device ? { ...device } : undefined;
  }

  get(deviceId: string): Device {
    const device = this.find(deviceId);
    if (!device) throw new DeviceNotFoundError(deviceId);
    return device;
  }

  /**
   * Refresh live fields (memory, temperature, load) for one device. The
   * patch lands on whatever record carries the id once the probe answers;
   * a device that discovery removed meanwhile is not found.
   */
  async refreshUtilization(deviceId: string): Promise<Device> {
    const device = this.get(deviceId);
    const probe = [...this.accelerators, this.cpuProbe].find(
      (p) => p.backend === device.backend,
    );
    if (!probe?.refresh) return device;

    let patch: Partial<LiveDeviceFields> = {};
    try {
      patch = pickLiveFields(await probe.refresh(device));
    } catch (err) {
      this.log.warn({ deviceId, err: errorMessage(err) }, "Device refresh failed");
    }

    const index = this.devices.findIndex((d) => d.id === deviceId);
    if (index === -1) {
      this.log.debug({ deviceId }, "Device left the catalog during refresh");
      throw new DeviceNotFoundError(deviceId);
    }
    const updated: Device = { ...this.devices[index], ...patch };
    this.devices[index] = updated;
    return { ...updated };
  }

  private async runDiscovery(): Promise<Device[]> {
    const runnable = this.accelerators.filter((p) => p.isAvailable());
    const results = await Promise.all(runnable.map((p) => this.runProbe(p)));

    const devices = results.flat();
    devices.push(await this.probeCpu());

    this.devices = devices;
    this.discovered = true;
    this.log.info(
      { count: devices.length, devices: devices.map((d) => d.id) },
      "Device discovery complete",
    );
    return this.list();
  }

  private async runProbe(probe: DeviceProbe): Promise<Device[]> {
    try {
      const found = await probe.probe();
      const kept = found.filter((d) => d.backend !== "cpu_fallback");
      if (kept.length !== found.length) {
        this.log.warn({ backend: probe.backend }, "Dropped CPU entries from accelerator probe");
      }
      return kept;
    } catch (err) {
      this.log.warn(
        { backend: probe.backend, err: errorMessage(err) },
        "Device probe failed",
      );
      return [];
    }
  }

  private async probeCpu(): Promise<Device> {
    try {
      const [cpu] = await this.cpuProbe.probe();
      if (cpu) return cpu;
      this.log.warn("CPU probe returned no device, using fallback record");
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, "CPU probe failed, using fallback record");
    }
    return fallbackCpuDevice();
  }
}
