import type { FastifyBaseLogger } from "fastify";
import type {
  BenchmarkResult,
  Device,
  DevicePreference,
  DeviceSettingsResponse,
  DeviceView,
  PreferenceOption,
} from "@neurodeck/shared";
import { DEVICE_PREFERENCES } from "@neurodeck/shared";
import { PreferenceUnsatisfiableError } from "../errors.js";
import type { DeviceCatalog } from "./device-catalog.js";
import { Mutex } from "./mutex.js";
import type { NumericEngine } from "./numeric-engine.js";

const PREFERENCE_LABELS: Record<DevicePreference, [string, string]> = {
  auto: ["Auto", "Highest-scoring discrete accelerator, else the best device"],
  gpu_only: ["GPU only", "Any non-CPU device"],
  cpu_only: ["CPU only", "Always train on the host CPU"],
  nvidia_only: ["NVIDIA only", "NVIDIA devices only"],
  amd_only: ["AMD only", "AMD devices only"],
  intel_only: ["Intel only", "Intel GPUs only"],
};

export type SelectionListener = (device: DeviceView) => void;

/** Highest score wins; ties keep catalog order. */
export function highestScoring(devices: Device[]): Device | undefined {
  let best: Device | undefined;
  for (const device of devices) {
    if (!best || device.performanceScore > best.performanceScore) best = device;
  }
  return best;
}

/** Discrete accelerators first, then anything. */
export function pickAuto(devices: Device[]): Device | undefined {
  const discrete = devices.filter(
    (d) => d.isDiscrete && d.backend !== "cpu_fallback",
  );
  return highestScoring(discrete) ?? highestScoring(devices);
}

/** Devices a preference admits, in catalog order. */
export function candidatesFor(
  preference: DevicePreference,
  devices: Device[],
): Device[] {
  const accelerators = devices.filter((d) => d.backend !== "cpu_fallback");
  switch (preference) {
    case "auto":
      return devices;
    case "gpu_only":
      return accelerators;
    case "cpu_only":
      return devices.filter((d) => d.backend === "cpu_fallback");
    case "nvidia_only":
      return accelerators.filter((d) => d.vendor === "nvidia");
    case "amd_only":
      return accelerators.filter((d) => d.vendor === "amd");
    case "intel_only":
      return accelerators.filter((d) => d.vendor === "intel");
  }
}

/**
 * Owns the single "current device" slot. Every change of the slot goes
 * through the mutex, so units are never built while the slot moves.
 */
export class DeviceSelector {
  private selected: Device | null = null;
  private preference: DevicePreference = "auto";
  private mutex = new Mutex();
  private listeners: SelectionListener[] = [];

  constructor(
    private catalog: DeviceCatalog,
    private engine: NumericEngine,
    private log: FastifyBaseLogger,
  ) {}

  current(): Device | null {
    return this.selected ? { ...this.selected } : null;
  }

  currentPreference(): DevicePreference {
    return this.preference;
  }

  onSelection(listener: SelectionListener): void {
    this.listeners.push(listener);
  }

  view(device: Device): DeviceView {
    return { ...device, isSelected: device.id === this.selected?.id };
  }

  views(): DeviceView[] {
    return this.catalog.list().map((d) => this.view(d));
  }

  /** Pick the best device and make it current. */
  autoSelect(): Promise<Device> {
    return this.mutex.runExclusive(() => this.selectAuto());
  }

  selectById(deviceId: string): Promise<Device> {
    return this.mutex.runExclusive(async () => {
      await this.ensureDiscovered();
      return this.commit(this.catalog.get(deviceId));
    });
  }

  applyPreference(preference: DevicePreference): Promise<Device> {
    return this.mutex.runExclusive(async () => {
      if (preference === "auto") {
        const device = await this.selectAuto();
        this.preference = preference;
        return device;
      }
      await this.ensureDiscovered();
      const best = highestScoring(
        candidatesFor(preference, this.catalog.list()),
      );
      if (!best) throw new PreferenceUnsatisfiableError(preference);
      const committed = await this.commit(best);
      this.preference = preference;
      return committed;
    });
  }

  /**
   * Re-run discovery and re-resolve the current selection by id. If the
   * selected device vanished, fall back to auto selection.
   */
  rediscover(): Promise<Device[]> {
    return this.mutex.runExclusive(async () => {
      const devices = await this.catalog.discover();
      if (this.selected) {
        const still = devices.find((d) => d.id === this.selected?.id);
        if (still) {
          this.selected = still;
        } else {
          this.log.warn(
            { deviceId: this.selected.id },
            "Selected device disappeared, re-selecting",
          );
          this.preference = "auto";
          await this.selectAuto();
        }
      }
      return devices;
    });
  }

  /**
   * Run `fn` with the current device held steady. Selects automatically
   * when nothing has been selected yet.
   */
  withDevice<T>(fn: (device: Device) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const device = this.selected ?? (await this.selectAuto());
      return fn({ ...device });
    });
  }

  /**
   * Refresh live fields of the current device, if any. Holds the slot so
   * rediscovery cannot swap the catalog while the probe answers.
   */
  refreshCurrent(): Promise<Device | null> {
    return this.mutex.runExclusive(async () => {
      if (!this.selected) return null;
      const updated = await this.catalog.refreshUtilization(this.selected.id);
      this.selected = updated;
      return { ...updated };
    });
  }

  settings(): DeviceSettingsResponse {
    const devices = this.catalog.list();
    const availablePreferences: PreferenceOption[] = DEVICE_PREFERENCES.map(
      (id) => ({
        id,
        name: PREFERENCE_LABELS[id][0],
        description: PREFERENCE_LABELS[id][1],
        available: candidatesFor(id, devices).length > 0,
      }),
    );
    return {
      currentDevice: this.selected ? this.view(this.selected) : null,
      availableDevices: devices.map((d) => this.view(d)),
      availablePreferences,
      currentPreference: this.preference,
    };
  }

  /** Square matmul timing on the current device. */
  benchmark(size: number, iterations: number): Promise<BenchmarkResult> {
    return this.mutex.runExclusive(async () => {
      const device = this.selected ?? (await this.selectAuto());
      const timing = await this.engine.benchmark(size, iterations);
      this.log.info(
        { deviceId: device.id, size, iterations, gflops: timing.gflops },
        "Benchmark complete",
      );
      return {
        deviceId: device.id,
        deviceName: device.name,
        backend: device.backend,
        vendor: device.vendor,
        engineBackend: this.engine.backendName(),
        matrixSize: size,
        iterations,
        ...timing,
        performanceScore: device.performanceScore,
        supportsHalfPrecision: device.supportsHalfPrecision,
        memoryMb: device.memoryMb,
      };
    });
  }

  // ── internals (caller holds the mutex) ──────────────────────────────

  private async ensureDiscovered(): Promise<void> {
    if (!this.catalog.hasDiscovered()) await this.catalog.discover();
  }

  private async selectAuto(): Promise<Device> {
    await this.ensureDiscovered();
    const device = pickAuto(this.catalog.list());
    // Discovery always yields the CPU record
    if (!device) throw new PreferenceUnsatisfiableError("auto");
    return this.commit(device);
  }

  private async commit(device: Device): Promise<Device> {
    await this.engine.bindDevice(device);
    const changed = this.selected?.id !== device.id;
    this.selected = device;
    if (changed) {
      this.log.info(
        { deviceId: device.id, name: device.name, backend: device.backend },
        "Device selected",
      );
      const view = this.view(device);
      for (const listener of this.listeners) listener(view);
    }
    return { ...device };
  }
}
