// ── Device enums ─────────────────────────────────────────────────────

export type DeviceVendor = "nvidia" | "amd" | "intel" | "apple" | "unknown";

/** Discovery backend a device was surfaced by. */
export type BackendKind =
  | "native_accel"
  | "vendor_bridge"
  | "open_compute"
  | "unified_memory"
  | "cpu_fallback";

export type DevicePreference =
  | "auto"
  | "gpu_only"
  | "cpu_only"
  | "nvidia_only"
  | "amd_only"
  | "intel_only";

export const DEVICE_PREFERENCES: readonly DevicePreference[] = [
  "auto",
  "gpu_only",
  "cpu_only",
  "nvidia_only",
  "amd_only",
  "intel_only",
];

// ── Device record ────────────────────────────────────────────────────

export interface Device {
  /** `<backendTag>:<index>`, e.g. "cuda:0", "opencl:1", "cpu:0". */
  id: string;
  name: string;
  vendor: DeviceVendor;
  backend: BackendKind;
  computeUnits: number;
  memoryMb: number;
  availableMemoryMb: number;
  memoryUsagePercent: number;
  temperatureC?: number;
  powerW?: number;
  utilizationPercent?: number;
  driverVersion: string;
  computeCapability?: string;
  /** 0–1000, backend-specific heuristic. */
  performanceScore: number;
  isDiscrete: boolean;
  supportsHalfPrecision: boolean;
  supportsInt8: boolean;
  maxWorkGroupSize: number;
}

export interface DeviceView extends Device {
  isSelected: boolean;
}

export interface PreferenceOption {
  id: DevicePreference;
  name: string;
  description: string;
  available: boolean;
}

// ── API request/response types ───────────────────────────────────────

/** GET /api/v1/gpu */
export interface DevicesResponse {
  devices: DeviceView[];
  selectedDeviceId: string | null;
  gpuAvailable: boolean;
  totalDevices: number;
}

/** GET /api/v1/gpu/settings */
export interface DeviceSettingsResponse {
  currentDevice: DeviceView | null;
  availableDevices: DeviceView[];
  availablePreferences: PreferenceOption[];
  currentPreference: DevicePreference;
}

export interface SelectDeviceRequest {
  deviceId: string;
}

export interface PreferenceRequest {
  preference: DevicePreference;
}

export interface DeviceSelectionResponse {
  device: DeviceView;
  preference: DevicePreference;
}

/** GET /api/v1/gpu/benchmark */
export interface BenchmarkResult {
  deviceId: string;
  deviceName: string;
  backend: BackendKind;
  vendor: DeviceVendor;
  engineBackend: string;
  matrixSize: number;
  iterations: number;
  totalTimeSeconds: number;
  averageTimeSeconds: number;
  gflops: number;
  performanceScore: number;
  supportsHalfPrecision: boolean;
  memoryMb: number;
}

/** GET /api/v1/gpu/memory */
export interface EngineMemoryResponse {
  deviceId: string | null;
  engineBackend: string;
  numTensors: number;
  numBytes: number;
}
