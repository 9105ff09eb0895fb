/** Error body returned by every failing route. */
export interface ErrorResponse {
  error: string;
  message: string;
  issues?: Array<{ path: string; message: string }>;
}

/** GET / */
export interface RootResponse {
  name: string;
  version: string;
  status: "running";
  health: string;
  websocket: string;
}

/** GET /api/v1/health */
export interface HealthResponse {
  status: "healthy";
  version: string;
  uptime: number;
  timestamp: string;
  gpuAvailable: boolean;
  gpuCount: number;
  memoryUsagePercent: number;
  cpuUsagePercent: number;
}

/** GET /api/v1/health/detailed */
export interface DetailedHealthResponse {
  status: "healthy";
  components: {
    devices: {
      discovered: number;
      selectedDeviceId: string | null;
      engineBackend: string;
    };
    units: { activeModels: number };
    jobs: { total: number; running: number };
    builders: { loaded: number; enabled: number };
    connections: { global: number; subscribedJobs: number };
  };
}
