import path from "node:path";
import { fileURLToPath } from "node:url";

import { DEVICE_PREFERENCES, type DevicePreference } from "@neurodeck/shared";

export const SERVICE_NAME = "NeuroDeck Compute Service";
export const SERVICE_VERSION = "0.1.0";
export const API_PREFIX = "/api/v1";

export interface ConfigWarning {
  level: "warn" | "error";
  message: string;
}

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
  logPretty: boolean;
  projectRoot: string;
  /** Root for unit metadata (`models/`) and exports (`exports/`). */
  dataDir: string;
  buildersDir: string;
  /** Raw DEVICE_PREFERENCE value; validateConfig() rejects unknown values. */
  devicePreference: string;
  probeTimeoutMs: number;
  benchmarkSize: number;
  benchmarkIterations: number;
  epochYieldMs: number;
  deliveryTimeoutMs: number;
  heartbeatIntervalMs: number;
  maxJobsPerUnit: number;
}

const POSITIVE_SETTINGS = [
  "probeTimeoutMs",
  "benchmarkSize",
  "benchmarkIterations",
  "deliveryTimeoutMs",
  "heartbeatIntervalMs",
  "maxJobsPerUnit",
] as const;

/**
 * Validate server config at startup. Returns a list of warnings/errors.
 * Callers should log warnings and exit on errors.
 */
export function validateConfig(config: ServerConfig): ConfigWarning[] {
  const issues: ConfigWarning[] = [];

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    issues.push({
      level: "error",
      message: `PORT must be an integer between 1 and 65535 (got ${config.port})`,
    });
  }

  if (!isDevicePreference(config.devicePreference)) {
    issues.push({
      level: "error",
      message: `DEVICE_PREFERENCE must be one of ${DEVICE_PREFERENCES.join(", ")} (got ${config.devicePreference})`,
    });
  }

  for (const key of POSITIVE_SETTINGS) {
    const value = config[key];
    if (!Number.isFinite(value) || value <= 0) {
      issues.push({
        level: "error",
        message: `${key} must be a positive number (got ${value})`,
      });
    }
  }

  if (!Number.isFinite(config.epochYieldMs) || config.epochYieldMs < 0) {
    issues.push({
      level: "error",
      message: `EPOCH_YIELD_MS must be zero or positive (got ${config.epochYieldMs})`,
    });
  }

  if (config.benchmarkSize > 2048) {
    issues.push({
      level: "warn",
      message: `BENCHMARK_SIZE ${config.benchmarkSize} will be slow on the CPU kernel`,
    });
  }

  return issues;
}

export function isDevicePreference(value: string): value is DevicePreference {
  return DEVICE_PREFERENCES.some((p) => p === value);
}

function intEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  return raw === undefined || raw === "" ? fallback : parseInt(raw, 10);
}

export function loadConfig(): ServerConfig {
  const serverRoot = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    "..",
  );
  const projectRoot = path.resolve(serverRoot, "..", "..");

  return {
    port: intEnv("PORT", 8000),
    host: process.env.HOST ?? "localhost",
    logLevel: process.env.LOG_LEVEL ?? "info",
    logPretty: process.env.LOG_PRETTY !== "false",
    projectRoot,
    dataDir: process.env.DATA_DIR ?? path.join(projectRoot, "data"),
    buildersDir: process.env.BUILDERS_DIR ?? path.join(serverRoot, "builders"),
    devicePreference: (process.env.DEVICE_PREFERENCE ?? "auto").toLowerCase(),
    probeTimeoutMs: intEnv("PROBE_TIMEOUT_MS", 5000),
    benchmarkSize: intEnv("BENCHMARK_SIZE", 256),
    benchmarkIterations: intEnv("BENCHMARK_ITERATIONS", 5),
    epochYieldMs: intEnv("EPOCH_YIELD_MS", 10),
    deliveryTimeoutMs: intEnv("DELIVERY_TIMEOUT_MS", 5000),
    heartbeatIntervalMs: intEnv("HEARTBEAT_INTERVAL_MS", 15_000),
    maxJobsPerUnit: intEnv("MAX_JOBS_PER_UNIT", 1),
  };
}
