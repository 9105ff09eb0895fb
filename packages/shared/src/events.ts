import type { DeviceView } from "./devices.js";
import type { JobSummary } from "./jobs.js";

/** Frames pushed on /ws/training/:jobId */
export interface ProgressFrame {
  type: "training_progress";
  jobId: string;
  data: JobSummary;
}

/** Events pushed on the generic /ws connection channel. */
export type ConnectionEvent =
  | { type: "connected"; data: { connectionId: string; timestamp: number } }
  | { type: "heartbeat"; data: { timestamp: number } }
  | { type: "pong"; data: { timestamp: number } }
  | { type: "echo"; data: { message: string } }
  | { type: "job_update"; data: JobSummary }
  | { type: "device_selected"; data: DeviceView };

export type ConnectionEventType = ConnectionEvent["type"];

/** Anything a push channel may carry. */
export type PushFrame = ProgressFrame | ConnectionEvent;
