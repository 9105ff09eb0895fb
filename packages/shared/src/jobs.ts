// ── Job enums ────────────────────────────────────────────────────────

export type JobStatus =
  | "initializing"
  | "running"
  | "paused"
  | "stopping"
  | "completed"
  | "cancelled"
  | "failed";

export type JobControl = "pause" | "resume" | "stop";

export type OptimizerType = "adam" | "sgd" | "rmsprop" | "adamw";

export type LossFunction =
  | "cross_entropy"
  | "mse"
  | "mae"
  | "bce"
  | "bce_with_logits";

// ── Job configuration bags ───────────────────────────────────────────
// Keys keep the editor's snake_case spelling.

export interface DummyDatasetConfig {
  type: "dummy";
  num_samples?: number;
  input_size?: number;
  num_classes?: number;
  seed?: number;
}

export interface InlineDatasetConfig {
  type: "inline";
  /** One flattened sample per row. */
  inputs: number[][];
  labels: number[];
  num_classes?: number;
}

export type DatasetConfig = DummyDatasetConfig | InlineDatasetConfig;

export interface TrainingConfig {
  epochs?: number;
  batch_size?: number;
  learning_rate?: number;
  optimizer?: OptimizerType;
  momentum?: number;
  weight_decay?: number;
  loss_function?: LossFunction;
  shuffle?: boolean;
}

export type ValidationConfig = DatasetConfig;

// ── Job record ───────────────────────────────────────────────────────

export interface JobMetrics {
  loss: number;
  accuracy: number;
  val_loss: number;
  val_accuracy: number;
}

export interface EpochRecord {
  epoch: number;
  loss: number;
  accuracy: number;
  val_loss?: number;
  val_accuracy?: number;
  timestamp: number;
}

export interface TrainingJob {
  jobId: string;
  unitId: string;
  status: JobStatus;
  currentEpoch: number;
  totalEpochs: number;
  metrics: JobMetrics;
  history: EpochRecord[];
  createdAt: number;
  updatedAt: number;
  startedAt?: number;
  completedAt?: number;
  /** Seconds. Zero until the first epoch finishes. */
  estimatedTimeRemaining: number;
  trainingConfig: TrainingConfig;
  datasetConfig: DatasetConfig;
  validationConfig?: ValidationConfig;
  error?: string;
}

/** Job snapshot without bulk configuration, as pushed to subscribers and listed. */
export type JobSummary = Omit<
  TrainingJob,
  "trainingConfig" | "datasetConfig" | "validationConfig" | "history"
>;

export interface JobMetricsReport {
  jobId: string;
  currentMetrics: JobMetrics;
  /** 0..1 */
  progress: number;
  elapsedSeconds: number;
  etaSeconds: number;
  status: JobStatus;
}

// ── API request/response types ───────────────────────────────────────

export interface StartJobRequest {
  modelId: string;
  datasetConfig: DatasetConfig;
  trainingConfig: TrainingConfig;
  validationConfig?: ValidationConfig;
}

export interface JobResponse {
  job: TrainingJob;
}

export interface JobsListResponse {
  jobs: JobSummary[];
  total: number;
}

export interface JobControlResponse {
  jobId: string;
  control: JobControl;
  /** False when the job's state did not permit the control call. */
  applied: boolean;
  status: JobStatus;
}

export interface StartJobResponse {
  jobId: string;
  status: JobStatus;
}

export interface DeleteJobResponse {
  jobId: string;
  deleted: true;
}
