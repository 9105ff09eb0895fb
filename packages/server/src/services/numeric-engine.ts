import type {
  Device,
  LossFunction,
  OptimizerType,
  UnitType,
} from "@neurodeck/shared";

// ── Model plans ──────────────────────────────────────────────────────
// Builders describe a network as a flat layer list; the engine turns the
// list into its own model object.

export type ActivationName =
  | "relu"
  | "tanh"
  | "sigmoid"
  | "leaky_relu"
  | "elu"
  | "selu";

export type RecurrentCell = "lstm" | "gru" | "rnn";

export type LayerSpec =
  | { kind: "dense"; units: number; useBias: boolean }
  | { kind: "activation"; fn: ActivationName }
  | { kind: "dropout"; rate: number }
  | {
      kind: "recurrent";
      cell: RecurrentCell;
      units: number;
      returnSequences: boolean;
      bidirectional: boolean;
    }
  | { kind: "conv2d"; filters: number; kernelSize: number; strides: number }
  | { kind: "batch_norm" }
  | { kind: "pool2d"; mode: "max" | "avg"; size: number }
  | { kind: "flatten" };

export interface ModelPlan {
  type: UnitType;
  /** Shape of one sample, without the batch dimension. */
  inputShape: number[];
  /** Width of the final layer (class count for classifiers). */
  outputSize: number;
  layers: LayerSpec[];
}

// ── Training data ────────────────────────────────────────────────────

export interface Batch {
  /** `size` samples of `sampleShape`, flattened row-major. */
  inputs: Float32Array;
  /** Class index per sample. */
  labels: Int32Array;
  size: number;
  sampleShape: number[];
}

export interface BatchResult {
  /** Mean loss over the batch. */
  loss: number;
  correct: number;
  count: number;
}

export interface TrainingSettings {
  optimizer: OptimizerType;
  learningRate: number;
  momentum: number;
  loss: LossFunction;
}

export interface DummyInput {
  shape: number[];
  values: Float32Array;
}

// ── Export payloads ──────────────────────────────────────────────────

export interface NativeArtifacts {
  /** Engine-native model description (topology + weight manifest). */
  modelJson: Record<string, unknown>;
  weights: Uint8Array;
}

export interface LayerWeights {
  name: string;
  className: string;
  weights: Array<{ name: string; shape: number[]; values: number[] }>;
}

// ── Engine contracts ─────────────────────────────────────────────────

export interface EngineModel {
  readonly parameterCount: number;
  prepareTraining(settings: TrainingSettings): void;
  trainBatch(batch: Batch): Promise<BatchResult>;
  /** Loss and accuracy without updating weights, using the prepared loss. */
  evaluateBatch(batch: Batch): Promise<BatchResult>;
  outputShape(input: DummyInput): Promise<number[]>;
  exportNative(): Promise<NativeArtifacts>;
  exportWeights(): Promise<LayerWeights[]>;
  dispose(): void;
}

export interface BenchmarkTiming {
  totalTimeSeconds: number;
  averageTimeSeconds: number;
  gflops: number;
}

export interface EngineMemory {
  numTensors: number;
  numBytes: number;
}

/**
 * Tensor runtime behind trainable units. There is a single device slot:
 * `bindDevice` decides where subsequently built models live.
 */
export interface NumericEngine {
  /** Active kernel backend name, e.g. "cpu" or "tensorflow". */
  backendName(): string;
  boundDeviceId(): string | null;
  bindDevice(device: Device): Promise<void>;
  build(plan: ModelPlan): EngineModel;
  benchmark(size: number, iterations: number): Promise<BenchmarkTiming>;
  memory(): EngineMemory;
}
