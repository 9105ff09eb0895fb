import * as tf from "@tensorflow/tfjs";
import type { FastifyBaseLogger } from "fastify";
import type { Device, LossFunction } from "@neurodeck/shared";
import type {
  ActivationName,
  Batch,
  BatchResult,
  BenchmarkTiming,
  DummyInput,
  EngineMemory,
  EngineModel,
  LayerSpec,
  LayerWeights,
  ModelPlan,
  NativeArtifacts,
  NumericEngine,
  TrainingSettings,
} from "./numeric-engine.js";

type LossFn = (labels: tf.Tensor, logits: tf.Tensor) => tf.Tensor;

/** Losses operate on raw logits; the final layer has no activation. */
const LOSSES: Record<LossFunction, LossFn> = {
  cross_entropy: (labels, logits) => tf.losses.softmaxCrossEntropy(labels, logits),
  bce: (labels, logits) => tf.losses.sigmoidCrossEntropy(labels, logits),
  bce_with_logits: (labels, logits) => tf.losses.sigmoidCrossEntropy(labels, logits),
  mse: (labels, logits) => tf.losses.meanSquaredError(labels, logits),
  mae: (labels, logits) => tf.losses.absoluteDifference(labels, logits),
};

type BuiltinActivation = "relu" | "tanh" | "sigmoid" | "elu" | "selu";

function activationLayer(fn: ActivationName, inputShape?: number[]): tf.layers.Layer {
  if (fn === "leaky_relu") return tf.layers.leakyReLU({ alpha: 0.01, inputShape });
  const builtin: BuiltinActivation = fn;
  return tf.layers.activation({ activation: builtin, inputShape });
}

function recurrentLayer(
  spec: Extract<LayerSpec, { kind: "recurrent" }>,
  inputShape?: number[],
): tf.layers.Layer {
  const make = (shape?: number[]) => {
    const args = { units: spec.units, returnSequences: spec.returnSequences, inputShape: shape };
    if (spec.cell === "lstm") return tf.layers.lstm(args);
    if (spec.cell === "gru") return tf.layers.gru(args);
    return tf.layers.simpleRNN(args);
  };
  if (!spec.bidirectional) return make(inputShape);
  return tf.layers.bidirectional({ layer: make(), mergeMode: "concat", inputShape });
}

function createLayer(spec: LayerSpec, inputShape?: number[]): tf.layers.Layer {
  switch (spec.kind) {
    case "dense":
      return tf.layers.dense({ units: spec.units, useBias: spec.useBias, inputShape });
    case "activation":
      return activationLayer(spec.fn, inputShape);
    case "dropout":
      return tf.layers.dropout({ rate: spec.rate, inputShape });
    case "recurrent":
      return recurrentLayer(spec, inputShape);
    case "conv2d":
      return tf.layers.conv2d({
        filters: spec.filters,
        kernelSize: spec.kernelSize,
        strides: spec.strides,
        padding: "same",
        inputShape,
      });
    case "batch_norm":
      return tf.layers.batchNormalization({ inputShape });
    case "pool2d":
      return spec.mode === "max"
        ? tf.layers.maxPooling2d({ poolSize: spec.size, inputShape })
        : tf.layers.averagePooling2d({ poolSize: spec.size, inputShape });
    case "flatten":
      return tf.layers.flatten({ inputShape });
  }
}

function makeOptimizer(settings: TrainingSettings): tf.Optimizer {
  switch (settings.optimizer) {
    case "sgd":
      return settings.momentum > 0
        ? tf.train.momentum(settings.learningRate, settings.momentum)
        : tf.train.sgd(settings.learningRate);
    case "rmsprop":
      return tf.train.rmsprop(settings.learningRate);
    // No decoupled weight decay in tfjs; adamw trains as adam
    case "adam":
    case "adamw":
      return tf.train.adam(settings.learningRate);
  }
}

function firstTensor(out: tf.Tensor | tf.Tensor[]): tf.Tensor {
  return Array.isArray(out) ? out[0] : out;
}

function joinWeightData(data: ArrayBuffer | ArrayBuffer[] | undefined): Uint8Array {
  if (data === undefined) return new Uint8Array();
  const buffers = Array.isArray(data) ? data : [data];
  return new Uint8Array(Buffer.concat(buffers.map((b) => Buffer.from(b))));
}

// ---------------------------------------------------------------------------
// Model
// ---------------------------------------------------------------------------

class TfjsModel implements EngineModel {
  readonly parameterCount: number;
  private lossFn: LossFn = LOSSES.cross_entropy;

  constructor(
    private model: tf.Sequential,
    private outputSize: number,
  ) {
    this.parameterCount = model.countParams();
  }

  prepareTraining(settings: TrainingSettings): void {
    this.lossFn = LOSSES[settings.loss];
    this.model.compile({
      optimizer: makeOptimizer(settings),
      loss: this.lossFn,
      metrics: ["accuracy"],
    });
  }

  async trainBatch(batch: Batch): Promise<BatchResult> {
    const [xs, ys] = this.tensors(batch);
    try {
      const out = await this.model.trainOnBatch(xs, ys);
      const [loss, accuracy] = Array.isArray(out) ? out : [out, 0];
      return {
        loss,
        correct: Math.round(accuracy * batch.size),
        count: batch.size,
      };
    } finally {
      xs.dispose();
      ys.dispose();
    }
  }

  async evaluateBatch(batch: Batch): Promise<BatchResult> {
    const [lossT, correctT] = tf.tidy(() => {
      const [xs, ys] = this.tensors(batch);
      const logits = firstTensor(this.model.predict(xs));
      const loss = this.lossFn(ys, logits);
      const correct = tf.sum(
        tf.cast(tf.equal(tf.argMax(logits, -1), tf.argMax(ys, -1)), "int32"),
      );
      return [loss, correct];
    });
    try {
      const [loss] = await lossT.data();
      const [correct] = await correctT.data();
      return { loss, correct, count: batch.size };
    } finally {
      lossT.dispose();
      correctT.dispose();
    }
  }

  async outputShape(input: DummyInput): Promise<number[]> {
    const out = tf.tidy(() => {
      const xs = tf.tensor(input.values, input.shape);
      return firstTensor(this.model.predict(xs));
    });
    const shape = [...out.shape];
    out.dispose();
    return shape;
  }

  async exportNative(): Promise<NativeArtifacts> {
    const saved: { artifacts?: tf.io.ModelArtifacts } = {};
    await this.model.save(
      tf.io.withSaveHandler(async (artifacts) => {
        saved.artifacts = artifacts;
        return { modelArtifactsInfo: tf.io.getModelArtifactsInfoForJSON(artifacts) };
      }),
    );
    const captured = saved.artifacts;
    if (!captured) throw new Error("Model save produced no artifacts");

    return {
      modelJson: {
        format: "layers-model",
        generatedBy: `TensorFlow.js tfjs-layers v${tf.version_layers}`,
        modelTopology: captured.modelTopology,
        weightsManifest: [{ paths: ["weights.bin"], weights: captured.weightSpecs ?? [] }],
      },
      weights: joinWeightData(captured.weightData),
    };
  }

  async exportWeights(): Promise<LayerWeights[]> {
    const layers: LayerWeights[] = [];
    for (const layer of this.model.layers) {
      const weights: LayerWeights["weights"] = [];
      for (const variable of layer.weights) {
        const values = await variable.read().data();
        weights.push({
          name: variable.name,
          shape: variable.shape.map((d) => d ?? -1),
          values: Array.from(values),
        });
      }
      layers.push({ name: layer.name, className: layer.getClassName(), weights });
    }
    return layers;
  }

  dispose(): void {
    this.model.dispose();
  }

  private tensors(batch: Batch): [tf.Tensor, tf.Tensor] {
    const xs = tf.tensor(batch.inputs, [batch.size, ...batch.sampleShape]);
    const ys = tf.tidy(() =>
      tf.cast(tf.oneHot(tf.tensor1d(batch.labels, "int32"), this.outputSize), "float32"),
    );
    return [xs, ys];
  }
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

/**
 * tfjs-backed engine. Accelerator devices bind to the native "tensorflow"
 * backend when @tensorflow/tfjs-node is loaded, otherwise everything runs
 * on the JS CPU kernel.
 */
export class TfjsEngine implements NumericEngine {
  private boundId: string | null = null;

  constructor(private log: FastifyBaseLogger) {}

  backendName(): string {
    return tf.getBackend();
  }

  boundDeviceId(): string | null {
    return this.boundId;
  }

  async bindDevice(device: Device): Promise<void> {
    const wanted =
      device.backend !== "cpu_fallback" && tf.findBackendFactory("tensorflow")
        ? "tensorflow"
        : "cpu";
    if (tf.getBackend() !== wanted) {
      await tf.setBackend(wanted);
    }
    await tf.ready();
    this.boundId = device.id;
    this.log.debug({ deviceId: device.id, backend: tf.getBackend() }, "Engine bound");
  }

  build(plan: ModelPlan): EngineModel {
    const model = tf.sequential();
    plan.layers.forEach((spec, i) => {
      model.add(createLayer(spec, i === 0 ? plan.inputShape : undefined));
    });
    return new TfjsModel(model, plan.outputSize);
  }

  async benchmark(size: number, iterations: number): Promise<BenchmarkTiming> {
    const a = tf.randomNormal([size, size]);
    const b = tf.randomNormal([size, size]);
    try {
      // Warm-up pass so kernel setup is not timed
      const warm = tf.matMul(a, b);
      await warm.data();
      warm.dispose();

      const start = performance.now();
      for (let i = 0; i < iterations; i++) {
        const c = tf.matMul(a, b);
        await c.data();
        c.dispose();
      }
      const totalTimeSeconds = (performance.now() - start) / 1000;
      const averageTimeSeconds = totalTimeSeconds / iterations;
      const gflops =
        averageTimeSeconds > 0 ? (2 * size ** 3) / averageTimeSeconds / 1e9 : 0;
      return {
        totalTimeSeconds: round(totalTimeSeconds, 4),
        averageTimeSeconds: round(averageTimeSeconds, 4),
        gflops: round(gflops, 2),
      };
    } finally {
      a.dispose();
      b.dispose();
    }
  }

  memory(): EngineMemory {
    const { numTensors, numBytes } = tf.memory();
    return { numTensors, numBytes };
  }
}

function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}
