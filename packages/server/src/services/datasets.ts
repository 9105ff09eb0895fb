import type { DatasetConfig } from "@neurodeck/shared";
import type { Batch } from "./numeric-engine.js";

export const DEFAULT_NUM_SAMPLES = 1000;
export const DEFAULT_SEED = 42;

/** In-memory dataset shaped to one unit's input. */
export interface Dataset {
  sampleShape: number[];
  size: number;
  inputs: Float32Array;
  labels: Int32Array;
}

/** Deterministic PRNG (mulberry32), uniform in [0, 1). */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function sampleSize(shape: number[]): number {
  return shape.reduce((a, b) => a * b, 1);
}

/**
 * Materialize a dataset for a unit with the given sample shape and output
 * width. Throws on configs that cannot feed the unit.
 */
export function buildDataset(
  config: DatasetConfig,
  sampleShape: number[],
  outputSize: number,
): Dataset {
  const width = sampleSize(sampleShape);

  switch (config.type) {
    case "dummy": {
      const size = config.num_samples ?? DEFAULT_NUM_SAMPLES;
      const numClasses = config.num_classes ?? outputSize;
      const lastDim = sampleShape[sampleShape.length - 1];
      if (config.input_size !== undefined && config.input_size !== lastDim) {
        throw new Error(
          `Dataset input_size ${config.input_size} does not match model input ${lastDim}`,
        );
      }
      if (numClasses > outputSize) {
        throw new Error(
          `Dataset num_classes ${numClasses} exceeds model output size ${outputSize}`,
        );
      }
      const rand = seededRandom(config.seed ?? DEFAULT_SEED);
      const inputs = new Float32Array(size * width);
      for (let i = 0; i < inputs.length; i++) {
        // Box-Muller
        const u = 1 - rand();
        const v = rand();
        inputs[i] = Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
      }
      const labels = new Int32Array(size);
      for (let i = 0; i < size; i++) labels[i] = Math.floor(rand() * numClasses);
      return { sampleShape, size, inputs, labels };
    }

    case "inline": {
      const size = config.inputs.length;
      if (config.labels.length !== size) {
        throw new Error(
          `Inline dataset has ${size} inputs but ${config.labels.length} labels`,
        );
      }
      const numClasses = config.num_classes ?? outputSize;
      const inputs = new Float32Array(size * width);
      config.inputs.forEach((row, i) => {
        if (row.length !== width) {
          throw new Error(`Inline sample ${i} has ${row.length} values, expected ${width}`);
        }
        inputs.set(row, i * width);
      });
      const labels = Int32Array.from(config.labels, (label, i) => {
        if (!Number.isInteger(label) || label < 0 || label >= Math.min(numClasses, outputSize)) {
          throw new Error(`Inline label ${label} at index ${i} is out of range`);
        }
        return label;
      });
      return { sampleShape, size, inputs, labels };
    }
  }
}

/**
 * Split a dataset into batches. The last batch may be smaller. With a
 * random source, sample order is shuffled first.
 */
export function* batches(
  dataset: Dataset,
  batchSize: number,
  rand?: () => number,
): Generator<Batch> {
  const order = Array.from({ length: dataset.size }, (_, i) => i);
  if (rand) {
    for (let i = order.length - 1; i > 0; i--) {
      const j = Math.floor(rand() * (i + 1));
      [order[i], order[j]] = [order[j], order[i]];
    }
  }

  const width = sampleSize(dataset.sampleShape);
  for (let start = 0; start < order.length; start += batchSize) {
    const picked = order.slice(start, start + batchSize);
    const inputs = new Float32Array(picked.length * width);
    const labels = new Int32Array(picked.length);
    picked.forEach((src, k) => {
      inputs.set(dataset.inputs.subarray(src * width, (src + 1) * width), k * width);
      labels[k] = dataset.labels[src];
    });
    yield { inputs, labels, size: picked.length, sampleShape: dataset.sampleShape };
  }
}

export function batchCount(dataset: Dataset, batchSize: number): number {
  return Math.ceil(dataset.size / batchSize);
}
