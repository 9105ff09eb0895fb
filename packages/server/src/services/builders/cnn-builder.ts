import { z } from "zod";
import type { ConfigBag } from "@neurodeck/shared";
import { ValidationError } from "../../errors.js";
import type { LayerSpec, ModelPlan } from "../numeric-engine.js";
import { dropoutRate, parseBag, positiveInt, type ModelBuilder } from "../model-builder.js";

const architectureSchema = z.object({
  input_channels: positiveInt.default(3),
  num_classes: positiveInt.default(10),
  conv_layers: z.array(positiveInt).min(1).default([32, 64, 128]),
  kernel_sizes: z.array(positiveInt).default([3, 3, 3]),
  strides: z.array(positiveInt).default([]),
  fc_layers: z.array(positiveInt).default([512, 256]),
  image_size: positiveInt.default(32),
});

const hyperparameterSchema = z.object({
  dropout: dropoutRate.default(0.5),
  batch_norm: z.boolean().default(true),
  pooling: z.enum(["max", "avg", "none"]).default("max"),
});

const POOL_SIZE = 2;

/**
 * Conv blocks (conv → [batch norm] → relu → [pool]) followed by a dense
 * classifier. Images are channels-last: [size, size, channels].
 */
export const cnnBuilder: ModelBuilder = {
  type: "cnn",

  plan(architecture: ConfigBag, hyperparameters: ConfigBag): ModelPlan {
    const arch = parseBag(architectureSchema, architecture, "cnn architecture");
    const hp = parseBag(hyperparameterSchema, hyperparameters, "cnn hyperparameters");

    const layers: LayerSpec[] = [];
    let spatial = arch.image_size;
    arch.conv_layers.forEach((filters, i) => {
      const strides = arch.strides[i] ?? 1;
      layers.push({
        kind: "conv2d",
        filters,
        kernelSize: arch.kernel_sizes[i] ?? 3,
        strides,
      });
      spatial = Math.ceil(spatial / strides);
      if (hp.batch_norm) layers.push({ kind: "batch_norm" });
      layers.push({ kind: "activation", fn: "relu" });
      if (hp.pooling !== "none") {
        layers.push({ kind: "pool2d", mode: hp.pooling, size: POOL_SIZE });
        spatial = Math.floor(spatial / POOL_SIZE);
      }
      if (spatial < 1) {
        throw new ValidationError(
          `Invalid cnn architecture: image_size ${arch.image_size} collapses to zero after conv block ${i + 1}`,
        );
      }
    });

    layers.push({ kind: "flatten" });
    for (const units of arch.fc_layers) {
      layers.push({ kind: "dense", units, useBias: true });
      layers.push({ kind: "activation", fn: "relu" });
      if (hp.dropout > 0) layers.push({ kind: "dropout", rate: hp.dropout });
    }
    layers.push({ kind: "dense", units: arch.num_classes, useBias: true });

    return {
      type: "cnn",
      inputShape: [arch.image_size, arch.image_size, arch.input_channels],
      outputSize: arch.num_classes,
      layers,
    };
  },
};
