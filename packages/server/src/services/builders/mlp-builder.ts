import { z } from "zod";
import type { ConfigBag } from "@neurodeck/shared";
import type { LayerSpec, ModelPlan } from "../numeric-engine.js";
import {
  activationSchema,
  dropoutRate,
  parseBag,
  positiveInt,
  type ModelBuilder,
} from "../model-builder.js";

const architectureSchema = z.object({
  /** Widths including input and output, e.g. [784, 128, 64, 10]. */
  layers: z.array(positiveInt).min(2).default([784, 128, 64, 10]),
});

const hyperparameterSchema = z.object({
  activation: activationSchema.default("relu"),
  dropout: dropoutRate.default(0),
  bias: z.boolean().default(true),
});

export const mlpBuilder: ModelBuilder = {
  type: "mlp",

  plan(architecture: ConfigBag, hyperparameters: ConfigBag): ModelPlan {
    const { layers: widths } = parseBag(architectureSchema, architecture, "mlp architecture");
    const hp = parseBag(hyperparameterSchema, hyperparameters, "mlp hyperparameters");

    const layers: LayerSpec[] = [];
    for (let i = 1; i < widths.length; i++) {
      layers.push({ kind: "dense", units: widths[i], useBias: hp.bias });
      const hidden = i < widths.length - 1;
      if (!hidden) continue;
      layers.push({ kind: "activation", fn: hp.activation });
      if (hp.dropout > 0) layers.push({ kind: "dropout", rate: hp.dropout });
    }

    return {
      type: "mlp",
      inputShape: [widths[0]],
      outputSize: widths[widths.length - 1],
      layers,
    };
  },
};
