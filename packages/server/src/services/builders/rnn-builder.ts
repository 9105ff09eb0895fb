import { z } from "zod";
import type { ConfigBag } from "@neurodeck/shared";
import type { LayerSpec, ModelPlan } from "../numeric-engine.js";
import { dropoutRate, parseBag, positiveInt, type ModelBuilder } from "../model-builder.js";

const cellSchema = z.preprocess(
  (value) => (typeof value === "string" ? value.toLowerCase() : value),
  z.enum(["lstm", "gru", "rnn"]),
);

const architectureSchema = z.object({
  input_size: positiveInt.default(100),
  hidden_size: positiveInt.default(128),
  num_layers: positiveInt.default(2),
  output_size: positiveInt.default(10),
  rnn_type: cellSchema.default("lstm"),
  bidirectional: z.boolean().default(false),
  /** Time steps per sample. */
  seq_length: positiveInt.default(10),
});

const hyperparameterSchema = z.object({
  dropout: dropoutRate.default(0),
});

/** Stacked recurrent layers; the last step feeds a dense head. */
export const rnnBuilder: ModelBuilder = {
  type: "rnn",

  plan(architecture: ConfigBag, hyperparameters: ConfigBag): ModelPlan {
    const arch = parseBag(architectureSchema, architecture, "rnn architecture");
    const { dropout } = parseBag(hyperparameterSchema, hyperparameters, "rnn hyperparameters");

    const layers: LayerSpec[] = [];
    for (let l = 0; l < arch.num_layers; l++) {
      const last = l === arch.num_layers - 1;
      layers.push({
        kind: "recurrent",
        cell: arch.rnn_type,
        units: arch.hidden_size,
        returnSequences: !last,
        bidirectional: arch.bidirectional,
      });
      if (!last && dropout > 0) layers.push({ kind: "dropout", rate: dropout });
    }
    layers.push({ kind: "dense", units: arch.output_size, useBias: true });

    return {
      type: "rnn",
      inputShape: [arch.seq_length, arch.input_size],
      outputSize: arch.output_size,
      layers,
    };
  },
};
