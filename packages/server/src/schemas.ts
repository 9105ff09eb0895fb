import { z } from "zod";
import { DEVICE_PREFERENCES, type DevicePreference } from "@neurodeck/shared";

// Request shapes for every route that takes a body or query string. Parsing
// errors surface as ZodError and map to 400 in the error handler.

const configBag = z.record(z.unknown());

const preference = z.string().refine(
  (v): v is DevicePreference => DEVICE_PREFERENCES.some((p) => p === v),
  { message: `must be one of ${DEVICE_PREFERENCES.join(", ")}` },
);

// ── devices ──────────────────────────────────────────────────────────

export const selectDeviceBody = z.object({
  deviceId: z.string().min(1),
});

export const preferenceBody = z.object({
  preference,
});

export const benchmarkQuery = z.object({
  size: z.coerce.number().int().min(2).max(4096).optional(),
  iterations: z.coerce.number().int().min(1).max(100).optional(),
});

// ── units ────────────────────────────────────────────────────────────

export const createUnitBody = z.object({
  name: z.string().min(1).max(200),
  // Model type as a plain string; the builder registry rejects unknown types
  // with unsupported_type rather than a schema error.
  modelType: z.string().min(1),
  description: z.string().max(2000).optional(),
  architecture: configBag.default({}),
  hyperparameters: configBag.default({}),
});

export const updateUnitBody = z.object({
  name: z.string().min(1).max(200).optional(),
  description: z.string().max(2000).optional(),
  status: z.enum(["created", "training", "trained"]).optional(),
});

export const listUnitsQuery = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const exportQuery = z.object({
  format: z.string().min(1).default("native"),
});

// ── training ─────────────────────────────────────────────────────────

const dummyDataset = z.object({
  type: z.literal("dummy"),
  num_samples: z.number().int().min(1).max(1_000_000).optional(),
  input_size: z.number().int().min(1).optional(),
  num_classes: z.number().int().min(1).optional(),
  seed: z.number().int().optional(),
});

const inlineDataset = z.object({
  type: z.literal("inline"),
  inputs: z.array(z.array(z.number())).min(1),
  labels: z.array(z.number().int()),
  num_classes: z.number().int().min(1).optional(),
});

export const datasetConfig = z.discriminatedUnion("type", [dummyDataset, inlineDataset]);

export const trainingConfig = z.object({
  epochs: z.number().int().min(1).max(100_000).optional(),
  batch_size: z.number().int().min(1).optional(),
  learning_rate: z.number().positive().optional(),
  // Unrecognized optimizers and losses fall back to the defaults
  optimizer: z.enum(["adam", "sgd", "rmsprop", "adamw"]).optional().catch("adam"),
  momentum: z.number().min(0).max(1).optional(),
  weight_decay: z.number().min(0).optional(),
  loss_function: z
    .enum(["cross_entropy", "mse", "mae", "bce", "bce_with_logits"])
    .optional()
    .catch("cross_entropy"),
  shuffle: z.boolean().optional(),
});

export const startJobBody = z.object({
  modelId: z.string().min(1),
  datasetConfig,
  trainingConfig: trainingConfig.default({}),
  validationConfig: datasetConfig.optional(),
});

export const listJobsQuery = z.object({
  status: z
    .enum(["initializing", "running", "paused", "stopping", "completed", "cancelled", "failed"])
    .optional(),
});
