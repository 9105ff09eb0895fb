import { z } from "zod";
import type { ConfigBag, UnitType } from "@neurodeck/shared";
import { ValidationError } from "../errors.js";
import type { ActivationName, ModelPlan } from "./numeric-engine.js";

/** Turns an architecture + hyperparameter bag into an engine-neutral plan. */
export interface ModelBuilder {
  readonly type: UnitType;
  plan(architecture: ConfigBag, hyperparameters: ConfigBag): ModelPlan;
}

const ACTIVATIONS = new Map<string, ActivationName>([
  ["relu", "relu"],
  ["tanh", "tanh"],
  ["sigmoid", "sigmoid"],
  ["leaky_relu", "leaky_relu"],
  ["leakyrelu", "leaky_relu"],
  ["elu", "elu"],
  ["selu", "selu"],
]);

/** Unknown activation names train with relu. */
export const activationSchema = z
  .string()
  .transform((name): ActivationName => ACTIVATIONS.get(name.toLowerCase()) ?? "relu");

export const positiveInt = z.number().int().positive();

export const dropoutRate = z.number().min(0).lt(1);

export function parseBag<T extends z.ZodTypeAny>(
  schema: T,
  bag: ConfigBag,
  label: string,
): z.output<T> {
  const result = schema.safeParse(bag);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid ${label}: ${detail}`);
  }
  return result.data;
}
