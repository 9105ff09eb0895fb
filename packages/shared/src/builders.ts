import type { UnitType } from "./units.js";

// ── Builder manifest types ───────────────────────────────────────────
// These mirror the YAML structure of builders/<name>.yaml.

export type BuilderParameterType = "int" | "float" | "bool" | "enum" | "list";

export type ParameterValue = number | string | boolean | Array<number | string>;

export interface BuilderParameter {
  type: BuilderParameterType;
  /** Which bag the parameter belongs to when creating a unit. */
  section: "architecture" | "hyperparameters";
  default: ParameterValue;
  min?: number;
  max?: number;
  values?: string[];
  description?: string;
}

export interface BuilderManifest {
  id: string;
  type: UnitType;
  name: string;
  version: string;
  description: string;
  author: string;
  category: string;
  components: string[];
  parameters: Record<string, BuilderParameter>;
}

export interface BuilderInfo extends BuilderManifest {
  enabled: boolean;
}

// ── API request/response types ───────────────────────────────────────

export interface BuildersListResponse {
  plugins: BuilderInfo[];
  total: number;
}

export interface BuilderResponse {
  plugin: BuilderInfo;
}

export interface BuilderCategoriesResponse {
  categories: string[];
}
