// ── Trainable unit types ─────────────────────────────────────────────

export type UnitType = "mlp" | "rnn" | "cnn";

export const UNIT_TYPES: readonly UnitType[] = ["mlp", "rnn", "cnn"];

export type UnitStatus = "created" | "training" | "trained";

export type ExportFormat = "native" | "json";

/** Untyped architecture / hyperparameter bag as sent by the editor. */
export type ConfigBag = Record<string, unknown>;

/** Persisted metadata for a trainable unit (never includes the engine handle). */
export interface UnitMetadata {
  id: string;
  name: string;
  description?: string;
  modelType: UnitType;
  architecture: ConfigBag;
  hyperparameters: ConfigBag;
  parameterCount: number;
  /** Device that was active when the unit was built. */
  deviceId: string;
  status: UnitStatus;
  createdAt: number;
  updatedAt: number;
}

export interface UnitUpdate {
  name?: string;
  description?: string;
  status?: UnitStatus;
}

// ── API request/response types ───────────────────────────────────────

export interface CreateUnitRequest {
  name: string;
  modelType: UnitType;
  architecture?: ConfigBag;
  hyperparameters?: ConfigBag;
}

export interface UnitResponse {
  model: UnitMetadata;
}

export interface UnitsListResponse {
  models: UnitMetadata[];
  total: number;
}

export interface ExportResponse {
  modelId: string;
  format: ExportFormat;
  exportPath: string;
}

export interface DeleteUnitResponse {
  modelId: string;
  deleted: true;
}
