import fsp from "node:fs/promises";
import path from "node:path";
import { nanoid } from "nanoid";
import type { FastifyBaseLogger } from "fastify";
import type {
  ConfigBag,
  ExportFormat,
  UnitMetadata,
  UnitStatus,
  UnitUpdate,
} from "@neurodeck/shared";
import {
  UnitBusyError,
  UnitNotFoundError,
  UnsupportedFormatError,
  errorMessage,
} from "../errors.js";
import type { BuilderRegistry } from "./builder-registry.js";
import { seededRandom } from "./datasets.js";
import type { DeviceSelector } from "./device-selector.js";
import type { MetadataStore } from "./metadata-store.js";
import type { DummyInput, EngineModel, ModelPlan, NumericEngine } from "./numeric-engine.js";

const FORMAT_ALIASES = new Map<string, ExportFormat>([
  ["native", "native"],
  ["tfjs", "native"],
  ["json", "json"],
  ["interchange", "json"],
]);

export function resolveExportFormat(format: string): ExportFormat {
  const resolved = FORMAT_ALIASES.get(format.toLowerCase());
  if (!resolved) throw new UnsupportedFormatError(format);
  return resolved;
}

interface UnitRecord {
  metadata: UnitMetadata;
  plan: ModelPlan;
  model: EngineModel;
  leases: number;
}

/** A job's borrow of a unit; release exactly once. */
export interface UnitLease {
  readonly unitId: string;
  readonly model: EngineModel;
  readonly plan: ModelPlan;
  release(): void;
}

/** Single-sample input shaped to a plan, for shape probes and exports. */
export function dummyInput(plan: ModelPlan, seed = 0): DummyInput {
  const shape = [1, ...plan.inputShape];
  const rand = seededRandom(seed);
  const values = Float32Array.from(
    { length: shape.reduce((a, b) => a * b, 1) },
    () => rand() * 2 - 1,
  );
  return { shape, values };
}

/**
 * Owns every trainable unit: the engine model plus its persisted metadata.
 * Jobs borrow units through leases; a leased unit cannot be deleted.
 */
export class TrainableUnitRegistry {
  private units = new Map<string, UnitRecord>();

  constructor(
    private store: MetadataStore,
    private builders: BuilderRegistry,
    private selector: DeviceSelector,
    private engine: NumericEngine,
    private exportDir: string,
    private log: FastifyBaseLogger,
  ) {}

  async create(
    name: string,
    type: string,
    architecture: ConfigBag,
    hyperparameters: ConfigBag,
    description?: string,
  ): Promise<string> {
    const builder = this.builders.resolve(type);
    const plan = builder.plan(architecture, hyperparameters);

    const { model, deviceId } = await this.selector.withDevice(async (device) => ({
      model: this.engine.build(plan),
      deviceId: device.id,
    }));

    const now = Date.now();
    const metadata: UnitMetadata = {
      id: nanoid(),
      name,
      description,
      modelType: builder.type,
      architecture,
      hyperparameters,
      parameterCount: model.parameterCount,
      deviceId,
      status: "created",
      createdAt: now,
      updatedAt: now,
    };

    try {
      await this.store.save(metadata);
    } catch (err) {
      model.dispose();
      throw err;
    }

    this.units.set(metadata.id, { metadata, plan, model, leases: 0 });
    this.log.info(
      { unitId: metadata.id, type: builder.type, parameters: model.parameterCount, deviceId },
      "Model created",
    );
    return metadata.id;
  }

  /**
   * Rebuild every persisted unit at startup. Weights are not persisted, so a
   * restored unit starts from fresh weights in status `created`. Files that
   * fail to parse or name a type no enabled builder handles are skipped.
   */
  async restore(): Promise<number> {
    const { units, invalid } = await this.store.list();
    for (const { file, error } of invalid) {
      this.log.warn({ file, err: error }, "Skipping unreadable model metadata");
    }

    let restored = 0;
    let skipped = invalid.length;
    for (const stored of units) {
      if (this.units.has(stored.id)) continue;
      try {
        const plan = this.builders
          .resolve(stored.modelType)
          .plan(stored.architecture, stored.hyperparameters);
        const { model, deviceId } = await this.selector.withDevice(async (device) => ({
          model: this.engine.build(plan),
          deviceId: device.id,
        }));
        const metadata: UnitMetadata = {
          ...stored,
          parameterCount: model.parameterCount,
          deviceId,
          status: "created",
        };
        if (stored.status !== "created" || stored.deviceId !== deviceId) {
          metadata.updatedAt = Date.now();
          await this.store.save(metadata);
        }
        this.units.set(metadata.id, { metadata, plan, model, leases: 0 });
        restored += 1;
      } catch (err) {
        this.log.warn(
          { unitId: stored.id, type: stored.modelType, err: errorMessage(err) },
          "Skipping model that could not be rebuilt",
        );
        skipped += 1;
      }
    }

    if (restored > 0 || skipped > 0) {
      this.log.info({ restored, skipped }, "Models restored");
    }
    return restored;
  }

  get(unitId: string): UnitMetadata {
    return { ...this.require(unitId).metadata };
  }

  has(unitId: string): boolean {
    return this.units.has(unitId);
  }

  list(offset = 0, limit?: number): UnitMetadata[] {
    const all = [...this.units.values()].map((u) => ({ ...u.metadata }));
    return all.slice(offset, limit === undefined ? undefined : offset + limit);
  }

  count(): number {
    return this.units.size;
  }

  /** Patch name, description or status. */
  async update(unitId: string, patch: UnitUpdate): Promise<UnitMetadata> {
    const record = this.require(unitId);
    const next: UnitMetadata = { ...record.metadata, updatedAt: Date.now() };
    if (patch.name !== undefined) next.name = patch.name;
    if (patch.description !== undefined) next.description = patch.description;
    if (patch.status !== undefined) next.status = patch.status;

    await this.store.save(next);
    if (this.units.get(unitId) !== record) {
      // Deleted while the write was in flight; the write recreated its file
      await this.store.delete(unitId);
      throw new UnitNotFoundError(unitId);
    }
    record.metadata = next;
    return { ...next };
  }

  setStatus(unitId: string, status: UnitStatus): Promise<UnitMetadata> {
    return this.update(unitId, { status });
  }

  async delete(unitId: string): Promise<void> {
    const record = this.require(unitId);
    if (record.leases > 0) {
      throw new UnitBusyError(`Model ${unitId} is in use by ${record.leases} training job(s)`);
    }
    this.units.delete(unitId);
    record.model.dispose();
    const removed = await this.store.delete(unitId);
    this.log.info({ unitId, metadataRemoved: removed }, "Model deleted");
  }

  /** Borrow a unit for the duration of a job. */
  acquire(unitId: string): UnitLease {
    const record = this.require(unitId);
    record.leases += 1;
    let released = false;
    return {
      unitId,
      model: record.model,
      plan: record.plan,
      release: () => {
        if (released) return;
        released = true;
        record.leases -= 1;
      },
    };
  }

  leaseCount(unitId: string): number {
    return this.units.get(unitId)?.leases ?? 0;
  }

  /** Write the unit's weights to the export directory; returns the written path. */
  async export(unitId: string, format: string): Promise<string> {
    const record = this.require(unitId);
    const resolved = resolveExportFormat(format);
    const unitDir = path.join(this.exportDir, unitId);
    await fsp.mkdir(unitDir, { recursive: true });

    let exportPath: string;
    if (resolved === "native") {
      const artifacts = await record.model.exportNative();
      exportPath = path.join(unitDir, "model.json");
      await fsp.writeFile(exportPath, JSON.stringify(artifacts.modelJson, null, 2));
      await fsp.writeFile(path.join(unitDir, "weights.bin"), artifacts.weights);
    } else {
      const input = dummyInput(record.plan);
      const document = {
        format: "neurodeck-interchange",
        version: 1,
        modelId: unitId,
        name: record.metadata.name,
        modelType: record.metadata.modelType,
        inputShape: input.shape,
        outputShape: await record.model.outputShape(input),
        parameterCount: record.metadata.parameterCount,
        architecture: record.metadata.architecture,
        hyperparameters: record.metadata.hyperparameters,
        layers: await record.model.exportWeights(),
        exportedAt: new Date().toISOString(),
      };
      exportPath = path.join(unitDir, `${unitId}.interchange.json`);
      await fsp.writeFile(exportPath, JSON.stringify(document));
    }

    this.log.info({ unitId, format: resolved, exportPath }, "Model exported");
    return exportPath;
  }

  /** Dispose every engine model; metadata files stay on disk. */
  dispose(): void {
    for (const record of this.units.values()) record.model.dispose();
    this.units.clear();
  }

  private require(unitId: string): UnitRecord {
    const record = this.units.get(unitId);
    if (!record) throw new UnitNotFoundError(unitId);
    return record;
  }
}
