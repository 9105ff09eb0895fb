import fsp from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { UnitMetadata } from "@neurodeck/shared";
import { errorMessage } from "../errors.js";

const metadataSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  modelType: z.enum(["mlp", "rnn", "cnn"]),
  architecture: z.record(z.unknown()),
  hyperparameters: z.record(z.unknown()),
  parameterCount: z.number(),
  deviceId: z.string(),
  status: z.enum(["created", "training", "trained"]),
  createdAt: z.number(),
  updatedAt: z.number(),
});

export interface StoredUnits {
  units: UnitMetadata[];
  /** Files that could not be read or did not match the metadata shape. */
  invalid: { file: string; error: string }[];
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Filesystem-backed store for unit metadata.
 * Each unit is a standalone `<id>.json` file in `modelsDir`.
 */
export class MetadataStore {
  constructor(private readonly modelsDir: string) {}

  /** Ensure the directory exists before any write. */
  private async ensureDir(): Promise<void> {
    await fsp.mkdir(this.modelsDir, { recursive: true });
  }

  private filePath(id: string): string {
    return path.join(this.modelsDir, `${id}.json`);
  }

  async save(metadata: UnitMetadata): Promise<void> {
    await this.ensureDir();
    await fsp.writeFile(this.filePath(metadata.id), JSON.stringify(metadata, null, 2));
  }

  async get(id: string): Promise<UnitMetadata | null> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.filePath(id), "utf-8");
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
    return metadataSchema.parse(JSON.parse(raw));
  }

  /** Every persisted unit, oldest first. A missing directory is an empty store. */
  async list(): Promise<StoredUnits> {
    let files: string[];
    try {
      files = await fsp.readdir(this.modelsDir);
    } catch (err) {
      if (isMissing(err)) return { units: [], invalid: [] };
      throw err;
    }

    const result: StoredUnits = { units: [], invalid: [] };
    for (const file of files.filter((f) => f.endsWith(".json")).sort()) {
      try {
        const raw = await fsp.readFile(path.join(this.modelsDir, file), "utf-8");
        result.units.push(metadataSchema.parse(JSON.parse(raw)));
      } catch (err) {
        result.invalid.push({ file, error: errorMessage(err) });
      }
    }
    result.units.sort((a, b) => a.createdAt - b.createdAt);
    return result;
  }

  /** Remove a unit's file. Returns false when there was nothing to remove. */
  async delete(id: string): Promise<boolean> {
    try {
      await fsp.unlink(this.filePath(id));
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }
}
