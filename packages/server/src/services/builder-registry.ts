import fsp from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type {
  BuilderInfo,
  BuilderManifest,
  UnitType,
} from "@neurodeck/shared";
import { UNIT_TYPES } from "@neurodeck/shared";
import {
  BuilderNotFoundError,
  UnsupportedTypeError,
  errorMessage,
} from "../errors.js";
import type { ModelBuilder } from "./model-builder.js";

/** Minimal logger interface — compatible with Fastify's pino logger. */
export interface RegistryLogger {
  info(msg: string): void;
  warn(msg: string): void;
}

const nullLogger: RegistryLogger = {
  info() {},
  warn() {},
};

const parameterSchema = z.object({
  type: z.enum(["int", "float", "bool", "enum", "list"]),
  section: z.enum(["architecture", "hyperparameters"]),
  default: z.union([
    z.number(),
    z.string(),
    z.boolean(),
    z.array(z.union([z.number(), z.string()])),
  ]),
  min: z.number().optional(),
  max: z.number().optional(),
  values: z.array(z.string()).optional(),
  description: z.string().optional(),
});

const manifestSchema = z.object({
  id: z.string().min(1),
  type: z.string(),
  name: z.string(),
  version: z.string(),
  description: z.string().default(""),
  author: z.string().default("unknown"),
  category: z.string().default("general"),
  components: z.array(z.string()).default([]),
  parameters: z.record(parameterSchema).default({}),
});

function isUnitType(value: string): value is UnitType {
  return UNIT_TYPES.some((t) => t === value);
}

interface Entry {
  manifest: BuilderManifest;
  builder: ModelBuilder;
  enabled: boolean;
}

/**
 * Closed registry of model builders. Each builder type has a YAML
 * manifest in the builders directory describing its parameters; a
 * manifest whose type has no builder implementation is skipped.
 */
export class BuilderRegistry {
  private entries = new Map<string, Entry>();
  private implementations = new Map<UnitType, ModelBuilder>();
  private log: RegistryLogger;

  constructor(
    private buildersDir: string,
    builders: ModelBuilder[],
    logger?: RegistryLogger,
  ) {
    this.log = logger ?? nullLogger;
    for (const builder of builders) this.implementations.set(builder.type, builder);
  }

  /** Scan the builders directory and load all valid manifests. */
  async load(): Promise<void> {
    this.entries.clear();

    let files: string[];
    try {
      files = (await fsp.readdir(this.buildersDir))
        .filter((f) => f.endsWith(".yaml") || f.endsWith(".yml"))
        .sort();
    } catch {
      this.log.warn(`Builders directory not found: ${this.buildersDir}`);
      files = [];
    }

    for (const file of files) {
      try {
        const raw = await fsp.readFile(path.join(this.buildersDir, file), "utf-8");
        this.register(this.validate(parseYaml(raw)));
      } catch (err) {
        this.log.warn(`Failed to load builder manifest '${file}': ${errorMessage(err)}`);
      }
    }

    // Every implemented type stays usable even without a manifest
    for (const [type, builder] of this.implementations) {
      if ([...this.entries.values()].some((e) => e.manifest.type === type)) continue;
      this.log.warn(`No manifest for builder type '${type}', using defaults`);
      this.entries.set(`${type}_builder`, {
        manifest: defaultManifest(type),
        builder,
        enabled: true,
      });
    }

    this.log.info(`Builder registry: ${this.entries.size} builder(s) loaded`);
  }

  list(): BuilderInfo[] {
    return [...this.entries.values()].map(toInfo);
  }

  get(id: string): BuilderInfo {
    const entry = this.entries.get(id);
    if (!entry) throw new BuilderNotFoundError(id);
    return toInfo(entry);
  }

  categories(): string[] {
    return [...new Set([...this.entries.values()].map((e) => e.manifest.category))].sort();
  }

  setEnabled(id: string, enabled: boolean): BuilderInfo {
    const entry = this.entries.get(id);
    if (!entry) throw new BuilderNotFoundError(id);
    entry.enabled = enabled;
    this.log.info(`Builder ${id} ${enabled ? "enabled" : "disabled"}`);
    return toInfo(entry);
  }

  /** The enabled builder for a unit type. */
  resolve(type: string): ModelBuilder {
    for (const entry of this.entries.values()) {
      if (entry.manifest.type === type && entry.enabled) return entry.builder;
    }
    throw new UnsupportedTypeError(type);
  }

  private register(manifest: BuilderManifest): void {
    const builder = this.implementations.get(manifest.type);
    if (!builder) {
      this.log.warn(`Builder '${manifest.id}' declares type '${manifest.type}' with no implementation, skipping`);
      return;
    }
    this.entries.set(manifest.id, { manifest, builder, enabled: true });
    this.log.info(`Loaded builder: ${manifest.id} v${manifest.version}`);
  }

  private validate(raw: unknown): BuilderManifest {
    const result = manifestSchema.safeParse(raw);
    if (!result.success) {
      throw new Error(
        `manifest validation failed: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      );
    }
    const { type, ...rest } = result.data;
    if (!isUnitType(type)) {
      throw new Error(`type '${type}' has no builder implementation`);
    }
    return { ...rest, type };
  }
}

function toInfo(entry: Entry): BuilderInfo {
  return { ...entry.manifest, enabled: entry.enabled };
}

function defaultManifest(type: UnitType): BuilderManifest {
  return {
    id: `${type}_builder`,
    type,
    name: type.toUpperCase(),
    version: "1.0.0",
    description: "",
    author: "unknown",
    category: "general",
    components: [],
    parameters: {},
  };
}
