import { describe, it, after } from "node:test";
import assert from "node:assert/strict";
import fsp from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { fileURLToPath } from "node:url";
import { BuilderRegistry } from "../builder-registry.js";
import { mlpBuilder } from "../builders/mlp-builder.js";
import { rnnBuilder } from "../builders/rnn-builder.js";
import { cnnBuilder } from "../builders/cnn-builder.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const BUILDERS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../../builders",
);

const ALL_BUILDERS = [mlpBuilder, rnnBuilder, cnnBuilder];

let cleanups: string[] = [];

async function freshTmpDir(): Promise<string> {
  const dir = await fsp.mkdtemp(path.join(os.tmpdir(), "builder-test-"));
  cleanups.push(dir);
  return dir;
}

after(async () => {
  for (const dir of cleanups) {
    await fsp.rm(dir, { recursive: true, force: true });
  }
});

// ---------------------------------------------------------------------------
// Plans
// ---------------------------------------------------------------------------

describe("mlpBuilder", () => {
  it("uses the default layer widths", () => {
    const plan = mlpBuilder.plan({}, {});
    assert.deepEqual(plan.inputShape, [784]);
    assert.equal(plan.outputSize, 10);
    assert.deepEqual(
      plan.layers.map((l) => l.kind),
      ["dense", "activation", "dense", "activation", "dense"],
    );
  });

  it("inserts dropout after hidden activations", () => {
    const plan = mlpBuilder.plan({ layers: [4, 8, 3] }, { dropout: 0.2, activation: "tanh" });
    assert.deepEqual(plan.layers, [
      { kind: "dense", units: 8, useBias: true },
      { kind: "activation", fn: "tanh" },
      { kind: "dropout", rate: 0.2 },
      { kind: "dense", units: 3, useBias: true },
    ]);
  });

  it("trains unknown activations with relu", () => {
    const plan = mlpBuilder.plan({ layers: [4, 8, 3] }, { activation: "gelu" });
    assert.deepEqual(plan.layers[1], { kind: "activation", fn: "relu" });
  });

  it("rejects a single-layer architecture", () => {
    assert.throws(() => mlpBuilder.plan({ layers: [10] }, {}), {
      name: "ValidationError",
    });
  });
});

describe("rnnBuilder", () => {
  it("stacks recurrent layers and a dense head", () => {
    const plan = rnnBuilder.plan({}, {});
    assert.deepEqual(plan.inputShape, [10, 100]);
    assert.equal(plan.outputSize, 10);
    assert.deepEqual(plan.layers, [
      { kind: "recurrent", cell: "lstm", units: 128, returnSequences: true, bidirectional: false },
      { kind: "recurrent", cell: "lstm", units: 128, returnSequences: false, bidirectional: false },
      { kind: "dense", units: 10, useBias: true },
    ]);
  });

  it("accepts upper-case cell names", () => {
    const plan = rnnBuilder.plan({ rnn_type: "GRU", num_layers: 1, bidirectional: true }, {});
    assert.deepEqual(plan.layers[0], {
      kind: "recurrent",
      cell: "gru",
      units: 128,
      returnSequences: false,
      bidirectional: true,
    });
  });

  it("rejects unknown cell types", () => {
    assert.throws(() => rnnBuilder.plan({ rnn_type: "transformer" }, {}), {
      name: "ValidationError",
    });
  });
});

describe("cnnBuilder", () => {
  it("builds conv blocks then the classifier", () => {
    const plan = cnnBuilder.plan({}, {});
    assert.deepEqual(plan.inputShape, [32, 32, 3]);
    assert.equal(plan.outputSize, 10);
    assert.equal(plan.layers.length, 20);
    assert.deepEqual(plan.layers.slice(0, 4), [
      { kind: "conv2d", filters: 32, kernelSize: 3, strides: 1 },
      { kind: "batch_norm" },
      { kind: "activation", fn: "relu" },
      { kind: "pool2d", mode: "max", size: 2 },
    ]);
    assert.deepEqual(plan.layers[plan.layers.length - 1], {
      kind: "dense",
      units: 10,
      useBias: true,
    });
  });

  it("rejects architectures that pool the image away", () => {
    assert.throws(
      () => cnnBuilder.plan({ image_size: 4, conv_layers: [8, 8, 8] }, {}),
      /collapses to zero after conv block 3/,
    );
  });
});

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

describe("BuilderRegistry", () => {
  it("loads the bundled manifests", async () => {
    const registry = new BuilderRegistry(BUILDERS_DIR, ALL_BUILDERS);
    await registry.load();

    assert.deepEqual(
      registry.list().map((b) => b.id).sort(),
      ["cnn_builder", "mlp_builder", "rnn_builder"],
    );
    assert.deepEqual(registry.categories(), ["feedforward", "sequence", "vision"]);
    assert.equal(registry.get("rnn_builder").parameters.rnn_type.default, "LSTM");
    assert.equal(registry.resolve("cnn"), cnnBuilder);
  });

  it("refuses types whose builder is disabled", async () => {
    const registry = new BuilderRegistry(BUILDERS_DIR, ALL_BUILDERS);
    await registry.load();

    registry.setEnabled("mlp_builder", false);
    assert.equal(registry.get("mlp_builder").enabled, false);
    assert.throws(() => registry.resolve("mlp"), { name: "UnsupportedTypeError" });

    registry.setEnabled("mlp_builder", true);
    assert.equal(registry.resolve("mlp"), mlpBuilder);
  });

  it("throws for unknown builder ids", async () => {
    const registry = new BuilderRegistry(BUILDERS_DIR, ALL_BUILDERS);
    await registry.load();
    assert.throws(() => registry.get("nope"), { name: "BuilderNotFoundError" });
    assert.throws(() => registry.resolve("transformer"), { name: "UnsupportedTypeError" });
  });

  it("skips manifests whose type has no implementation", async () => {
    const dir = await freshTmpDir();
    await fsp.writeFile(
      path.join(dir, "transformer.yaml"),
      "id: transformer_builder\ntype: transformer\nname: Transformer\nversion: 0.1.0\n",
    );
    await fsp.writeFile(
      path.join(dir, "mlp.yaml"),
      "id: tiny_mlp\ntype: mlp\nname: Tiny MLP\nversion: 0.1.0\ncategory: custom\n",
    );
    const warnings: string[] = [];
    const registry = new BuilderRegistry(dir, [mlpBuilder], {
      info() {},
      warn(msg) {
        warnings.push(msg);
      },
    });
    await registry.load();

    assert.deepEqual(
      registry.list().map((b) => b.id),
      ["tiny_mlp"],
    );
    assert.equal(warnings.length, 1);
    assert.match(warnings[0], /transformer\.yaml/);
  });

  it("falls back to default manifests when the directory is missing", async () => {
    const registry = new BuilderRegistry("/nonexistent/builders", ALL_BUILDERS);
    await registry.load();

    assert.deepEqual(
      registry.list().map((b) => b.id),
      ["mlp_builder", "rnn_builder", "cnn_builder"],
    );
    assert.equal(registry.resolve("rnn"), rnnBuilder);
  });
});
