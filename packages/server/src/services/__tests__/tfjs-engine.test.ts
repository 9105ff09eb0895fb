import { describe, it, after } from "node:test";
import assert from "node:assert/strict";
import fsp from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { TfjsEngine } from "../tfjs-engine.js";
import { mlpBuilder } from "../builders/mlp-builder.js";
import { JobCoordinator } from "../job-coordinator.js";
import { UnitConcurrencyPolicy } from "../job-policy.js";
import { JobStore } from "../job-store.js";
import { ProgressBroadcaster } from "../progress-broadcaster.js";
import { makeDevice, makeUnitStack, silentLog, waitFor } from "./fakes.js";

// ---------------------------------------------------------------------------
// Runs the real tfjs CPU kernel on a tiny network
// ---------------------------------------------------------------------------

const CPU = makeDevice({ id: "cpu:0", backend: "cpu_fallback", isDiscrete: false });

function tinyBatch() {
  return {
    inputs: new Float32Array([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1]),
    labels: new Int32Array([0, 1, 2, 0]),
    size: 4,
    sampleShape: [4],
  };
}

describe("TfjsEngine", () => {
  it("binds the CPU device to the cpu backend", async () => {
    const engine = new TfjsEngine(silentLog);
    await engine.bindDevice(CPU);
    assert.equal(engine.boundDeviceId(), "cpu:0");
    assert.equal(engine.backendName(), "cpu");
  });

  it("builds a dense network with the expected parameter count", async () => {
    const engine = new TfjsEngine(silentLog);
    await engine.bindDevice(CPU);
    const model = engine.build(mlpBuilder.plan({ layers: [4, 8, 3] }, {}));
    try {
      // (4*8 + 8) + (8*3 + 3)
      assert.equal(model.parameterCount, 67);
      const shape = await model.outputShape({
        shape: [2, 4],
        values: new Float32Array(8),
      });
      assert.deepEqual(shape, [2, 3]);
    } finally {
      model.dispose();
    }
  });

  it("trains and evaluates a batch", async () => {
    const engine = new TfjsEngine(silentLog);
    await engine.bindDevice(CPU);
    const model = engine.build(mlpBuilder.plan({ layers: [4, 8, 3] }, {}));
    try {
      model.prepareTraining({
        optimizer: "sgd",
        learningRate: 0.1,
        momentum: 0.9,
        loss: "cross_entropy",
      });
      const trained = await model.trainBatch(tinyBatch());
      assert.equal(trained.count, 4);
      assert.ok(Number.isFinite(trained.loss));
      assert.ok(trained.correct >= 0 && trained.correct <= 4);

      const evaluated = await model.evaluateBatch(tinyBatch());
      assert.equal(evaluated.count, 4);
      assert.ok(Number.isFinite(evaluated.loss));
    } finally {
      model.dispose();
    }
  });

  it("exports weights in both forms", async () => {
    const engine = new TfjsEngine(silentLog);
    await engine.bindDevice(CPU);
    const model = engine.build(mlpBuilder.plan({ layers: [4, 8, 3] }, {}));
    try {
      const native = await model.exportNative();
      assert.equal(native.modelJson.format, "layers-model");
      // 67 float32 parameters
      assert.equal(native.weights.byteLength, 268);

      const layers = await model.exportWeights();
      assert.deepEqual(
        layers.map((l) => l.className),
        ["Dense", "Activation", "Dense"],
      );
      assert.deepEqual(
        layers[0].weights.map((w) => w.shape),
        [[4, 8], [8]],
      );
    } finally {
      model.dispose();
    }
  });

  it("reports benchmark timing", async () => {
    const engine = new TfjsEngine(silentLog);
    await engine.bindDevice(CPU);
    const timing = await engine.benchmark(16, 2);
    assert.ok(timing.totalTimeSeconds >= 0);
    assert.ok(timing.gflops >= 0);
  });
});

// ---------------------------------------------------------------------------
// End to end: coordinator over the real engine
// ---------------------------------------------------------------------------

let cleanups: string[] = [];

after(async () => {
  for (const dir of cleanups) {
    await fsp.rm(dir, { recursive: true, force: true });
  }
});

describe("JobCoordinator on tfjs", () => {
  it("trains a tiny MLP on inline data to completion", async () => {
    const dir = await fsp.mkdtemp(path.join(os.tmpdir(), "tfjs-e2e-"));
    cleanups.push(dir);
    const engine = new TfjsEngine(silentLog);
    const { units } = await makeUnitStack(dir, engine);
    const coordinator = new JobCoordinator(
      new JobStore(),
      units,
      new ProgressBroadcaster(silentLog),
      new UnitConcurrencyPolicy(1),
      silentLog,
      { epochYieldMs: 0 },
    );

    const unitId = await units.create("e2e", "mlp", { layers: [4, 8, 3] }, {});
    const batch = tinyBatch();
    const rows = Array.from({ length: 4 }, (_, i) => [...batch.inputs.subarray(i * 4, i * 4 + 4)]);
    const jobId = coordinator.start(
      unitId,
      { type: "inline", inputs: rows, labels: [...batch.labels] },
      { epochs: 3, batch_size: 2, learning_rate: 0.05 },
    );
    await waitFor(() => coordinator.activeCount() === 0, 20_000);

    const job = coordinator.status(jobId);
    assert.equal(job.status, "completed");
    assert.equal(job.history.length, 3);
    assert.ok(job.history.every((h) => Number.isFinite(h.loss)));
    assert.ok(job.metrics.accuracy >= 0 && job.metrics.accuracy <= 100);
    assert.equal(units.get(unitId).status, "trained");
    units.dispose();
  });
});
