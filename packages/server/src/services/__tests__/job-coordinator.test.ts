import { describe, it, after } from "node:test";
import assert from "node:assert/strict";
import fsp from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { setTimeout as sleep } from "node:timers/promises";
import type { PushFrame } from "@neurodeck/shared";
import {
  InvalidStateError,
  JobNotFoundError,
  UnitBusyError,
  UnitNotFoundError,
} from "../../errors.js";
import { JobCoordinator } from "../job-coordinator.js";
import { UnitConcurrencyPolicy } from "../job-policy.js";
import { JobStore } from "../job-store.js";
import { ProgressBroadcaster, type PushChannel } from "../progress-broadcaster.js";
import { FakeEngine, makeUnitStack, silentLog, waitFor } from "./fakes.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let cleanups: string[] = [];

async function freshTmpDir(): Promise<string> {
  const dir = await fsp.mkdtemp(path.join(os.tmpdir(), "coordinator-test-"));
  cleanups.push(dir);
  return dir;
}

after(async () => {
  for (const dir of cleanups) {
    await fsp.rm(dir, { recursive: true, force: true });
  }
});

const DATASET = { type: "dummy", num_samples: 100 } as const;

async function setup(engine = new FakeEngine(), deliveryTimeoutMs = 5000) {
  const stack = await makeUnitStack(await freshTmpDir(), engine);
  const store = new JobStore();
  const broadcaster = new ProgressBroadcaster(silentLog, { deliveryTimeoutMs });
  const coordinator = new JobCoordinator(
    store,
    stack.units,
    broadcaster,
    new UnitConcurrencyPolicy(1),
    silentLog,
    { epochYieldMs: 0 },
  );
  const unitId = await stack.units.create("tiny", "mlp", { layers: [4, 8, 3] }, {});
  return { ...stack, store, broadcaster, coordinator, unitId };
}

function recorder(id: string): PushChannel & { frames: PushFrame[] } {
  const frames: PushFrame[] = [];
  return {
    id,
    frames,
    send(frame: PushFrame) {
      frames.push(frame);
    },
  };
}

async function settled(coordinator: JobCoordinator): Promise<void> {
  await waitFor(() => coordinator.activeCount() === 0);
}

// ---------------------------------------------------------------------------
// Running to completion
// ---------------------------------------------------------------------------

describe("JobCoordinator.start", () => {
  it("trains 3 epochs over 100 dummy samples and completes", async () => {
    const { coordinator, units, unitId } = await setup();

    const jobId = coordinator.start(unitId, DATASET, { epochs: 3, batch_size: 10 });
    assert.equal(coordinator.status(jobId).status, "initializing");
    assert.equal(units.leaseCount(unitId), 1);

    await settled(coordinator);

    const job = coordinator.status(jobId);
    assert.equal(job.status, "completed");
    assert.equal(job.currentEpoch, 3);
    assert.equal(job.totalEpochs, 3);
    assert.equal(job.history.length, 3);
    assert.equal(job.estimatedTimeRemaining, 0);
    assert.ok(job.startedAt !== undefined);
    assert.ok(job.completedAt !== undefined);
    assert.equal(units.leaseCount(unitId), 0);
    assert.equal(units.get(unitId).status, "trained");
  });

  it("records strictly increasing epochs with falling loss", async () => {
    const { coordinator, unitId } = await setup();
    const jobId = coordinator.start(unitId, DATASET, { epochs: 3, batch_size: 10 });
    await settled(coordinator);

    const { history } = coordinator.status(jobId);
    assert.deepEqual(
      history.map((h) => h.epoch),
      [1, 2, 3],
    );
    assert.ok(history[0].loss > history[1].loss);
    assert.ok(history[1].loss > history[2].loss);
    // Fake model gets half of every batch right
    assert.equal(history[2].accuracy, 50);
  });

  it("passes resolved defaults to the engine", async () => {
    const { coordinator, engine, unitId } = await setup();
    coordinator.start(unitId, DATASET, { epochs: 1, optimizer: "sgd" });
    await settled(coordinator);

    assert.deepEqual(engine.models[0].settings, {
      optimizer: "sgd",
      learningRate: 0.001,
      momentum: 0.9,
      loss: "cross_entropy",
    });
  });

  it("reports validation metrics when a validation set is given", async () => {
    const { coordinator, unitId } = await setup();
    const jobId = coordinator.start(
      unitId,
      DATASET,
      { epochs: 2, batch_size: 25 },
      { type: "dummy", num_samples: 20 },
    );
    await settled(coordinator);

    const job = coordinator.status(jobId);
    assert.equal(job.metrics.val_loss, 0.5);
    assert.equal(job.metrics.val_accuracy, 100);
    assert.equal(job.history[1].val_accuracy, 100);
  });

  it("pushes one frame per epoch plus the final state to subscribers", async () => {
    const { coordinator, broadcaster, unitId } = await setup();
    const subscriber = recorder("sub-1");
    const connection = recorder("conn-1");
    broadcaster.addConnection(connection);

    const jobId = coordinator.start(unitId, DATASET, { epochs: 3, batch_size: 50 });
    broadcaster.subscribe(jobId, subscriber);
    await settled(coordinator);
    broadcaster.close();

    const progress = subscriber.frames.filter((f) => f.type === "training_progress");
    assert.equal(progress.length, 4);
    const last = progress[3];
    assert.equal(last.type === "training_progress" && last.data.status, "completed");

    const updates = connection.frames.flatMap((f) =>
      f.type === "job_update" ? [f.data.status] : [],
    );
    assert.deepEqual(updates, ["running", "completed"]);
  });

  it("keeps training while a subscriber is slow to take frames", async () => {
    const { coordinator, broadcaster, unitId } = await setup(new FakeEngine(), 2000);
    let stalledSends = 0;
    const stalled: PushChannel = {
      id: "stalled",
      send: () => {
        stalledSends += 1;
        return new Promise<void>(() => {});
      },
    };
    const prompt = recorder("prompt");

    const jobId = coordinator.start(unitId, DATASET, { epochs: 3, batch_size: 50 });
    broadcaster.subscribe(jobId, stalled);
    broadcaster.subscribe(jobId, prompt);
    // Well under the delivery timeout: the job must not wait on the stalled peer
    await waitFor(() => coordinator.activeCount() === 0, 1000);

    assert.equal(coordinator.status(jobId).status, "completed");
    assert.equal(prompt.frames.length, 4);
    assert.equal(stalledSends, 1);
    assert.equal(broadcaster.subscriberCount(jobId), 2);
    broadcaster.close();
  });

  it("throws for an unknown unit", async () => {
    const { coordinator } = await setup();
    assert.throws(() => coordinator.start("missing", DATASET, {}), UnitNotFoundError);
  });

  it("rejects a second job on a busy unit", async () => {
    const { coordinator, unitId } = await setup(new FakeEngine({ batchDelayMs: 5 }));
    const first = coordinator.start(unitId, DATASET, { epochs: 100, batch_size: 10 });

    assert.throws(
      () => coordinator.start(unitId, DATASET, { epochs: 1 }),
      (err: unknown) => err instanceof UnitBusyError && /already has 1 active/.test(err.message),
    );

    coordinator.stop(first);
    await settled(coordinator);
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe("JobCoordinator failures", () => {
  it("marks the job failed when the engine throws", async () => {
    const { coordinator, units, unitId } = await setup(new FakeEngine({ failAtStep: 3 }));
    const jobId = coordinator.start(unitId, DATASET, { epochs: 5, batch_size: 10 });
    await settled(coordinator);

    const job = coordinator.status(jobId);
    assert.equal(job.status, "failed");
    assert.equal(job.error, "simulated engine failure");
    assert.equal(units.leaseCount(unitId), 0);
    assert.equal(units.get(unitId).status, "created");
  });

  it("fails a job whose dataset does not fit the model", async () => {
    const { coordinator, unitId } = await setup();
    const jobId = coordinator.start(
      unitId,
      { type: "dummy", num_samples: 10, input_size: 5 },
      { epochs: 1 },
    );
    await settled(coordinator);

    const job = coordinator.status(jobId);
    assert.equal(job.status, "failed");
    assert.equal(job.error, "Dataset input_size 5 does not match model input 4");
  });
});

// ---------------------------------------------------------------------------
// Controls
// ---------------------------------------------------------------------------

describe("JobCoordinator controls", () => {
  it("stop cancels a running job and never completes it", async () => {
    const { coordinator, units, unitId } = await setup(new FakeEngine({ batchDelayMs: 5 }));
    const jobId = coordinator.start(unitId, DATASET, { epochs: 50, batch_size: 10 });
    await waitFor(() => coordinator.status(jobId).currentEpoch >= 1);

    const result = coordinator.stop(jobId);
    assert.deepEqual(result, { jobId, control: "stop", applied: true, status: "stopping" });

    await settled(coordinator);
    const job = coordinator.status(jobId);
    assert.equal(job.status, "cancelled");
    assert.ok(job.currentEpoch < 50);
    assert.equal(units.get(unitId).status, "created");
  });

  it("pause holds at an epoch boundary until resume", async () => {
    const { coordinator, unitId } = await setup(new FakeEngine({ batchDelayMs: 2 }));
    const jobId = coordinator.start(unitId, DATASET, { epochs: 10, batch_size: 10 });
    await waitFor(() => coordinator.status(jobId).currentEpoch >= 1);

    assert.equal(coordinator.pause(jobId).applied, true);
    assert.equal(coordinator.status(jobId).status, "paused");

    await sleep(150);
    const held = coordinator.status(jobId).currentEpoch;
    await sleep(150);
    assert.equal(coordinator.status(jobId).currentEpoch, held);
    assert.ok(held < 10);

    assert.equal(coordinator.resume(jobId).applied, true);
    await settled(coordinator);
    const job = coordinator.status(jobId);
    assert.equal(job.status, "completed");
    assert.equal(job.currentEpoch, 10);
  });

  it("stop wakes a paused job and cancels it", async () => {
    const { coordinator, unitId } = await setup(new FakeEngine({ batchDelayMs: 2 }));
    const jobId = coordinator.start(unitId, DATASET, { epochs: 50, batch_size: 10 });
    await waitFor(() => coordinator.status(jobId).currentEpoch >= 1);

    coordinator.pause(jobId);
    await sleep(50);
    coordinator.stop(jobId);
    await settled(coordinator);

    assert.equal(coordinator.status(jobId).status, "cancelled");
  });

  it("ignores controls the current state does not permit", async () => {
    const { coordinator, unitId } = await setup(new FakeEngine({ batchDelayMs: 5 }));
    const jobId = coordinator.start(unitId, DATASET, { epochs: 50, batch_size: 10 });
    await waitFor(() => coordinator.status(jobId).status === "running");

    assert.deepEqual(coordinator.resume(jobId), {
      jobId,
      control: "resume",
      applied: false,
      status: "running",
    });

    coordinator.stop(jobId);
    await settled(coordinator);

    const paused = coordinator.pause(jobId);
    assert.equal(paused.applied, false);
    assert.equal(paused.status, "cancelled");
    assert.equal(coordinator.stop(jobId).applied, false);
  });

  it("shutdown cancels every running job", async () => {
    const { coordinator, unitId } = await setup(new FakeEngine({ batchDelayMs: 5 }));
    const jobId = coordinator.start(unitId, DATASET, { epochs: 50, batch_size: 10 });

    await coordinator.shutdown();
    assert.equal(coordinator.activeCount(), 0);
    assert.equal(coordinator.status(jobId).status, "cancelled");
  });
});

describe("JobCoordinator.shutdown", () => {
  it("skips a finished job whose record was deleted while it wrapped up", async () => {
    const { coordinator, units, unitId } = await setup();
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const setStatus = units.setStatus.bind(units);
    units.setStatus = async (id, status) => {
      if (status !== "training") await gate;
      return setStatus(id, status);
    };

    const jobId = coordinator.start(unitId, DATASET, { epochs: 1, batch_size: 50 });
    await waitFor(() => coordinator.status(jobId).status === "completed");
    assert.equal(coordinator.activeCount(), 1);
    coordinator.delete(jobId);

    const down = coordinator.shutdown();
    release();
    await down;

    assert.equal(coordinator.activeCount(), 0);
    assert.equal(units.get(unitId).status, "trained");
  });
});

// ---------------------------------------------------------------------------
// Queries and deletion
// ---------------------------------------------------------------------------

describe("JobCoordinator queries", () => {
  it("reports metrics with full progress once complete", async () => {
    const { coordinator, unitId } = await setup();
    const jobId = coordinator.start(unitId, DATASET, { epochs: 2, batch_size: 50 });
    await settled(coordinator);

    const report = coordinator.metrics(jobId);
    assert.equal(report.progress, 1);
    assert.equal(report.status, "completed");
    assert.equal(report.etaSeconds, 0);
    assert.equal(report.currentMetrics.accuracy, 50);
    assert.ok(report.elapsedSeconds >= 0);
  });

  it("lists summaries without bulk configuration and filters by status", async () => {
    const { coordinator, unitId } = await setup();
    const jobId = coordinator.start(unitId, DATASET, { epochs: 1 });
    await settled(coordinator);

    const [summary] = coordinator.list();
    assert.equal(summary.jobId, jobId);
    assert.equal("history" in summary, false);
    assert.equal("trainingConfig" in summary, false);
    assert.equal(coordinator.list("completed").length, 1);
    assert.equal(coordinator.list("running").length, 0);
  });

  it("throws JobNotFoundError for unknown ids", async () => {
    const { coordinator } = await setup();
    assert.throws(() => coordinator.status("nope"), JobNotFoundError);
    assert.throws(() => coordinator.pause("nope"), JobNotFoundError);
  });

  it("refuses to delete a job that is still active", async () => {
    const { coordinator, unitId } = await setup(new FakeEngine({ batchDelayMs: 5 }));
    const jobId = coordinator.start(unitId, DATASET, { epochs: 50, batch_size: 10 });

    assert.throws(() => coordinator.delete(jobId), InvalidStateError);

    coordinator.stop(jobId);
    await settled(coordinator);
    coordinator.delete(jobId);
    assert.throws(() => coordinator.status(jobId), JobNotFoundError);
  });
});
