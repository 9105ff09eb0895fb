import { setImmediate as yieldTurn, setTimeout as sleep } from "node:timers/promises";
import { nanoid } from "nanoid";
import type { FastifyBaseLogger } from "fastify";
import type {
  DatasetConfig,
  EpochRecord,
  JobControl,
  JobControlResponse,
  JobMetrics,
  JobMetricsReport,
  JobStatus,
  JobSummary,
  TrainingConfig,
  TrainingJob,
  UnitStatus,
  ValidationConfig,
} from "@neurodeck/shared";
import {
  InvalidStateError,
  JobNotFoundError,
  UnitBusyError,
  errorMessage,
} from "../errors.js";
import { batchCount, batches, buildDataset, seededRandom, type Dataset } from "./datasets.js";
import type { JobPolicy } from "./job-policy.js";
import { JobStore, isTerminal } from "./job-store.js";
import type { EngineModel, TrainingSettings } from "./numeric-engine.js";
import type { ProgressBroadcaster } from "./progress-broadcaster.js";
import type { TrainableUnitRegistry, UnitLease } from "./unit-registry.js";

export interface CoordinatorConfig {
  /** Pause between epochs so control calls can interleave. */
  epochYieldMs: number;
}

const DEFAULT_CONFIG: CoordinatorConfig = {
  epochYieldMs: 10,
};

export const TRAINING_DEFAULTS = {
  epochs: 100,
  batch_size: 32,
  learning_rate: 0.001,
  optimizer: "adam",
  momentum: 0.9,
  weight_decay: 0,
  loss_function: "cross_entropy",
  shuffle: true,
} as const satisfies Required<TrainingConfig>;

const EMPTY_METRICS: JobMetrics = { loss: 0, accuracy: 0, val_loss: 0, val_accuracy: 0 };

const STOPPABLE: ReadonlySet<JobStatus> = new Set(["initializing", "running", "paused"]);

/** Snapshot without bulk configuration, as pushed and listed. */
export function toSummary(job: TrainingJob): JobSummary {
  const {
    trainingConfig: _training,
    datasetConfig: _dataset,
    validationConfig: _validation,
    history: _history,
    ...summary
  } = job;
  return summary;
}

interface Runtime {
  controller: AbortController;
  task: Promise<void>;
  wake: (() => void) | null;
}

interface EpochTotals {
  loss: number;
  correct: number;
  count: number;
}

/**
 * Runs training jobs as in-process tasks. Each job borrows its unit from
 * the registry for the duration of the run and publishes a progress frame
 * after every epoch. Control calls (pause/resume/stop) take effect at the
 * next epoch or batch boundary.
 */
export class JobCoordinator {
  private runtimes = new Map<string, Runtime>();
  private config: CoordinatorConfig;

  constructor(
    private store: JobStore,
    private units: TrainableUnitRegistry,
    private broadcaster: ProgressBroadcaster,
    private policy: JobPolicy,
    private log: FastifyBaseLogger,
    config?: Partial<CoordinatorConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /** Create a job and launch its task. Returns before any training happens. */
  start(
    unitId: string,
    datasetConfig: DatasetConfig,
    trainingConfig: TrainingConfig,
    validationConfig?: ValidationConfig,
  ): string {
    const unit = this.units.get(unitId);

    const blocked = this.policy.checkConcurrency(this.store.listActive(), unitId);
    if (blocked) throw new UnitBusyError(blocked);

    const lease = this.units.acquire(unitId);
    const now = Date.now();
    const job: TrainingJob = {
      jobId: nanoid(12),
      unitId,
      status: "initializing",
      currentEpoch: 0,
      totalEpochs: trainingConfig.epochs ?? TRAINING_DEFAULTS.epochs,
      metrics: { ...EMPTY_METRICS },
      history: [],
      createdAt: now,
      updatedAt: now,
      estimatedTimeRemaining: 0,
      trainingConfig,
      datasetConfig,
      validationConfig,
    };
    this.store.create(job);

    const controller = new AbortController();
    const runtime: Runtime = { controller, task: Promise.resolve(), wake: null };
    runtime.task = this.execute(job.jobId, lease, unit.status, runtime)
      .catch((err: unknown) => {
        this.log.error({ jobId: job.jobId, err: errorMessage(err) }, "Training task crashed");
      })
      .finally(() => {
        this.runtimes.delete(job.jobId);
      });
    this.runtimes.set(job.jobId, runtime);

    this.log.info({ jobId: job.jobId, unitId, epochs: job.totalEpochs }, "Training job created");
    return job.jobId;
  }

  pause(jobId: string): JobControlResponse {
    return this.control(jobId, "pause", (status) => status === "running", "paused");
  }

  resume(jobId: string): JobControlResponse {
    const result = this.control(jobId, "resume", (status) => status === "paused", "running");
    if (result.applied) this.runtimes.get(jobId)?.wake?.();
    return result;
  }

  stop(jobId: string): JobControlResponse {
    const result = this.control(jobId, "stop", (status) => STOPPABLE.has(status), "stopping");
    if (result.applied) this.runtimes.get(jobId)?.controller.abort();
    return result;
  }

  status(jobId: string): TrainingJob {
    const job = this.store.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  /** Summary for push channels; null for unknown jobs. */
  snapshot(jobId: string): JobSummary | null {
    const job = this.store.get(jobId);
    return job ? toSummary(job) : null;
  }

  list(filter?: JobStatus): JobSummary[] {
    return this.store
      .list()
      .filter((job) => !filter || job.status === filter)
      .sort((a, b) => b.createdAt - a.createdAt)
      .map(toSummary);
  }

  metrics(jobId: string): JobMetricsReport {
    const job = this.status(jobId);
    const end = job.completedAt ?? Date.now();
    return {
      jobId,
      currentMetrics: job.metrics,
      progress: job.totalEpochs > 0 ? job.currentEpoch / job.totalEpochs : 0,
      elapsedSeconds: job.startedAt ? (end - job.startedAt) / 1000 : 0,
      etaSeconds: job.estimatedTimeRemaining,
      status: job.status,
    };
  }

  /** Remove a finished job's record. */
  delete(jobId: string): void {
    const job = this.status(jobId);
    if (!isTerminal(job.status)) {
      throw new InvalidStateError(
        `Cannot delete job ${jobId} in status ${job.status}; stop it first`,
      );
    }
    this.store.delete(jobId);
    this.log.info({ jobId }, "Training job deleted");
  }

  activeCount(): number {
    return this.runtimes.size;
  }

  /**
   * Stop every running job and wait for the tasks to finish. A task can
   * outlive its record (finished, then deleted while wrapping up); those
   * only need awaiting.
   */
  async shutdown(): Promise<void> {
    const ids = [...this.runtimes.keys()].filter((jobId) => {
      const status = this.store.status(jobId);
      return status !== null && !isTerminal(status);
    });
    for (const jobId of ids) this.stop(jobId);
    await Promise.allSettled([...this.runtimes.values()].map((r) => r.task));
    this.log.info({ stopped: ids.length }, "Job coordinator shut down");
  }

  // ── control plumbing ──────────────────────────────────────────────────

  private control(
    jobId: string,
    control: JobControl,
    allowed: (status: JobStatus) => boolean,
    next: JobStatus,
  ): JobControlResponse {
    const job = this.status(jobId);
    if (!allowed(job.status)) {
      this.log.warn({ jobId, control, status: job.status }, "Control call ignored");
      return { jobId, control, applied: false, status: job.status };
    }
    const updated = this.transition(jobId, { status: next });
    this.log.info({ jobId, control }, "Control applied");
    return { jobId, control, applied: true, status: updated.status };
  }

  private transition(jobId: string, patch: Partial<TrainingJob>): TrainingJob {
    const updated = this.store.update(jobId, patch);
    if (!updated) throw new JobNotFoundError(jobId);
    if (patch.status) this.announce(updated);
    return updated;
  }

  private announce(job: TrainingJob): void {
    this.broadcaster
      .broadcast({ type: "job_update", data: toSummary(job) })
      .catch((err: unknown) => {
        this.log.warn({ jobId: job.jobId, err: errorMessage(err) }, "Job update broadcast failed");
      });
  }

  /** Hand a frame to the subscribers' queues; training never waits on delivery. */
  private publish(job: TrainingJob): void {
    this.broadcaster.publish(job.jobId, toSummary(job)).catch((err: unknown) => {
      this.log.warn({ jobId: job.jobId, err: errorMessage(err) }, "Progress publish failed");
    });
  }

  // ── execution task ────────────────────────────────────────────────────

  private async execute(
    jobId: string,
    lease: UnitLease,
    priorUnitStatus: UnitStatus,
    runtime: Runtime,
  ): Promise<void> {
    // Let start() return before any work happens
    await yieldTurn();

    const signal = runtime.controller.signal;
    let final: JobStatus = "cancelled";
    let failure: string | undefined;

    try {
      if (!signal.aborted) {
        await this.units.setStatus(lease.unitId, "training");
        await this.train(jobId, lease, runtime);
        final = signal.aborted ? "cancelled" : "completed";
      }
    } catch (err) {
      final = "failed";
      failure = errorMessage(err);
      this.log.error({ jobId, err: failure }, "Training job failed");
    } finally {
      lease.release();
    }

    const done = this.transition(jobId, {
      status: final,
      completedAt: Date.now(),
      error: failure,
      estimatedTimeRemaining: 0,
    });
    this.publish(done);
    await this.restoreUnit(lease.unitId, final === "completed" ? "trained" : priorUnitStatus);
    this.log.info(
      { jobId, status: final, epochs: done.currentEpoch, loss: done.metrics.loss },
      "Training job finished",
    );
  }

  private async train(jobId: string, lease: UnitLease, runtime: Runtime): Promise<void> {
    const signal = runtime.controller.signal;
    const job = this.status(jobId);
    const settings = resolveSettings(job.trainingConfig);
    const batchSize = job.trainingConfig.batch_size ?? TRAINING_DEFAULTS.batch_size;
    const shuffle = job.trainingConfig.shuffle ?? TRAINING_DEFAULTS.shuffle;
    const { inputShape, outputSize } = lease.plan;

    const dataset = buildDataset(job.datasetConfig, inputShape, outputSize);
    const validation = job.validationConfig
      ? buildDataset(job.validationConfig, inputShape, outputSize)
      : null;
    const rand = shuffle ? seededRandom(Date.now()) : undefined;

    lease.model.prepareTraining(settings);
    if (signal.aborted) return;

    const startedAt = Date.now();
    this.transition(jobId, { status: "running", startedAt });
    this.log.info(
      { jobId, samples: dataset.size, batches: batchCount(dataset, batchSize) },
      "Training started",
    );

    const history: EpochRecord[] = [];
    for (let epoch = 1; epoch <= job.totalEpochs; epoch++) {
      if (signal.aborted) return;
      await this.waitWhilePaused(jobId, runtime);
      if (signal.aborted) return;

      const totals = await this.runEpoch(lease.model, dataset, batchSize, rand, signal);
      if (!totals) return;

      const loss = totals.loss / totals.count;
      const accuracy = (100 * totals.correct) / totals.count;
      const metrics: JobMetrics = { loss, accuracy, val_loss: 0, val_accuracy: 0 };
      const record: EpochRecord = { epoch, loss, accuracy, timestamp: Date.now() };

      if (validation) {
        const val = await evaluate(lease.model, validation, batchSize);
        metrics.val_loss = val.loss / val.count;
        metrics.val_accuracy = (100 * val.correct) / val.count;
        record.val_loss = metrics.val_loss;
        record.val_accuracy = metrics.val_accuracy;
      }
      history.push(record);

      const elapsed = (Date.now() - startedAt) / 1000;
      const updated = this.transition(jobId, {
        currentEpoch: epoch,
        metrics,
        history,
        estimatedTimeRemaining: (elapsed / epoch) * (job.totalEpochs - epoch),
      });
      this.publish(updated);

      if (epoch % 10 === 0 || epoch === job.totalEpochs) {
        this.log.info({ jobId, epoch, loss, accuracy }, "Epoch complete");
      }
      await sleep(this.config.epochYieldMs);
    }
  }

  /** One pass over the dataset; null when a stop arrived mid-epoch. */
  private async runEpoch(
    model: EngineModel,
    dataset: Dataset,
    batchSize: number,
    rand: (() => number) | undefined,
    signal: AbortSignal,
  ): Promise<EpochTotals | null> {
    const totals: EpochTotals = { loss: 0, correct: 0, count: 0 };
    for (const batch of batches(dataset, batchSize, rand)) {
      if (signal.aborted) return null;
      const result = await model.trainBatch(batch);
      totals.loss += result.loss * result.count;
      totals.correct += result.correct;
      totals.count += result.count;
    }
    return totals;
  }

  /** Block at an epoch boundary while the job is paused. */
  private async waitWhilePaused(jobId: string, runtime: Runtime): Promise<void> {
    const signal = runtime.controller.signal;
    while (this.store.status(jobId) === "paused" && !signal.aborted) {
      await new Promise<void>((resolve) => {
        const done = () => {
          signal.removeEventListener("abort", done);
          runtime.wake = null;
          resolve();
        };
        runtime.wake = done;
        signal.addEventListener("abort", done);
      });
    }
  }

  private async restoreUnit(unitId: string, status: UnitStatus): Promise<void> {
    // The unit may have been deleted after the lease was released
    if (!this.units.has(unitId)) return;
    try {
      await this.units.setStatus(unitId, status);
    } catch (err) {
      this.log.warn({ unitId, err: errorMessage(err) }, "Failed to restore model status");
    }
  }
}

function resolveSettings(config: TrainingConfig): TrainingSettings {
  return {
    optimizer: config.optimizer ?? TRAINING_DEFAULTS.optimizer,
    learningRate: config.learning_rate ?? TRAINING_DEFAULTS.learning_rate,
    momentum: config.momentum ?? TRAINING_DEFAULTS.momentum,
    loss: config.loss_function ?? TRAINING_DEFAULTS.loss_function,
  };
}

async function evaluate(
  model: EngineModel,
  dataset: Dataset,
  batchSize: number,
): Promise<EpochTotals> {
  const totals: EpochTotals = { loss: 0, correct: 0, count: 0 };
  for (const batch of batches(dataset, batchSize)) {
    const result = await model.evaluateBatch(batch);
    totals.loss += result.loss * result.count;
    totals.correct += result.correct;
    totals.count += result.count;
  }
  return totals;
}
