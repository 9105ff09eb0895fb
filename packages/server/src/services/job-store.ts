import type { JobStatus, TrainingJob } from "@neurodeck/shared";

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set([
  "completed",
  "failed",
  "cancelled",
]);

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * In-process job table. Records are copied on the way in and out so
 * callers never hold a live reference.
 */
export class JobStore {
  private jobs = new Map<string, TrainingJob>();
  private active = new Set<string>();

  create(job: TrainingJob): void {
    this.jobs.set(job.jobId, structuredClone(job));
    if (!isTerminal(job.status)) this.active.add(job.jobId);
  }

  get(jobId: string): TrainingJob | null {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  /** Current status without copying the record. */
  status(jobId: string): JobStatus | null {
    return this.jobs.get(jobId)?.status ?? null;
  }

  update(jobId: string, patch: Partial<TrainingJob>): TrainingJob | null {
    const current = this.jobs.get(jobId);
    if (!current) return null;

    const job: TrainingJob = { ...current, ...structuredClone(patch), updatedAt: Date.now() };
    this.jobs.set(jobId, job);

    if (isTerminal(job.status)) {
      this.active.delete(jobId);
    }
    return structuredClone(job);
  }

  list(): TrainingJob[] {
    return [...this.jobs.values()].map((job) => structuredClone(job));
  }

  listActive(): TrainingJob[] {
    return [...this.active]
      .map((id) => this.jobs.get(id))
      .filter((job): job is TrainingJob => job !== undefined)
      .map((job) => structuredClone(job));
  }

  delete(jobId: string): boolean {
    this.active.delete(jobId);
    return this.jobs.delete(jobId);
  }

  size(): number {
    return this.jobs.size;
  }
}
