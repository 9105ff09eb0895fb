import type { TrainingJob } from "@neurodeck/shared";

export interface JobPolicy {
  /** Return null if OK to proceed, or an error message string if blocked. */
  checkConcurrency(activeJobs: TrainingJob[], unitId: string): string | null;
}

/**
 * Caps how many non-terminal jobs may train the same unit at once.
 */
export class UnitConcurrencyPolicy implements JobPolicy {
  constructor(private maxJobsPerUnit: number) {}

  checkConcurrency(activeJobs: TrainingJob[], unitId: string): string | null {
    const sameUnit = activeJobs.filter((j) => j.unitId === unitId);
    if (sameUnit.length >= this.maxJobsPerUnit) {
      return `Model ${unitId} already has ${sameUnit.length} active training job(s) (max ${this.maxJobsPerUnit})`;
    }
    return null;
  }
}
