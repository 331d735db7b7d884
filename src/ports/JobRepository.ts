import type { GenerationJob, JobPatch } from "../core/jobs/GenerationJob";

export type ExpireOutcome = {
  deleted: boolean;     // false when another pass already removed the job
  refunded: boolean;    // false when the owning user no longer exists
  balance?: number;
};

export interface JobRepository {
  findById(id: string): Promise<GenerationJob | null>;
  findIncomplete(): Promise<GenerationJob[]>;
  findPendingArchival(): Promise<GenerationJob[]>;
  update(id: string, patch: JobPatch): Promise<void>;
  /**
   * Deletes the job, credits `job.power` back to its owner and appends a
   * refund power log, all in one store transaction.
   */
  expireAndRefund(job: GenerationJob, remark: string): Promise<ExpireOutcome>;
}
