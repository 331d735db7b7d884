import { isExpired, type GenerationJob } from "../../core/jobs/GenerationJob";
import { refundRemark } from "../../core/power/PowerLog";
import type { JobRepository } from "../../ports/JobRepository";
import { describeError, wrapDispatchFailure } from "../../shared/errors/errors";
import type { Logger } from "../../shared/logging/logger";
import type { DispatchWorker } from "../dispatch/DispatchWorker";

export type ReconcileDeps = {
  jobs: JobRepository;
  lookup: (channelId: string) => DispatchWorker | undefined;
  logger: Logger;
  timeoutMs: number;
  now?: () => Date;
  signal?: AbortSignal;
};

export type ReconcileSummary = {
  scanned: number;
  expired: number;
  refunded: number;
  checked: number;
  failed: number;
};

/**
 * One reconciliation pass over every incomplete job: expired or failed jobs
 * are deleted and refunded, the rest get a progress check from their worker.
 */
export const reconcileProgress = async (deps: ReconcileDeps): Promise<ReconcileSummary> => {
  const { jobs, lookup, logger, timeoutMs } = deps;
  const now = deps.now ?? (() => new Date());
  const summary: ReconcileSummary = { scanned: 0, expired: 0, refunded: 0, checked: 0, failed: 0 };

  let incomplete: GenerationJob[];
  try {
    incomplete = await jobs.findIncomplete();
  } catch (err) {
    logger.error("reconcile.scan_failed", describeError(wrapDispatchFailure("store_failed", err, {})));
    return summary;
  }

  for (const job of incomplete) {
    if (deps.signal?.aborted) break;
    summary.scanned += 1;
    try {
      if (isExpired(job, now(), timeoutMs)) {
        const outcome = await jobs.expireAndRefund(job, refundRemark(job.taskId));
        if (!outcome.deleted) continue;

        summary.expired += 1;
        if (outcome.refunded) summary.refunded += 1;
        logger.info("reconcile.job_expired", {
          jobId: job.id,
          userId: job.userId,
          progress: job.progress,
          power: job.power,
          refunded: outcome.refunded,
          balance: outcome.balance ?? null
        });
        continue;
      }

      const worker = lookup(job.channelId);
      if (!worker) continue;
      await worker.checkProgress(job, deps.signal);
      summary.checked += 1;
    } catch (err) {
      summary.failed += 1;
      logger.warn("reconcile.job_failed", { jobId: job.id, ...describeError(err) });
    }
  }

  logger.debug("reconcile.pass_completed", summary);
  return summary;
};
