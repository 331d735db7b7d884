import { isPendingArchival, type GenerationJob } from "../../core/jobs/GenerationJob";
import { extractImageHash } from "../../core/jobs/imageHash";
import { NotifyStatus, type NotifyMessage } from "../../core/notify/NotifyMessage";
import type { ArchiveMode, AssetArchiver } from "../../ports/AssetArchiver";
import type { JobRepository } from "../../ports/JobRepository";
import type { Queue } from "../../ports/Queue";
import { describeError, wrapDispatchFailure } from "../../shared/errors/errors";
import type { Logger } from "../../shared/logging/logger";
import type { DispatchWorker } from "../dispatch/DispatchWorker";

export type ArchiveDeps = {
  jobs: JobRepository;
  archiver: AssetArchiver;
  notifyQueue: Queue<NotifyMessage>;
  lookup: (channelId: string) => DispatchWorker | undefined;
  logger: Logger;
  signal?: AbortSignal;
};

export type ArchiveSummary = {
  scanned: number;
  archived: number;
  failed: number;
};

const latestHash = async (
  worker: DispatchWorker,
  job: GenerationJob,
  logger: Logger,
  signal?: AbortSignal
): Promise<string> => {
  try {
    const status = await worker.connector.query(job.taskId, signal);
    const first = status.buttons[0];
    return first ? extractImageHash(first.customId) : job.hash;
  } catch (err) {
    logger.warn("archive.hash_lookup_failed", {
      ...describeError(wrapDispatchFailure("connector_query_failed", err, { channelId: worker.name, jobId: job.id })),
      taskId: job.taskId
    });
    return job.hash;
  }
};

/**
 * One archival pass: copies every finished image that has not been persisted
 * yet and tells its owner the job is done.
 */
export const archiveImages = async (deps: ArchiveDeps): Promise<ArchiveSummary> => {
  const { jobs, archiver, notifyQueue, lookup, logger } = deps;
  const summary: ArchiveSummary = { scanned: 0, archived: 0, failed: 0 };

  let pending: GenerationJob[];
  try {
    pending = await jobs.findPendingArchival();
  } catch (err) {
    logger.error("archive.scan_failed", describeError(wrapDispatchFailure("store_failed", err, {})));
    return summary;
  }

  for (const job of pending) {
    if (deps.signal?.aborted) break;
    // documents written by other tools may slip through the store query
    if (!isPendingArchival(job)) continue;
    summary.scanned += 1;

    const worker = lookup(job.channelId);
    const mode: ArchiveMode = worker ? "private" : "public";
    const hash = worker && job.taskId !== "" ? await latestHash(worker, job, logger, deps.signal) : job.hash;

    logger.info("archive.started", { jobId: job.id, orgUrl: job.orgUrl, mode });
    let imgUrl: string;
    try {
      imgUrl = await archiver.putImage(job.orgUrl, mode, deps.signal);
    } catch (err) {
      summary.failed += 1;
      logger.error(
        "archive.failed",
        describeError(wrapDispatchFailure("archive_failed", err, { jobId: job.id, channelId: job.channelId }))
      );
      continue;
    }

    try {
      await jobs.update(job.id, { imgUrl, hash });
      await notifyQueue.push({ userId: job.userId, jobId: job.id, message: NotifyStatus.Finished });
    } catch (err) {
      summary.failed += 1;
      logger.error("archive.record_failed", describeError(wrapDispatchFailure("store_failed", err, { jobId: job.id })));
      continue;
    }

    summary.archived += 1;
    logger.info("archive.completed", { jobId: job.id, imgUrl });
  }

  return summary;
};
