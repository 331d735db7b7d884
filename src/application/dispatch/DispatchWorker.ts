import type { GenerationJob } from "../../core/jobs/GenerationJob";
import { PROGRESS_COMPLETE, PROGRESS_FAILED } from "../../core/jobs/GenerationJob";
import type { GenerationTask } from "../../core/jobs/GenerationTask";
import { NotifyStatus, type NotifyMessage } from "../../core/notify/NotifyMessage";
import type { JobRepository } from "../../ports/JobRepository";
import type { ProviderConnector, TaskStatus } from "../../ports/ProviderConnector";
import type { Queue } from "../../ports/Queue";
import { describeError, toErrorMessage, wrapDispatchFailure } from "../../shared/errors/errors";
import type { Logger } from "../../shared/logging/logger";
import { sleep } from "../../shared/scheduling/sleep";

export type DispatchWorkerDeps = {
  name: string;
  connector: ProviderConnector;
  taskQueue: Queue<GenerationTask>;
  notifyQueue: Queue<NotifyMessage>;
  jobs: JobRepository;
  logger: Logger;
  /** Whether another worker in the pool owns `channelId`. */
  isRegisteredChannel: (channelId: string) => boolean;
  retryDelayMs: number;
};

export type ProcessOutcome = "submitted" | "failed" | "requeued" | "dropped";

/**
 * Consumes the shared Task Queue on behalf of one provider connector.
 */
export class DispatchWorker {
  readonly name: string;
  readonly connector: ProviderConnector;

  constructor(private readonly deps: DispatchWorkerDeps) {
    this.name = deps.name;
    this.connector = deps.connector;
  }

  async run(signal: AbortSignal): Promise<void> {
    const { logger, taskQueue, retryDelayMs } = this.deps;
    logger.info("worker.started", { channel: this.name, connector: this.connector.kind });

    while (!signal.aborted) {
      let task: GenerationTask | undefined;
      try {
        task = await taskQueue.pop(signal);
      } catch (err) {
        logger.warn("worker.pop_failed", { channel: this.name, ...describeError(err) });
        await sleep(retryDelayMs, signal);
        continue;
      }
      if (!task) continue;

      try {
        const outcome = await this.process(task, signal);
        if (outcome === "requeued") {
          await sleep(retryDelayMs, signal);
        }
      } catch (err) {
        logger.error("worker.process_failed", { channel: this.name, jobId: task.jobId, ...describeError(err) });
      }
    }

    logger.info("worker.stopped", { channel: this.name });
  }

  async process(task: GenerationTask, signal?: AbortSignal): Promise<ProcessOutcome> {
    const { jobs, logger, taskQueue, isRegisteredChannel } = this.deps;

    // follow-up actions must go to the backend that produced the source image
    if (task.channelId && task.channelId !== this.name && isRegisteredChannel(task.channelId)) {
      await taskQueue.push(task);
      logger.debug("worker.task_requeued", { channel: this.name, target: task.channelId, jobId: task.jobId });
      return "requeued";
    }

    const job = await jobs.findById(task.jobId);
    if (!job) {
      logger.warn("worker.job_missing", { channel: this.name, jobId: task.jobId });
      return "dropped";
    }

    let taskId: string;
    try {
      ({ taskId } = await this.connector.submit(task, signal));
    } catch (err) {
      if (signal?.aborted) {
        // shutting down: hand the task to the next consumer instead of failing the job
        await taskQueue.push(task);
        logger.info("worker.task_requeued", { channel: this.name, jobId: job.id, reason: "shutdown" });
        return "requeued";
      }
      const failure = wrapDispatchFailure("connector_submit_failed", err, { channelId: this.name, jobId: job.id });
      logger.warn("worker.submit_failed", describeError(failure));
      await jobs.update(job.id, { channelId: this.name, progress: PROGRESS_FAILED, errMsg: toErrorMessage(err) });
      await this.notify(job, NotifyStatus.Failed);
      return "failed";
    }

    await jobs.update(job.id, { taskId, channelId: this.name, progress: 0, errMsg: "" });
    logger.info("worker.task_submitted", { channel: this.name, jobId: job.id, taskId });
    await this.notify(job, NotifyStatus.Running);
    return "submitted";
  }

  /**
   * Polls the connector for a job this worker submitted and records what
   * changed. Completion is announced by the archival loop, not here.
   */
  async checkProgress(job: GenerationJob, signal?: AbortSignal): Promise<void> {
    if (job.taskId === "") return;
    const { jobs, logger } = this.deps;

    let status: TaskStatus;
    try {
      status = await this.connector.query(job.taskId, signal);
    } catch (err) {
      throw wrapDispatchFailure("connector_query_failed", err, { channelId: this.name, jobId: job.id, taskId: job.taskId });
    }

    if (status.state === "failed") {
      await jobs.update(job.id, { progress: PROGRESS_FAILED, errMsg: status.failReason || "task failed" });
      logger.info("worker.task_failed", { channel: this.name, jobId: job.id, reason: status.failReason });
      await this.notify(job, NotifyStatus.Failed);
      return;
    }

    const orgUrl = status.imageUrl || job.orgUrl;
    // a job at 100 without an image would be invisible to both expiry and archival
    const progress = status.progress >= PROGRESS_COMPLETE && orgUrl === "" ? PROGRESS_COMPLETE - 1 : status.progress;
    if (progress === job.progress && orgUrl === job.orgUrl) return;

    await jobs.update(job.id, {
      progress,
      orgUrl,
      ...(status.prompt ? { prompt: status.prompt } : {})
    });
    if (progress < PROGRESS_COMPLETE) {
      await this.notify(job, NotifyStatus.Running);
    }
  }

  private async notify(job: Pick<GenerationJob, "id" | "userId">, message: NotifyMessage["message"]): Promise<void> {
    try {
      await this.deps.notifyQueue.push({ userId: job.userId, jobId: job.id, message });
    } catch (err) {
      this.deps.logger.warn("worker.notify_failed", { channel: this.name, jobId: job.id, ...describeError(err) });
    }
  }
}
