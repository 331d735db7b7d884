import type { GenerationTask } from "../../core/jobs/GenerationTask";
import type { Queue } from "../../ports/Queue";
import type { Logger } from "../../shared/logging/logger";
import type { LoopScheduler } from "../../shared/scheduling/LoopScheduler";
import type { DispatchWorker } from "./DispatchWorker";

export class DispatchPool {
  private readonly workers: ReadonlyMap<string, DispatchWorker>;

  constructor(
    workers: DispatchWorker[],
    private readonly taskQueue: Queue<GenerationTask>,
    private readonly logger: Logger
  ) {
    this.workers = new Map(workers.map((worker) => [worker.name, worker]));
  }

  /** Enqueues a task. Never refuses, even when no worker is registered. */
  async push(task: GenerationTask): Promise<void> {
    this.logger.debug("pool.task_pushed", { jobId: task.jobId, type: task.type, userId: task.userId });
    await this.taskQueue.push(task);
  }

  hasAvailableWorker(): boolean {
    return this.workers.size > 0;
  }

  lookup(channelId: string): DispatchWorker | undefined {
    return this.workers.get(channelId);
  }

  channels(): string[] {
    return Array.from(this.workers.keys());
  }

  start(scheduler: LoopScheduler): void {
    for (const worker of this.workers.values()) {
      scheduler.spawn({ name: `worker:${worker.name}`, run: (signal) => worker.run(signal) });
    }
    this.logger.info("pool.started", { workers: this.channels() });
  }
}
