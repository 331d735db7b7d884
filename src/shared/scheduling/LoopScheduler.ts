import type { Logger } from "../logging/logger";
import { describeError } from "../errors/errors";
import { sleep } from "./sleep";

export type PeriodicTask = {
  name: string;
  intervalMs: number;
  run: (signal: AbortSignal) => Promise<void>;
};

export type PerpetualTask = {
  name: string;
  run: (signal: AbortSignal) => Promise<void>;
};

/**
 * Owns the background loops of the process. Every loop receives the same
 * abort signal; `stop()` aborts it and waits for all loops to return.
 */
export class LoopScheduler {
  private readonly controller = new AbortController();
  private readonly running = new Map<string, Promise<void>>();

  constructor(private readonly logger: Logger) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get taskNames(): string[] {
    return Array.from(this.running.keys());
  }

  /**
   * Runs `task.run` now and then again `intervalMs` after each tick finishes.
   * Ticks never overlap.
   */
  every(task: PeriodicTask): void {
    this.track(task.name, async (signal) => {
      while (!signal.aborted) {
        try {
          await task.run(signal);
        } catch (err) {
          this.logger.error("scheduler.tick_failed", { task: task.name, ...describeError(err) });
        }
        await sleep(task.intervalMs, signal);
      }
    });
  }

  spawn(task: PerpetualTask): void {
    this.track(task.name, async (signal) => {
      try {
        await task.run(signal);
      } catch (err) {
        this.logger.error("scheduler.task_crashed", { task: task.name, ...describeError(err) });
      }
    });
  }

  async stop(): Promise<void> {
    this.controller.abort();
    await Promise.all(this.running.values());
    this.running.clear();
    this.logger.info("scheduler.stopped");
  }

  private track(name: string, loop: (signal: AbortSignal) => Promise<void>): void {
    if (this.running.has(name)) {
      throw new Error(`Task already registered: ${name}`);
    }
    if (this.controller.signal.aborted) {
      throw new Error(`Scheduler is stopped; cannot register ${name}`);
    }

    this.running.set(name, loop(this.controller.signal));
    this.logger.debug("scheduler.task_started", { task: name });
  }
}
