import { DispatchWorker } from "../../src/application/dispatch/DispatchWorker";
import type { GenerationTask } from "../../src/core/jobs/GenerationTask";
import type { NotifyMessage } from "../../src/core/notify/NotifyMessage";
import { InMemoryQueue } from "../../src/infrastructure/queue/InMemoryQueue";
import type { JobRepository } from "../../src/ports/JobRepository";
import type { Logger } from "../../src/shared/logging/logger";
import { createFakeConnector } from "./fakeConnector";

/** A worker over a fake connector, sharing the caller's store and notify queue. */
export const createWorkerFixture = (args: {
  name: string;
  jobs: JobRepository;
  notifyQueue: InMemoryQueue<NotifyMessage>;
  logger: Logger;
}) => {
  const fake = createFakeConnector("proxy");
  const worker = new DispatchWorker({
    name: args.name,
    connector: fake.connector,
    taskQueue: new InMemoryQueue<GenerationTask>(),
    notifyQueue: args.notifyQueue,
    jobs: args.jobs,
    logger: args.logger,
    isRegisteredChannel: (channelId) => channelId === args.name,
    retryDelayMs: 5
  });
  return { worker, ...fake };
};
