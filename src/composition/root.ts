import type { Server } from "http";
import type { MongoClient } from "mongodb";
import { archiveImages } from "../application/archive/archiveImages";
import { createDispatchWorkers } from "../application/dispatch/createWorkers";
import { DispatchPool } from "../application/dispatch/DispatchPool";
import { createEndpointPolicy } from "../application/dispatch/endpoint.policy";
import { ConnectionRegistry } from "../application/notify/ConnectionRegistry";
import { runNotificationFanOut } from "../application/notify/fanOutNotifications";
import { reconcileProgress } from "../application/reconcile/reconcileProgress";
import { parseGenerationTask, type GenerationTask } from "../core/jobs/GenerationTask";
import { parseNotifyMessage, type NotifyMessage } from "../core/notify/NotifyMessage";
import { createConnectorFactory } from "../infrastructure/connectors/createConnector";
import { assertTransactionSupport, createMongoClient } from "../infrastructure/mongo/MongoClientFactory";
import { MongoJobRepository } from "../infrastructure/mongo/MongoJobRepository";
import { MongoQueue } from "../infrastructure/mongo/MongoQueue";
import { InMemoryQueue } from "../infrastructure/queue/InMemoryQueue";
import { GridFsAssetArchiver } from "../infrastructure/storage/GridFsAssetArchiver";
import type { Queue } from "../ports/Queue";
import { createServer } from "../server";
import { loadConnectorsConfig } from "../shared/config/connectors.config";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { createLogger, type Logger } from "../shared/logging/logger";
import { LoopScheduler } from "../shared/scheduling/LoopScheduler";

export const TASK_QUEUE_NAME = "imagine_task_queue";
export const NOTIFY_QUEUE_NAME = "imagine_notify_queue";

export type DispatchRuntime = {
  pool: DispatchPool;
  registry: ConnectionRegistry;
  stop: () => Promise<void>;
};

const openQueue = <T>(
  env: Env,
  client: MongoClient,
  name: string,
  decode: (raw: unknown) => T,
  pollIntervalMs: number,
  logger: Logger
): Queue<T> => {
  if (env.QUEUE_BACKEND === "memory") return new InMemoryQueue<T>();
  return MongoQueue.open(client.db(env.MONGO_DB), { name, decode, pollIntervalMs, logger });
};

const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });

/**
 * Wires the pool, the background loops and the HTTP surface, then starts them.
 */
export const startDispatch = async (processEnv: NodeJS.ProcessEnv = process.env): Promise<DispatchRuntime> => {
  const env = loadEnv(processEnv);
  const runtime = loadRuntimeConfigFromEnv(processEnv);
  const logger = createLogger(env.LOG_LEVEL);
  const connectors = await loadConnectorsConfig(env.CONNECTORS_CONFIG_PATH);

  const client = await createMongoClient(env.MONGO_URI);
  try {
    await assertTransactionSupport(client);
  } catch (err) {
    await client.close();
    throw err;
  }
  const jobs = new MongoJobRepository(client, env.MONGO_DB);
  const taskQueue: Queue<GenerationTask> = openQueue(
    env, client, TASK_QUEUE_NAME, parseGenerationTask, runtime.queuePollIntervalMs, logger
  );
  const notifyQueue: Queue<NotifyMessage> = openQueue(
    env, client, NOTIFY_QUEUE_NAME, parseNotifyMessage, runtime.queuePollIntervalMs, logger
  );
  const archiver = GridFsAssetArchiver.open(client.db(env.MONGO_DB), env.PUBLIC_BASE_URL);

  const workers = createDispatchWorkers({
    connectors,
    policy: createEndpointPolicy(env.CONNECTOR_ALLOWED_HOSTS),
    createConnector: createConnectorFactory({ logger, timeoutMs: runtime.connectorTimeoutMs }),
    taskQueue,
    notifyQueue,
    jobs,
    logger,
    retryDelayMs: runtime.queuePollIntervalMs
  });
  const pool = new DispatchPool(workers, taskQueue, logger);
  if (!pool.hasAvailableWorker()) {
    logger.warn("pool.no_workers", { configPath: env.CONNECTORS_CONFIG_PATH });
  }

  const registry = new ConnectionRegistry();
  const scheduler = new LoopScheduler(logger);
  const lookup = (channelId: string) => pool.lookup(channelId);

  pool.start(scheduler);
  scheduler.spawn({
    name: "notify-fan-out",
    run: (signal) => runNotificationFanOut({ notifyQueue, registry, logger, retryDelayMs: runtime.queuePollIntervalMs }, signal)
  });
  scheduler.every({
    name: "reconcile-progress",
    intervalMs: runtime.reconcileIntervalMs,
    run: async (signal) => {
      await reconcileProgress({ jobs, lookup, logger, timeoutMs: runtime.jobTimeoutMs, signal });
    }
  });
  scheduler.every({
    name: "archive-images",
    intervalMs: runtime.archiveIntervalMs,
    run: async (signal) => {
      await archiveImages({ jobs, archiver, notifyQueue, lookup, logger, signal });
    }
  });

  const server = createServer({
    registry,
    workerCount: () => pool.channels().length,
    assets: archiver,
    logger
  });
  try {
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(runtime.port, () => {
        server.off("error", reject);
        resolve();
      });
    });
  } catch (err) {
    await scheduler.stop();
    await client.close();
    throw err;
  }
  logger.info("dispatch.started", { port: runtime.port, workers: pool.channels(), queue: env.QUEUE_BACKEND });

  let stopping: Promise<void> | undefined;
  const stop = () => {
    stopping ??= (async () => {
      await scheduler.stop();
      registry.closeAll();
      try {
        await closeServer(server);
      } finally {
        await client.close();
      }
      logger.info("dispatch.stopped");
    })();
    return stopping;
  };

  return { pool, registry, stop };
};
