import type { GenerationTask } from "../../core/jobs/GenerationTask";
import type { NotifyMessage } from "../../core/notify/NotifyMessage";
import type { ConnectorConfig, ConnectorsConfig } from "../../shared/config/connectors.config";
import type { ConnectorFactory } from "../../infrastructure/connectors/createConnector";
import type { JobRepository } from "../../ports/JobRepository";
import type { Queue } from "../../ports/Queue";
import { toErrorMessage } from "../../shared/errors/errors";
import type { Logger } from "../../shared/logging/logger";
import { DispatchWorker } from "./DispatchWorker";
import type { EndpointPolicy } from "./endpoint.policy";

export type CreateWorkersDeps = {
  connectors: ConnectorsConfig;
  policy: EndpointPolicy;
  createConnector: ConnectorFactory;
  taskQueue: Queue<GenerationTask>;
  notifyQueue: Queue<NotifyMessage>;
  jobs: JobRepository;
  logger: Logger;
  retryDelayMs: number;
};

const channelNameOf = (config: ConnectorConfig, index: number): string => config.name ?? `${config.kind}-${index}`;

/**
 * Builds one worker per enabled, eligible connector entry. Entries that fail
 * validation are skipped so the pool can start with partial capacity.
 */
export const createDispatchWorkers = (deps: CreateWorkersDeps): DispatchWorker[] => {
  const { logger } = deps;
  const workers = new Map<string, DispatchWorker>();
  const isRegisteredChannel = (channelId: string) => workers.has(channelId);

  const entries: Array<[ConnectorConfig, number]> = [
    ...deps.connectors.plus.map((config, index): [ConnectorConfig, number] => [config, index]),
    ...deps.connectors.proxy.map((config, index): [ConnectorConfig, number] => [config, index])
  ];

  for (const [config, index] of entries) {
    const name = channelNameOf(config, index);
    if (!config.enabled) {
      logger.debug("pool.connector_disabled", { channel: name });
      continue;
    }

    try {
      deps.policy.assertEligible(config.apiUrl);
    } catch (err) {
      logger.error("pool.connector_rejected", { channel: name, reason: toErrorMessage(err) });
      continue;
    }

    if (workers.has(name)) {
      logger.error("pool.connector_rejected", { channel: name, reason: "duplicate channel name" });
      continue;
    }

    workers.set(
      name,
      new DispatchWorker({
        name,
        connector: deps.createConnector(config),
        taskQueue: deps.taskQueue,
        notifyQueue: deps.notifyQueue,
        jobs: deps.jobs,
        logger,
        isRegisteredChannel,
        retryDelayMs: deps.retryDelayMs
      })
    );
  }

  return Array.from(workers.values());
};
