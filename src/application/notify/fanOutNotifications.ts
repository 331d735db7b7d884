import type { NotifyMessage } from "../../core/notify/NotifyMessage";
import type { Queue } from "../../ports/Queue";
import { describeError } from "../../shared/errors/errors";
import type { Logger } from "../../shared/logging/logger";
import { sleep } from "../../shared/scheduling/sleep";
import type { ConnectionRegistry } from "./ConnectionRegistry";

export type FanOutDeps = {
  notifyQueue: Queue<NotifyMessage>;
  registry: ConnectionRegistry;
  logger: Logger;
  retryDelayMs: number;
};

export type DeliveryResult = "delivered" | "no_connection" | "send_failed";

/** Forwards one message; delivery is best-effort and never throws. */
export const deliverNotification = async (
  message: NotifyMessage,
  registry: ConnectionRegistry,
  logger: Logger
): Promise<DeliveryResult> => {
  const connection = registry.get(message.userId);
  if (!connection) {
    logger.debug("notify.dropped", { userId: message.userId, jobId: message.jobId, reason: "no_connection" });
    return "no_connection";
  }

  try {
    await connection.send(message.message);
    return "delivered";
  } catch (err) {
    logger.warn("notify.dropped", { userId: message.userId, jobId: message.jobId, reason: "send_failed", ...describeError(err) });
    return "send_failed";
  }
};

export const runNotificationFanOut = async (deps: FanOutDeps, signal: AbortSignal): Promise<void> => {
  const { notifyQueue, registry, logger, retryDelayMs } = deps;

  while (!signal.aborted) {
    let message: NotifyMessage | undefined;
    try {
      message = await notifyQueue.pop(signal);
    } catch (err) {
      logger.warn("notify.pop_failed", describeError(err));
      await sleep(retryDelayMs, signal);
      continue;
    }
    if (!message) continue;

    await deliverNotification(message, registry, logger);
  }
};
