import type { Collection, Db, ObjectId } from "mongodb";
import type { Queue } from "../../ports/Queue";
import type { Logger } from "../../shared/logging/logger";
import { toErrorMessage } from "../../shared/errors/errors";
import { sleep } from "../../shared/scheduling/sleep";
import { collectionNames, mongoIndexes } from "./mongo.indexes";

export type QueueDoc = {
  _id?: ObjectId;
  queue: string;
  payload: string;      // JSON-serialized entry
  enqueuedAt: Date;
};

export type MongoQueueOptions<T> = {
  name: string;
  decode: (raw: unknown) => T;
  pollIntervalMs: number;
  logger: Logger;
};

/**
 * Durable FIFO shared across processes. `findOneAndDelete` hands each entry
 * to exactly one consumer.
 */
export class MongoQueue<T> implements Queue<T> {
  private indexesReady = false;

  constructor(
    private readonly collection: Collection<QueueDoc>,
    private readonly options: MongoQueueOptions<T>
  ) {}

  static open<T>(db: Db, options: MongoQueueOptions<T>): MongoQueue<T> {
    return new MongoQueue(db.collection<QueueDoc>(collectionNames.queues), options);
  }

  private async ensureIndexes(): Promise<void> {
    if (this.indexesReady) return;
    for (const idx of mongoIndexes.queues) {
      await this.collection.createIndex(idx.keys, idx.options);
    }
    this.indexesReady = true;
  }

  async push(item: T): Promise<void> {
    await this.ensureIndexes();
    await this.collection.insertOne({
      queue: this.options.name,
      payload: JSON.stringify(item),
      enqueuedAt: new Date()
    });
  }

  async pop(signal: AbortSignal): Promise<T | undefined> {
    await this.ensureIndexes();

    while (!signal.aborted) {
      const doc = await this.collection.findOneAndDelete({ queue: this.options.name }, { sort: { _id: 1 } });
      if (!doc) {
        await sleep(this.options.pollIntervalMs, signal);
        continue;
      }

      try {
        return this.options.decode(JSON.parse(doc.payload));
      } catch (err) {
        this.options.logger.warn("queue.entry_dropped", {
          queue: this.options.name,
          reason: toErrorMessage(err)
        });
      }
    }

    return undefined;
  }

  async size(): Promise<number> {
    return this.collection.countDocuments({ queue: this.options.name });
  }
}
