import type { Collection, MongoClient } from "mongodb";
import type { GenerationJob, JobPatch } from "../../core/jobs/GenerationJob";
import { PROGRESS_COMPLETE } from "../../core/jobs/GenerationJob";
import { POWER_LOG_MODEL, type PowerLog } from "../../core/power/PowerLog";
import type { ExpireOutcome, JobRepository } from "../../ports/JobRepository";
import { collectionNames, mongoIndexes } from "./mongo.indexes";

// the API layer owns these documents; timestamps may arrive as ISO strings
export type JobDoc = Omit<GenerationJob, "id" | "createdAt" | "updatedAt"> & {
  _id: string;
  createdAt: Date | string;
  updatedAt?: Date | string;
};
export type UserDoc = { _id: number; username: string; power: number };
export type PowerLogDoc = PowerLog;

type Collections = {
  jobs: Collection<JobDoc>;
  users: Collection<UserDoc>;
  powerLogs: Collection<PowerLogDoc>;
};

// unparsable timestamps read as the epoch, so the job still times out
const toDate = (value: Date | string | undefined): Date => {
  const date = value instanceof Date ? value : new Date(value ?? Number.NaN);
  return Number.isNaN(date.getTime()) ? new Date(0) : date;
};

export const toGenerationJob = (doc: JobDoc): GenerationJob => {
  const { _id, createdAt, updatedAt, ...rest } = doc;
  const created = toDate(createdAt);
  return {
    ...rest,
    id: _id,
    createdAt: created,
    updatedAt: updatedAt === undefined ? created : toDate(updatedAt),
    channelId: rest.channelId ?? "",
    taskId: rest.taskId ?? "",
    prompt: rest.prompt ?? "",
    orgUrl: rest.orgUrl ?? "",
    imgUrl: rest.imgUrl ?? "",
    hash: rest.hash ?? "",
    errMsg: rest.errMsg ?? ""
  };
};

/**
 * Job store over the `jobs`, `users` and `power_logs` collections. Expiry
 * runs in a multi-document transaction, which needs a replica set.
 */
export class MongoJobRepository implements JobRepository {
  private collections?: Collections;

  constructor(
    private readonly client: MongoClient,
    private readonly dbName: string
  ) {}

  private async getCollections(): Promise<Collections> {
    if (this.collections) return this.collections;

    const db = this.client.db(this.dbName);
    const jobs = db.collection<JobDoc>(collectionNames.jobs);
    const powerLogs = db.collection<PowerLogDoc>(collectionNames.powerLogs);

    for (const idx of mongoIndexes.jobs) {
      await jobs.createIndex(idx.keys, idx.options);
    }
    for (const idx of mongoIndexes.powerLogs) {
      await powerLogs.createIndex(idx.keys, idx.options);
    }

    this.collections = { jobs, users: db.collection<UserDoc>(collectionNames.users), powerLogs };
    return this.collections;
  }

  async findById(id: string): Promise<GenerationJob | null> {
    const { jobs } = await this.getCollections();
    const doc = await jobs.findOne({ _id: id });
    return doc ? toGenerationJob(doc) : null;
  }

  async findIncomplete(): Promise<GenerationJob[]> {
    const { jobs } = await this.getCollections();
    const docs = await jobs.find({ progress: { $lt: PROGRESS_COMPLETE } }).toArray();
    return docs.map(toGenerationJob);
  }

  async findPendingArchival(): Promise<GenerationJob[]> {
    const { jobs } = await this.getCollections();
    const docs = await jobs.find({ progress: PROGRESS_COMPLETE, imgUrl: "", orgUrl: { $ne: "" } }).toArray();
    return docs.map(toGenerationJob);
  }

  async update(id: string, patch: JobPatch): Promise<void> {
    const { jobs } = await this.getCollections();
    await jobs.updateOne({ _id: id }, { $set: { ...patch, updatedAt: new Date() } });
  }

  async expireAndRefund(job: GenerationJob, remark: string): Promise<ExpireOutcome> {
    const { jobs, users, powerLogs } = await this.getCollections();
    const session = this.client.startSession();
    let outcome: ExpireOutcome = { deleted: false, refunded: false };

    try {
      await session.withTransaction(async () => {
        // withTransaction may rerun this callback on transient errors
        outcome = { deleted: false, refunded: false };

        const removed = await jobs.deleteOne({ _id: job.id }, { session });
        if (removed.deletedCount === 0) return;
        outcome = { deleted: true, refunded: false };

        const user = await users.findOneAndUpdate(
          { _id: job.userId },
          { $inc: { power: job.power } },
          { session, returnDocument: "after" }
        );
        if (!user) return;

        await powerLogs.insertOne(
          {
            userId: user._id,
            username: user.username,
            type: "refund",
            amount: job.power,
            balance: user.power,
            mark: "add",
            model: POWER_LOG_MODEL,
            remark,
            createdAt: new Date()
          },
          { session }
        );
        outcome = { deleted: true, refunded: true, balance: user.power };
      });
    } finally {
      await session.endSession();
    }

    return outcome;
  }
}
