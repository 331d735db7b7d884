import type { MongoClient } from "mongodb";
import { MongoJobRepository, toGenerationJob, type JobDoc, type UserDoc } from "../../src/infrastructure/mongo/MongoJobRepository";
import { assertTransactionSupport } from "../../src/infrastructure/mongo/MongoClientFactory";
import { makeJob } from "../support/InMemoryJobRepository";

const createFakeClient = (opts: { deletedCount: number; user: UserDoc | null }) => {
  const jobs = {
    createIndex: jest.fn().mockResolvedValue("idx"),
    findOne: jest.fn().mockResolvedValue(null),
    find: jest.fn().mockReturnValue({ toArray: jest.fn().mockResolvedValue([]) }),
    updateOne: jest.fn().mockResolvedValue({ matchedCount: 1 }),
    deleteOne: jest.fn().mockResolvedValue({ deletedCount: opts.deletedCount })
  };
  const users = { findOneAndUpdate: jest.fn().mockResolvedValue(opts.user) };
  const powerLogs = {
    createIndex: jest.fn().mockResolvedValue("idx"),
    insertOne: jest.fn().mockResolvedValue({ acknowledged: true })
  };
  const byName: Record<string, unknown> = { jobs, users, power_logs: powerLogs };
  const db = { collection: jest.fn((name: string) => byName[name]) };
  const session = {
    withTransaction: jest.fn(async (fn: () => Promise<void>) => {
      await fn();
    }),
    endSession: jest.fn().mockResolvedValue(undefined)
  };
  const client = { db: jest.fn(() => db), startSession: jest.fn(() => session) };
  return { jobs, users, powerLogs, session, client: client as unknown as MongoClient, rawClient: client };
};

describe("MongoJobRepository", () => {
  it("maps documents with missing optional fields", () => {
    const doc = {
      _id: "job-abc",
      type: "image",
      userId: 3,
      progress: 0,
      power: 10,
      createdAt: new Date("2026-01-01T00:00:00.000Z"),
      updatedAt: new Date("2026-01-01T00:00:00.000Z")
    } as unknown as JobDoc;

    expect(toGenerationJob(doc)).toEqual({
      id: "job-abc",
      type: "image",
      userId: 3,
      progress: 0,
      power: 10,
      channelId: "",
      taskId: "",
      prompt: "",
      orgUrl: "",
      imgUrl: "",
      hash: "",
      errMsg: "",
      createdAt: new Date("2026-01-01T00:00:00.000Z"),
      updatedAt: new Date("2026-01-01T00:00:00.000Z")
    });
  });

  it("reads timestamps written as ISO strings", () => {
    const doc: JobDoc = {
      _id: "job-iso",
      type: "image",
      userId: 3,
      channelId: "",
      taskId: "",
      prompt: "",
      progress: 10,
      power: 10,
      orgUrl: "",
      imgUrl: "",
      hash: "",
      errMsg: "",
      createdAt: "2026-01-01T00:00:00.000Z"
    };

    const job = toGenerationJob(doc);

    expect(job.createdAt).toEqual(new Date("2026-01-01T00:00:00.000Z"));
    expect(job.updatedAt).toEqual(new Date("2026-01-01T00:00:00.000Z"));
    expect(toGenerationJob({ ...doc, createdAt: "yesterday" }).createdAt).toEqual(new Date(0));
  });

  it("queries incomplete and pending-archival jobs, creating indexes once", async () => {
    const { client, jobs, rawClient } = createFakeClient({ deletedCount: 0, user: null });
    const repo = new MongoJobRepository(client, "imagine-test");

    await repo.findIncomplete();
    await repo.findPendingArchival();

    expect(rawClient.db).toHaveBeenCalledWith("imagine-test");
    expect(jobs.find).toHaveBeenNthCalledWith(1, { progress: { $lt: 100 } });
    expect(jobs.find).toHaveBeenNthCalledWith(2, { progress: 100, imgUrl: "", orgUrl: { $ne: "" } });
    expect(jobs.createIndex).toHaveBeenCalledTimes(2);
  });

  it("stamps updatedAt on every patch", async () => {
    const { client, jobs } = createFakeClient({ deletedCount: 0, user: null });
    const repo = new MongoJobRepository(client, "imagine-test");

    await repo.update("job-1", { progress: 45 });

    expect(jobs.updateOne).toHaveBeenCalledWith(
      { _id: "job-1" },
      { $set: { progress: 45, updatedAt: expect.any(Date) } }
    );
  });

  it("deletes, credits and logs a refund in one transaction", async () => {
    const { client, jobs, users, powerLogs, session } = createFakeClient({
      deletedCount: 1,
      user: { _id: 7, username: "ada", power: 60 }
    });
    const repo = new MongoJobRepository(client, "imagine-test");
    const job = makeJob({ userId: 7, power: 10, taskId: "t-9" });

    const outcome = await repo.expireAndRefund(job, "Drawing task failed, power refunded. Task ID: t-9");

    expect(outcome).toEqual({ deleted: true, refunded: true, balance: 60 });
    expect(jobs.deleteOne).toHaveBeenCalledWith({ _id: job.id }, { session });
    expect(users.findOneAndUpdate).toHaveBeenCalledWith(
      { _id: 7 },
      { $inc: { power: 10 } },
      { session, returnDocument: "after" }
    );
    expect(powerLogs.insertOne).toHaveBeenCalledWith(
      {
        userId: 7,
        username: "ada",
        type: "refund",
        amount: 10,
        balance: 60,
        mark: "add",
        model: "mid-journey",
        remark: "Drawing task failed, power refunded. Task ID: t-9",
        createdAt: expect.any(Date)
      },
      { session }
    );
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it("credits nothing when the job was already removed", async () => {
    const { client, users, powerLogs, session } = createFakeClient({ deletedCount: 0, user: null });
    const repo = new MongoJobRepository(client, "imagine-test");

    await expect(repo.expireAndRefund(makeJob(), "remark")).resolves.toEqual({ deleted: false, refunded: false });
    expect(users.findOneAndUpdate).not.toHaveBeenCalled();
    expect(powerLogs.insertOne).not.toHaveBeenCalled();
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it("skips the power log when the owner is gone", async () => {
    const { client, powerLogs } = createFakeClient({ deletedCount: 1, user: null });
    const repo = new MongoJobRepository(client, "imagine-test");

    await expect(repo.expireAndRefund(makeJob(), "remark")).resolves.toEqual({ deleted: true, refunded: false });
    expect(powerLogs.insertOne).not.toHaveBeenCalled();
  });

  it("ends the session when the transaction fails", async () => {
    const { client, session } = createFakeClient({ deletedCount: 1, user: null });
    session.withTransaction.mockRejectedValueOnce(new Error("TransientTransactionError"));
    const repo = new MongoJobRepository(client, "imagine-test");

    await expect(repo.expireAndRefund(makeJob(), "remark")).rejects.toThrow("TransientTransactionError");
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });
});

describe("assertTransactionSupport", () => {
  const clientAnswering = (hello: Record<string, unknown>) => {
    const command = jest.fn().mockResolvedValue(hello);
    const db = jest.fn(() => ({ command }));
    return { client: { db } as unknown as MongoClient, db, command };
  };

  it("accepts replica set members and mongos", async () => {
    const replica = clientAnswering({ isWritablePrimary: true, setName: "rs0" });
    await expect(assertTransactionSupport(replica.client)).resolves.toBeUndefined();
    expect(replica.db).toHaveBeenCalledWith("admin");
    expect(replica.command).toHaveBeenCalledWith({ hello: 1 });

    await expect(assertTransactionSupport(clientAnswering({ msg: "isdbgrid" }).client)).resolves.toBeUndefined();
  });

  it("rejects a standalone server", async () => {
    await expect(assertTransactionSupport(clientAnswering({ isWritablePrimary: true }).client)).rejects.toThrow(
      "MongoDB deployment does not support transactions: connect MONGO_URI to a replica set or sharded cluster"
    );
  });
});
