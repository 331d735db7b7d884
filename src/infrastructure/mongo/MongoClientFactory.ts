import { MongoClient } from "mongodb";

export const createMongoClient = async (mongoUri: string, appName = "imagine-dispatch"): Promise<MongoClient> => {
  const client = new MongoClient(mongoUri, { appName });
  await client.connect();
  return client;
};

/**
 * Refunds run in multi-document transactions, which a standalone server
 * rejects. Replica set members report `setName`; mongos reports `isdbgrid`.
 */
export const assertTransactionSupport = async (client: MongoClient): Promise<void> => {
  const hello = await client.db("admin").command({ hello: 1 });
  if (typeof hello.setName === "string" && hello.setName !== "") return;
  if (hello.msg === "isdbgrid") return;
  throw new Error(
    "MongoDB deployment does not support transactions: connect MONGO_URI to a replica set or sharded cluster"
  );
};
