/**
 * Index plan, applied lazily by the repositories on first use:
 * - jobs: progress scans of the reconciliation and archival loops
 * - queues: FIFO pop per queue name
 * - power_logs: per-user audit history
 */
export const mongoIndexes = {
  jobs: [
    { keys: { progress: 1 }, options: {} },
    { keys: { imgUrl: 1, progress: 1 }, options: {} }
  ],
  queues: [
    { keys: { queue: 1, _id: 1 }, options: {} }
  ],
  powerLogs: [
    { keys: { userId: 1, createdAt: -1 }, options: {} }
  ]
} as const;

export const collectionNames = {
  jobs: "jobs",
  users: "users",
  powerLogs: "power_logs",
  queues: "queues"
} as const;
