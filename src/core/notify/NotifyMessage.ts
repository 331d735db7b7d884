import { InvalidQueueEntryError } from "../jobs/GenerationTask";

export const NotifyStatus = {
  Running: "RUNNING",
  Finished: "FINISH",
  Failed: "FAIL"
} as const;

export type NotifyStatus = (typeof NotifyStatus)[keyof typeof NotifyStatus];

export type NotifyMessage = {
  userId: number;
  jobId: string;
  message: NotifyStatus;
};

const statuses: readonly string[] = Object.values(NotifyStatus);

const isNotifyStatus = (value: unknown): value is NotifyStatus =>
  typeof value === "string" && statuses.includes(value);

export const parseNotifyMessage = (raw: unknown): NotifyMessage => {
  if (typeof raw !== "object" || raw === null) {
    throw new InvalidQueueEntryError("Invalid notification: expected an object");
  }
  const record: Record<string, unknown> = { ...raw };
  const { userId, jobId, message } = record;

  if (typeof userId !== "number" || !Number.isSafeInteger(userId) || userId <= 0) {
    throw new InvalidQueueEntryError("Invalid notification: userId must be a positive integer");
  }
  if (typeof jobId !== "string") {
    throw new InvalidQueueEntryError("Invalid notification: jobId must be a string");
  }
  if (!isNotifyStatus(message)) {
    throw new InvalidQueueEntryError(`Invalid notification: unknown message ${String(message)}`);
  }

  return { userId, jobId, message };
};
