#!/usr/bin/env node
import { startDispatch } from "../composition/root";

type ErrorContext = Partial<{
  channelId: string;
  jobId: string;
  taskId: string;
  userId: number;
}>;

type CliErrorEnvelope = {
  event: "dispatch.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  stack?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  if (typeof value.channelId === "string") sanitizedContext.channelId = value.channelId;
  if (typeof value.jobId === "string") sanitizedContext.jobId = value.jobId;
  if (typeof value.taskId === "string") sanitizedContext.taskId = value.taskId;
  if (typeof value.userId === "number" && Number.isFinite(value.userId)) sanitizedContext.userId = value.userId;

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "dispatch.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

const reportFailure = (err: unknown): never => {
  const envelope = buildCliErrorEnvelope(err, isDebugMode());
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(envelope));
  process.exit(1);
};

export const executeDispatchCli = async (): Promise<void> => {
  try {
    const runtime = await startDispatch();
    const shutdown = () => {
      runtime.stop().then(
        () => process.exit(0),
        (err: unknown) => reportFailure(err)
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  } catch (err) {
    reportFailure(err);
  }
};

if (require.main === module) {
  void executeDispatchCli();
}
