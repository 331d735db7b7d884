export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export const rootCauseOf = (reason: unknown): unknown =>
  reason instanceof Error ? reason.cause ?? reason : reason;

export type DispatchFailureCode =
  | "connector_submit_failed"
  | "connector_query_failed"
  | "archive_failed"
  | "store_failed";

export type DispatchErrorContext = {
  channelId?: string;
  jobId?: string;
  taskId?: string;
  userId?: number;
};

export class DispatchError extends Error {
  readonly code: DispatchFailureCode;
  readonly context: DispatchErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: DispatchFailureCode; message: string; context: DispatchErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "DispatchError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const wrapDispatchFailure = (
  code: DispatchFailureCode,
  reason: unknown,
  context: DispatchErrorContext
): DispatchError => {
  const where = Object.entries(context)
    .filter(([, value]) => value !== undefined && value !== "")
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(", ");
  return new DispatchError({
    code,
    message: `${code} at ${where || "unknown"}: ${toErrorMessage(reason)}`,
    context,
    cause: rootCauseOf(reason)
  });
};

/**
 * Flattens an error into loggable fields without leaking causes or payloads.
 */
export const describeError = (err: unknown): Record<string, unknown> => {
  if (err instanceof DispatchError) {
    return { error: err.message, code: err.code, ...err.context };
  }
  if (err instanceof Error) {
    if ("status" in err && typeof err.status === "number") {
      return { error: err.message, status: err.status };
    }
    return { error: err.message };
  }
  return { error: String(err) };
};
