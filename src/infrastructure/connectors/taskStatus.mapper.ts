import type { TaskButton, TaskState, TaskStatus } from "../../ports/ProviderConnector";
import { MalformedResponseError } from "./connector.errors";

const stateByProviderStatus: Record<string, TaskState> = {
  NOT_START: "pending",
  SUBMITTED: "pending",
  MODAL: "pending",
  IN_PROGRESS: "running",
  SUCCESS: "succeeded",
  FAILURE: "failed",
  CANCEL: "failed"
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readString = (record: Record<string, unknown>, key: string): string => {
  const value = record[key];
  return typeof value === "string" ? value : "";
};

/** "45%" -> 45; anything unparsable -> 0. */
export const parseProgress = (value: unknown): number => {
  const raw = typeof value === "number" ? value : Number.parseInt(String(value ?? "").replace("%", "").trim(), 10);
  if (!Number.isFinite(raw)) return 0;
  return Math.min(100, Math.max(0, Math.trunc(raw)));
};

const parseButtons = (value: unknown): TaskButton[] => {
  if (!Array.isArray(value)) return [];
  return value.flatMap((item) => {
    if (!isRecord(item)) return [];
    const customId = readString(item, "customId");
    if (customId === "") return [];
    return [{ customId, label: readString(item, "label") }];
  });
};

export const toTaskStatus = (body: unknown): TaskStatus => {
  if (!isRecord(body)) {
    throw new MalformedResponseError("Task query response is not an object");
  }

  const providerStatus = readString(body, "status");
  const state = stateByProviderStatus[providerStatus];
  if (!state) {
    throw new MalformedResponseError(`Task query response has unknown status: ${providerStatus || "<empty>"}`);
  }

  return {
    state,
    // only a finished task reports 100; "100%" while rendering still means in flight
    progress: state === "succeeded" ? 100 : Math.min(99, parseProgress(body.progress)),
    imageUrl: readString(body, "imageUrl"),
    failReason: readString(body, "failReason"),
    prompt: readString(body, "promptEn") || readString(body, "prompt"),
    buttons: parseButtons(body.buttons)
  };
};
