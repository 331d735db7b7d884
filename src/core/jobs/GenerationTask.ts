import type { TaskType } from "./GenerationJob";

type TaskBase = {
  jobId: string;
  userId: number;
  channelId?: string;   // routing hint: the channel that owns the referenced image
};

export type ImagineTask = TaskBase & {
  type: "image";
  prompt: string;
  images: string[];     // data URIs of reference images
};

export type BlendTask = TaskBase & {
  type: "blend";
  images: string[];
};

export type ActionTask = TaskBase & {
  type: "upscale" | "variation";
  index: number;
  messageHash: string;
  referenceTaskId: string;
};

export type GenerationTask = ImagineTask | BlendTask | ActionTask;

export class InvalidQueueEntryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueueEntryError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const requireString = (record: Record<string, unknown>, key: string): string => {
  const value = record[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidQueueEntryError(`Invalid task: ${key} must be a non-empty string`);
  }
  return value;
};

const requirePositiveInteger = (record: Record<string, unknown>, key: string): number => {
  const value = record[key];
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidQueueEntryError(`Invalid task: ${key} must be a positive integer`);
  }
  return value;
};

const readImages = (record: Record<string, unknown>): string[] => {
  const value = record.images;
  if (value == null) return [];
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string")) {
    throw new InvalidQueueEntryError("Invalid task: images must be an array of strings");
  }
  return value.filter((item): item is string => typeof item === "string");
};

const taskTypes: readonly TaskType[] = ["image", "upscale", "variation", "blend"];

const isTaskType = (value: unknown): value is TaskType =>
  typeof value === "string" && taskTypes.some((type) => type === value);

/**
 * Validates a decoded Task Queue entry.
 */
export const parseGenerationTask = (raw: unknown): GenerationTask => {
  if (!isRecord(raw)) {
    throw new InvalidQueueEntryError("Invalid task: expected an object");
  }
  const type = raw.type;
  if (!isTaskType(type)) {
    throw new InvalidQueueEntryError(`Invalid task: unknown type ${String(type)}`);
  }

  const base: TaskBase = {
    jobId: requireString(raw, "jobId"),
    userId: requirePositiveInteger(raw, "userId")
  };
  const channelId = raw.channelId;
  if (typeof channelId === "string" && channelId.trim() !== "") {
    base.channelId = channelId;
  }

  switch (type) {
    case "image":
      return { ...base, type: "image", prompt: requireString(raw, "prompt"), images: readImages(raw) };
    case "blend": {
      const images = readImages(raw);
      if (images.length < 2) {
        throw new InvalidQueueEntryError("Invalid task: blend needs at least two images");
      }
      return { ...base, type: "blend", images };
    }
    case "upscale":
    case "variation": {
      const index = requirePositiveInteger(raw, "index");
      if (index > 4) {
        throw new InvalidQueueEntryError("Invalid task: index must be between 1 and 4");
      }
      return {
        ...base,
        type,
        index,
        messageHash: requireString(raw, "messageHash"),
        referenceTaskId: requireString(raw, "referenceTaskId")
      };
    }
  }
};
