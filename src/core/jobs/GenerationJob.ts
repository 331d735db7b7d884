export const PROGRESS_COMPLETE = 100;
export const PROGRESS_FAILED = -1;

export type TaskType = "image" | "upscale" | "variation" | "blend";

export type GenerationJob = {
  id: string;
  type: TaskType;
  userId: number;
  channelId: string;    // worker (channel) that submitted the task
  taskId: string;       // connector-assigned, empty until submitted
  prompt: string;
  progress: number;     // 0..100, or PROGRESS_FAILED
  power: number;        // credit reserved at submission
  orgUrl: string;       // provider-hosted original
  imgUrl: string;       // archived copy, empty until archived
  hash: string;
  errMsg: string;
  createdAt: Date;
  updatedAt: Date;
};

export type JobPatch = Partial<Pick<GenerationJob, "channelId" | "taskId" | "prompt" | "progress" | "orgUrl" | "imgUrl" | "hash" | "errMsg">>;

export const isFailed = (job: Pick<GenerationJob, "progress">): boolean => job.progress === PROGRESS_FAILED;

export const isExpired = (
  job: Pick<GenerationJob, "progress" | "createdAt">,
  now: Date,
  timeoutMs: number
): boolean => {
  if (isFailed(job)) return true;
  return job.progress < PROGRESS_COMPLETE && now.getTime() - job.createdAt.getTime() > timeoutMs;
};

export const isPendingArchival = (job: Pick<GenerationJob, "progress" | "orgUrl" | "imgUrl">): boolean =>
  job.progress === PROGRESS_COMPLETE && job.orgUrl !== "" && job.imgUrl === "";
