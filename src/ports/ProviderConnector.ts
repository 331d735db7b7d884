import type { GenerationTask } from "../core/jobs/GenerationTask";

export type ConnectorKind = "plus" | "proxy";

export type TaskState = "pending" | "running" | "succeeded" | "failed";

export type TaskButton = {
  customId: string;
  label: string;
};

export type TaskStatus = {
  state: TaskState;
  progress: number;     // 0..100
  imageUrl: string;
  failReason: string;
  prompt: string;
  buttons: TaskButton[];
};

export type SubmitResult = {
  taskId: string;
};

export interface ProviderConnector {
  readonly kind: ConnectorKind;
  /** `signal` cancels the request and any pending retry. */
  submit(task: GenerationTask, signal?: AbortSignal): Promise<SubmitResult>;
  query(taskId: string, signal?: AbortSignal): Promise<TaskStatus>;
}
