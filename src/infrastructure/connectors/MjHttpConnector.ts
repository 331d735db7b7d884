import type { GenerationTask } from "../../core/jobs/GenerationTask";
import { buildActionCustomId } from "../../core/jobs/imageHash";
import type { ConnectorKind, ProviderConnector, SubmitResult, TaskStatus } from "../../ports/ProviderConnector";
import type { Logger } from "../../shared/logging/logger";
import { retry, type RetryOptions } from "../../shared/retry/retry";
import { ConnectorRejectedError, ConnectorRequestError, MalformedResponseError } from "./connector.errors";
import { toTaskStatus } from "./taskStatus.mapper";

export type SubmitAction = "imagine" | "blend" | "action";

export type HttpConnectorOptions = {
  apiUrl: string;
  apiKey: string;
  timeoutMs?: number;
  logger: Logger;
  retryPolicy?: Pick<RetryOptions, "retries" | "minDelayMs" | "maxDelayMs" | "jitterRatio">;
};

// 1 = submitted, 22 = accepted into the provider's own queue
const acceptedSubmitCodes = new Set([1, 22]);

const defaultRetryPolicy = { retries: 3, minDelayMs: 250, maxDelayMs: 5000 };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Shared HTTP plumbing of the two provider variants. Subclasses only decide
 * where submissions go and how requests authenticate.
 */
export abstract class MjHttpConnector implements ProviderConnector {
  abstract readonly kind: ConnectorKind;

  protected readonly apiUrl: string;
  protected readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly retryPolicy: Pick<RetryOptions, "retries" | "minDelayMs" | "maxDelayMs" | "jitterRatio">;

  constructor(options: HttpConnectorOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 8000;
    this.logger = options.logger;
    this.retryPolicy = options.retryPolicy ?? defaultRetryPolicy;
  }

  protected abstract submitUrl(action: SubmitAction): string;
  protected abstract authHeaders(): Record<string, string>;

  async submit(task: GenerationTask, signal?: AbortSignal): Promise<SubmitResult> {
    const { action, body } = this.buildSubmission(task);
    const response = await this.request("POST", this.submitUrl(action), body, signal);
    if (!isRecord(response)) {
      throw new MalformedResponseError("Submit response is not an object");
    }

    const code = typeof response.code === "number" ? response.code : Number.NaN;
    const description = typeof response.description === "string" ? response.description : "";
    if (!acceptedSubmitCodes.has(code)) {
      throw new ConnectorRejectedError(code, description);
    }

    const result = response.result;
    const taskId = typeof result === "string" || typeof result === "number" ? String(result) : "";
    if (taskId === "") {
      throw new MalformedResponseError("Submit response carries no task id");
    }
    return { taskId };
  }

  async query(taskId: string, signal?: AbortSignal): Promise<TaskStatus> {
    const body = await this.request("GET", `${this.apiUrl}/mj/task/${encodeURIComponent(taskId)}/fetch`, undefined, signal);
    return toTaskStatus(body);
  }

  private buildSubmission(task: GenerationTask): { action: SubmitAction; body: Record<string, unknown> } {
    switch (task.type) {
      case "image":
        return {
          action: "imagine",
          body: { botType: "MID_JOURNEY", prompt: task.prompt, base64Array: task.images }
        };
      case "blend":
        return {
          action: "blend",
          body: { botType: "MID_JOURNEY", base64Array: task.images, dimensions: "SQUARE" }
        };
      case "upscale":
      case "variation":
        return {
          action: "action",
          body: {
            taskId: task.referenceTaskId,
            customId: buildActionCustomId(task.type === "upscale" ? "upsample" : "variation", task.index, task.messageHash)
          }
        };
    }
  }

  private async request(
    method: "GET" | "POST",
    target: string,
    payload?: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<unknown> {
    const url = new URL(target);
    const safeRequestUrl = `${url.origin}${url.pathname}`;

    const doFetch = async (): Promise<unknown> => {
      if (signal?.aborted) {
        throw new ConnectorRequestError({ message: "Connector request aborted", requestUrl: safeRequestUrl, isAborted: true });
      }
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      const onAbort = () => controller.abort();
      signal?.addEventListener("abort", onAbort, { once: true });
      let res: Response;
      try {
        res = await fetch(url.toString(), {
          method,
          headers: {
            ...this.authHeaders(),
            ...(payload ? { "content-type": "application/json" } : {})
          },
          body: payload ? JSON.stringify(payload) : undefined,
          signal: controller.signal
        });
      } catch (err) {
        if (signal?.aborted) {
          throw new ConnectorRequestError({ message: "Connector request aborted", requestUrl: safeRequestUrl, isAborted: true });
        }
        if (controller.signal.aborted) {
          throw new ConnectorRequestError({
            message: `Connector request timeout after ${this.timeoutMs}ms`,
            requestUrl: safeRequestUrl,
            isTimeout: true
          });
        }
        throw err;
      } finally {
        clearTimeout(timeout);
        signal?.removeEventListener("abort", onAbort);
      }

      if (!res.ok) {
        await res.text().catch(() => "");
        const retryAfter = res.headers.get("retry-after");
        throw new ConnectorRequestError({
          message: `Connector request failed: ${res.status}`,
          requestUrl: safeRequestUrl,
          status: res.status,
          retryDelayMs:
            res.status === 429 && retryAfter && /^\d+$/.test(retryAfter) ? Number(retryAfter) * 1000 : undefined
        });
      }

      try {
        return await res.json();
      } catch {
        if (signal?.aborted) {
          throw new ConnectorRequestError({ message: "Connector request aborted", requestUrl: safeRequestUrl, isAborted: true });
        }
        throw new MalformedResponseError(`Connector response from ${safeRequestUrl} is not JSON`);
      }
    };

    return retry(doFetch, {
      ...this.retryPolicy,
      signal,
      onRetry: ({ attempt, maxAttempts, error }) => {
        this.logger.warn("http.retry", {
          connector: this.kind,
          status: error instanceof ConnectorRequestError ? error.status ?? null : null,
          url: safeRequestUrl,
          attempt,
          maxAttempts
        });
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        this.logger.warn("http.give_up", {
          connector: this.kind,
          status: error instanceof ConnectorRequestError ? error.status ?? null : null,
          url: safeRequestUrl,
          attempt,
          maxAttempts
        });
      },
      shouldRetry: (err) => {
        if (err instanceof MalformedResponseError) return false;
        if (err instanceof ConnectorRequestError) {
          if (err.isAborted) return false;
          // a timed out submission may still have been accepted upstream
          if (err.isTimeout) return method === "GET";
          if (err.status === 429) return { retry: true, delayMs: err.retryDelayMs };
          return typeof err.status === "number" && err.status >= 500;
        }
        return true;
      }
    });
  }
}
