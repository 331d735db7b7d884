import type { ServerResponse } from "http";
import type { LiveConnection } from "../../ports/LiveConnection";

export const sseHeaders = {
  "content-type": "text/event-stream",
  "cache-control": "no-cache, no-transform",
  connection: "keep-alive",
  "x-accel-buffering": "no"
} as const;

export const formatSseData = (payload: string): string =>
  `${payload
    .split(/\r?\n/)
    .map((line) => `data: ${line}`)
    .join("\n")}\n\n`;

/** A live connection backed by an open `text/event-stream` response. */
export class SseConnection implements LiveConnection {
  constructor(private readonly res: ServerResponse) {}

  get isOpen(): boolean {
    return !this.res.writableEnded && !this.res.destroyed;
  }

  send(payload: string): Promise<void> {
    return this.write(formatSseData(payload));
  }

  ping(): Promise<void> {
    return this.write(": ping\n\n");
  }

  close(): void {
    if (this.isOpen) this.res.end();
  }

  private write(chunk: string): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(new Error("connection closed"));
    }
    return new Promise((resolve, reject) => {
      this.res.write(chunk, (err) => (err ? reject(err) : resolve()));
    });
  }
}
