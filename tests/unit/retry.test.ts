import { retry } from "../../src/shared/retry/retry";

class StatusError extends Error {
  constructor(readonly status: number) {
    super(`status ${status}`);
  }
}

describe("retry", () => {
  it("retries transient failures then succeeds", async () => {
    let n = 0;
    const result = await retry(async () => {
      n += 1;
      if (n < 3) {
        throw new StatusError(503);
      }
      return "ok";
    }, {
      retries: 5,
      minDelayMs: 1,
      maxDelayMs: 5,
      shouldRetry: (e) => e instanceof StatusError && e.status >= 500
    });

    expect(result).toBe("ok");
    expect(n).toBe(3);
  });

  it("gives up after the configured retries and reports the attempt count", async () => {
    let n = 0;
    const onGiveUp = jest.fn();

    await expect(retry(async () => {
      n += 1;
      throw new StatusError(500);
    }, {
      retries: 2,
      minDelayMs: 1,
      maxDelayMs: 2,
      shouldRetry: () => true,
      onGiveUp
    })).rejects.toThrow("status 500");

    expect(n).toBe(3);
    expect(onGiveUp).toHaveBeenCalledWith({ attempt: 3, maxAttempts: 3, error: expect.any(StatusError) });
  });

  it("stops retrying once the signal aborts", async () => {
    const controller = new AbortController();
    let n = 0;

    await expect(retry(async () => {
      n += 1;
      controller.abort();
      throw new StatusError(503);
    }, {
      retries: 5,
      minDelayMs: 1000,
      maxDelayMs: 1000,
      shouldRetry: () => true,
      signal: controller.signal
    })).rejects.toThrow("status 503");

    expect(n).toBe(1);
  });
});
