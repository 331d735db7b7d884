import { ConnectorRejectedError } from "../../src/infrastructure/connectors/connector.errors";
import { PlusConnector } from "../../src/infrastructure/connectors/PlusConnector";
import { ProxyConnector } from "../../src/infrastructure/connectors/ProxyConnector";
import { toErrorMessage } from "../../src/shared/errors/errors";
import { LoopScheduler } from "../../src/shared/scheduling/LoopScheduler";
import { createRecordingLogger } from "../support/recordingLogger";
import { sendJson, startServer, type TestServer } from "../support/testServer";

const retryPolicy = { retries: 2, minDelayMs: 1, maxDelayMs: 2, jitterRatio: 0 };

describe("provider connectors over HTTP", () => {
  let server: TestServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it("proxy variant submits imagine tasks with the api secret header", async () => {
    server = await startServer((_req, res) => sendJson(res, 200, { code: 1, description: "Submit success", result: "1712345" }));
    const { logger } = createRecordingLogger();
    const connector = new ProxyConnector({ apiUrl: `${server.baseUrl}/`, apiKey: "test-secret", logger, retryPolicy });

    const result = await connector.submit({ type: "image", jobId: "j1", userId: 1, prompt: "a red fox", images: [] });

    expect(result).toEqual({ taskId: "1712345" });
    const [request] = server.requests;
    expect(request?.method).toBe("POST");
    expect(request?.url).toBe("/mj/submit/imagine");
    expect(request?.headers["mj-api-secret"]).toBe("test-secret");
    expect(request?.headers.authorization).toBeUndefined();
    expect(JSON.parse(request?.body ?? "")).toEqual({ botType: "MID_JOURNEY", prompt: "a red fox", base64Array: [] });
  });

  it("plus variant routes actions by mode and sends a bearer token", async () => {
    server = await startServer((_req, res) => sendJson(res, 200, { code: 22, description: "In queue", result: "99" }));
    const { logger } = createRecordingLogger();
    const connector = new PlusConnector({ apiUrl: server.baseUrl, apiKey: "test-secret", mode: "relax", logger, retryPolicy });

    const result = await connector.submit({
      type: "upscale",
      jobId: "j2",
      userId: 1,
      index: 2,
      messageHash: "hash-abc",
      referenceTaskId: "1712345"
    });

    expect(result).toEqual({ taskId: "99" });
    const [request] = server.requests;
    expect(request?.url).toBe("/mj-relax/mj/submit/action");
    expect(request?.headers.authorization).toBe("Bearer test-secret");
    expect(JSON.parse(request?.body ?? "")).toEqual({ taskId: "1712345", customId: "MJ::JOB::upsample::2::hash-abc" });
  });

  it("posts blend tasks to the blend endpoint", async () => {
    server = await startServer((_req, res) => sendJson(res, 200, { code: 1, description: "ok", result: "b-1" }));
    const { logger } = createRecordingLogger();
    const connector = new ProxyConnector({ apiUrl: server.baseUrl, apiKey: "", logger, retryPolicy });

    await connector.submit({ type: "blend", jobId: "j3", userId: 1, images: ["data:a", "data:b"] });

    expect(server.requests[0]?.url).toBe("/mj/submit/blend");
    expect(server.requests[0]?.headers["mj-api-secret"]).toBeUndefined();
    expect(JSON.parse(server.requests[0]?.body ?? "")).toEqual({
      botType: "MID_JOURNEY",
      base64Array: ["data:a", "data:b"],
      dimensions: "SQUARE"
    });
  });

  it("rejects submissions the provider refuses", async () => {
    server = await startServer((_req, res) => sendJson(res, 200, { code: 24, description: "banned prompt" }));
    const { logger } = createRecordingLogger();
    const connector = new ProxyConnector({ apiUrl: server.baseUrl, apiKey: "test-secret", logger, retryPolicy });

    const submission = connector.submit({ type: "image", jobId: "j1", userId: 1, prompt: "x", images: [] });

    await expect(submission).rejects.toBeInstanceOf(ConnectorRejectedError);
    await expect(submission).rejects.toThrow("Provider rejected task: code=24 banned prompt");
    expect(server.requests).toHaveLength(1);
  });

  it("maps an in-progress query", async () => {
    server = await startServer((_req, res) =>
      sendJson(res, 200, { id: "t-1", status: "IN_PROGRESS", progress: "45%", imageUrl: "", promptEn: "a red fox" })
    );
    const { logger } = createRecordingLogger();
    const connector = new ProxyConnector({ apiUrl: server.baseUrl, apiKey: "test-secret", logger, retryPolicy });

    await expect(connector.query("t-1")).resolves.toEqual({
      state: "running",
      progress: 45,
      imageUrl: "",
      failReason: "",
      prompt: "a red fox",
      buttons: []
    });
    expect(server.requests[0]?.method).toBe("GET");
    expect(server.requests[0]?.url).toBe("/mj/task/t-1/fetch");
  });

  it("maps a finished query with its buttons", async () => {
    server = await startServer((_req, res) =>
      sendJson(res, 200, {
        status: "SUCCESS",
        progress: "99%",
        imageUrl: "https://cdn.provider.test/img.png",
        buttons: [
          { customId: "MJ::JOB::upsample::1::hash-1", label: "U1" },
          { label: "no id" }
        ]
      })
    );
    const { logger } = createRecordingLogger();
    const connector = new PlusConnector({ apiUrl: server.baseUrl, apiKey: "test-secret", mode: "fast", logger, retryPolicy });

    const status = await connector.query("t-2");

    expect(status.state).toBe("succeeded");
    expect(status.progress).toBe(100);
    expect(status.imageUrl).toBe("https://cdn.provider.test/img.png");
    expect(status.buttons).toEqual([{ customId: "MJ::JOB::upsample::1::hash-1", label: "U1" }]);
    expect(server.requests[0]?.url).toBe("/mj/task/t-2/fetch");
  });

  it("retries 5xx responses and logs each retry", async () => {
    let calls = 0;
    server = await startServer((_req, res) => {
      calls += 1;
      if (calls < 3) {
        res.writeHead(503, { "content-type": "text/plain" });
        res.end("busy");
        return;
      }
      sendJson(res, 200, { status: "FAILURE", progress: "0%", failReason: "queue full" });
    });
    const { logger, entries } = createRecordingLogger();
    const connector = new ProxyConnector({ apiUrl: server.baseUrl, apiKey: "test-secret", logger, retryPolicy });

    const status = await connector.query("t-3");

    expect(status.state).toBe("failed");
    expect(status.failReason).toBe("queue full");
    expect(calls).toBe(3);
    expect(entries.filter((entry) => entry.event === "http.retry").map((entry) => entry.fields)).toEqual([
      { connector: "proxy", status: 503, url: `${server.baseUrl}/mj/task/t-3/fetch`, attempt: 1, maxAttempts: 3 },
      { connector: "proxy", status: 503, url: `${server.baseUrl}/mj/task/t-3/fetch`, attempt: 2, maxAttempts: 3 }
    ]);
  });

  it.each([400, 401, 404])("treats %s as fatal", async (status) => {
    server = await startServer((_req, res) => {
      res.writeHead(status, { "content-type": "text/plain" });
      res.end("nope");
    });
    const { logger } = createRecordingLogger();
    const connector = new ProxyConnector({ apiUrl: server.baseUrl, apiKey: "test-secret", logger, retryPolicy });

    await expect(connector.query("t-4")).rejects.toThrow(`Connector request failed: ${status}`);
    expect(server.requests).toHaveLength(1);
  });

  it("does not retry malformed bodies", async () => {
    server = await startServer((_req, res) => sendJson(res, 200, { status: "WHATEVER" }));
    const { logger } = createRecordingLogger();
    const connector = new ProxyConnector({ apiUrl: server.baseUrl, apiKey: "test-secret", logger, retryPolicy });

    await expect(connector.query("t-5")).rejects.toThrow("Task query response has unknown status: WHATEVER");
    expect(server.requests).toHaveLength(1);
  });

  it("retries timed out queries but not timed out submissions", async () => {
    server = await startServer((_req, res) => {
      setTimeout(() => sendJson(res, 200, { code: 1, result: "late" }), 80);
    });
    const { logger } = createRecordingLogger();
    const connector = new ProxyConnector({ apiUrl: server.baseUrl, apiKey: "test-secret", timeoutMs: 20, logger, retryPolicy });

    await expect(
      connector.submit({ type: "image", jobId: "j1", userId: 1, prompt: "x", images: [] })
    ).rejects.toThrow("Connector request timeout after 20ms");
    await new Promise((r) => setTimeout(r, 20));
    expect(server.requests).toHaveLength(1);

    await expect(connector.query("t-6")).rejects.toThrow("Connector request timeout after 20ms");
    await new Promise((r) => setTimeout(r, 20));
    expect(server.requests).toHaveLength(4);
  });

  it("stops retrying as soon as the caller aborts", async () => {
    server = await startServer((_req, res) => {
      res.writeHead(503);
      res.end();
    });
    const { logger } = createRecordingLogger();
    const connector = new ProxyConnector({
      apiUrl: server.baseUrl,
      apiKey: "test-secret",
      logger,
      retryPolicy: { retries: 3, minDelayMs: 500, maxDelayMs: 500, jitterRatio: 0 }
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    const startedAt = Date.now();
    await expect(connector.query("t-7", controller.signal)).rejects.toThrow("Connector request aborted");

    expect(Date.now() - startedAt).toBeLessThan(400);
    expect(server.requests).toHaveLength(1);
  });

  it("lets the scheduler stop while a connector keeps failing", async () => {
    server = await startServer((_req, res) => {
      res.writeHead(503);
      res.end();
    });
    const { logger } = createRecordingLogger();
    const connector = new ProxyConnector({
      apiUrl: server.baseUrl,
      apiKey: "test-secret",
      logger,
      retryPolicy: { retries: 3, minDelayMs: 500, maxDelayMs: 500, jitterRatio: 0 }
    });
    const scheduler = new LoopScheduler(logger);
    let outcome = "";
    scheduler.spawn({
      name: "poll",
      run: async (signal) => {
        outcome = await connector.query("t-8", signal).then(
          () => "resolved",
          (err: unknown) => toErrorMessage(err)
        );
      }
    });
    await new Promise((r) => setTimeout(r, 50));

    const startedAt = Date.now();
    await scheduler.stop();

    expect(Date.now() - startedAt).toBeLessThan(400);
    expect(outcome).toBe("Connector request aborted");
  });
});
