import http from "http";
import type { ConnectionRegistry } from "./application/notify/ConnectionRegistry";
import { SseConnection, sseHeaders } from "./infrastructure/http/SseConnection";
import { isArchiveMode, type StoredAsset } from "./infrastructure/storage/GridFsAssetArchiver";
import type { ArchiveMode } from "./ports/AssetArchiver";
import { describeError } from "./shared/errors/errors";
import type { Logger } from "./shared/logging/logger";

export type AssetStore = {
  open: (mode: ArchiveMode, fileId: string) => Promise<StoredAsset | null>;
};

export type ServerDeps = {
  registry: ConnectionRegistry;
  workerCount: () => number;
  assets?: AssetStore;
  logger: Logger;
  heartbeatMs?: number;
};

const sendJson = (res: http.ServerResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

// authentication happens upstream; the proxy forwards the verified user id
const readUserId = (req: http.IncomingMessage): number | undefined => {
  const raw = req.headers["x-user-id"];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (!value || !/^\d+$/.test(value)) return undefined;
  const userId = Number(value);
  return Number.isSafeInteger(userId) && userId > 0 ? userId : undefined;
};

const openNotificationStream = (req: http.IncomingMessage, res: http.ServerResponse, deps: ServerDeps) => {
  const userId = readUserId(req);
  if (userId === undefined) {
    sendJson(res, 401, { error: "missing or invalid x-user-id" });
    return;
  }

  res.writeHead(200, sseHeaders);
  res.write(": connected\n\n");

  const connection = new SseConnection(res);
  deps.registry.add(userId, connection);
  deps.logger.debug("connection.opened", { userId });

  const heartbeat = setInterval(() => {
    connection.ping().catch(() => connection.close());
  }, deps.heartbeatMs ?? 25_000);

  req.on("close", () => {
    clearInterval(heartbeat);
    deps.registry.remove(userId, connection);
    deps.logger.debug("connection.closed", { userId });
  });
};

const serveAsset = async (res: http.ServerResponse, deps: ServerDeps, mode: string, fileId: string) => {
  if (!deps.assets || !isArchiveMode(mode)) {
    sendJson(res, 404, { error: "not found" });
    return;
  }

  const asset = await deps.assets.open(mode, fileId);
  if (!asset) {
    sendJson(res, 404, { error: "not found" });
    return;
  }

  res.writeHead(200, {
    "content-type": asset.contentType,
    "content-length": String(asset.length),
    "cache-control": "public, max-age=31536000, immutable"
  });
  asset.stream.on("error", (err) => {
    deps.logger.warn("assets.stream_failed", { fileId, ...describeError(err) });
    res.destroy(err);
  });
  asset.stream.pipe(res);
};

export const createServer = (deps: ServerDeps) =>
  http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const assetMatch = /^\/assets\/([^/]+)\/([^/]+)$/.exec(url.pathname);

    if (req.method === "GET" && url.pathname === "/health") {
      sendJson(res, 200, { ok: true, workers: deps.workerCount(), connections: deps.registry.size() });
      return;
    }
    if (req.method === "GET" && url.pathname === "/notifications") {
      openNotificationStream(req, res, deps);
      return;
    }
    if (req.method === "GET" && assetMatch) {
      serveAsset(res, deps, assetMatch[1] ?? "", assetMatch[2] ?? "").catch((err: unknown) => {
        deps.logger.error("assets.open_failed", describeError(err));
        if (!res.headersSent) sendJson(res, 500, { error: "internal error" });
        else res.destroy();
      });
      return;
    }

    sendJson(res, 404, { error: "not found" });
  });
