import { isLogLevel, type LogLevel } from "../logging/logger";

export type QueueBackend = "mongo" | "memory";

export type Env = {
  MONGO_URI: string;
  MONGO_DB: string;
  PUBLIC_BASE_URL: string;
  CONNECTORS_CONFIG_PATH: string;
  CONNECTOR_ALLOWED_HOSTS: string[];
  LOG_LEVEL: LogLevel;
  QUEUE_BACKEND: QueueBackend;
};

export const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const parseHostList = (raw: string | undefined): string[] =>
  (raw ?? "")
    .split(",")
    .map((host) => host.trim().toLowerCase())
    .filter((host) => host !== "");

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = env.MONGO_URI ?? "mongodb://localhost:27017/imagine";
  const MONGO_DB = env.MONGO_DB?.trim() || "imagine";
  const PUBLIC_BASE_URL = validateHttpUrl("PUBLIC_BASE_URL", env.PUBLIC_BASE_URL ?? "http://localhost:3000").replace(/\/+$/, "");
  const CONNECTORS_CONFIG_PATH = env.CONNECTORS_CONFIG_PATH?.trim() || "./config/connectors.json";
  const CONNECTOR_ALLOWED_HOSTS = parseHostList(env.CONNECTOR_ALLOWED_HOSTS);

  const rawLevel = env.LOG_LEVEL?.trim().toLowerCase() || "info";
  if (!isLogLevel(rawLevel)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error. Received: ${rawLevel}`);
  }

  const QUEUE_BACKEND = env.QUEUE_BACKEND?.trim().toLowerCase() || "mongo";
  if (QUEUE_BACKEND !== "mongo" && QUEUE_BACKEND !== "memory") {
    throw new Error(`QUEUE_BACKEND must be mongo or memory. Received: ${QUEUE_BACKEND}`);
  }

  return {
    MONGO_URI,
    MONGO_DB,
    PUBLIC_BASE_URL,
    CONNECTORS_CONFIG_PATH,
    CONNECTOR_ALLOWED_HOSTS,
    LOG_LEVEL: rawLevel,
    QUEUE_BACKEND
  };
};
