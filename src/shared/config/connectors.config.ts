import { readFile } from "fs/promises";
import { resolve } from "path";
import type { ConnectorKind } from "../../ports/ProviderConnector";

export type PlusMode = "fast" | "relax" | "turbo";

type ConnectorConfigBase = {
  name?: string;
  enabled: boolean;
  apiUrl: string;
  apiKey: string;
};

export type PlusConnectorConfig = ConnectorConfigBase & { kind: "plus"; mode: PlusMode };
export type ProxyConnectorConfig = ConnectorConfigBase & { kind: "proxy" };
export type ConnectorConfig = PlusConnectorConfig | ProxyConnectorConfig;

export type ConnectorsConfig = {
  plus: PlusConnectorConfig[];
  proxy: ProxyConnectorConfig[];
};

const plusModes: readonly PlusMode[] = ["fast", "relax", "turbo"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readBase = (kind: ConnectorKind, index: number, entry: unknown): ConnectorConfigBase => {
  const where = `${kind}[${index}]`;
  if (!isRecord(entry)) {
    throw new Error(`Invalid connector config ${where}: expected an object`);
  }

  const { name, enabled, apiUrl, apiKey } = entry;
  if (typeof apiUrl !== "string" || apiUrl.trim() === "") {
    throw new Error(`Invalid connector config ${where}: apiUrl is required`);
  }
  if (apiKey != null && typeof apiKey !== "string") {
    throw new Error(`Invalid connector config ${where}: apiKey must be a string`);
  }
  if (name != null && (typeof name !== "string" || name.trim() === "")) {
    throw new Error(`Invalid connector config ${where}: name must be a non-empty string`);
  }

  return {
    name: typeof name === "string" ? name.trim() : undefined,
    enabled: enabled !== false,
    apiUrl: apiUrl.trim().replace(/\/+$/, ""),
    apiKey: typeof apiKey === "string" ? apiKey : ""
  };
};

const readList = (value: unknown, kind: ConnectorKind): unknown[] => {
  if (value == null) return [];
  if (!Array.isArray(value)) {
    throw new Error(`Invalid connector config: ${kind} must be an array`);
  }
  return value;
};

export const parseConnectorsConfig = (raw: unknown): ConnectorsConfig => {
  if (!isRecord(raw)) {
    throw new Error("Invalid connector config: expected an object with plus/proxy lists");
  }

  const plus = readList(raw.plus, "plus").map((entry, index): PlusConnectorConfig => {
    const base = readBase("plus", index, entry);
    const mode = isRecord(entry) ? entry.mode ?? "fast" : "fast";
    const knownMode = plusModes.find((candidate) => candidate === mode);
    if (!knownMode) {
      throw new Error(`Invalid connector config plus[${index}]: mode must be one of ${plusModes.join(", ")}`);
    }
    return { ...base, kind: "plus", mode: knownMode };
  });

  const proxy = readList(raw.proxy, "proxy").map(
    (entry, index): ProxyConnectorConfig => ({ ...readBase("proxy", index, entry), kind: "proxy" })
  );

  return { plus, proxy };
};

export const loadConnectorsConfig = async (configPath: string): Promise<ConnectorsConfig> => {
  const absolutePath = resolve(configPath);
  let text: string;
  try {
    text = await readFile(absolutePath, "utf-8");
  } catch (err) {
    if (isRecord(err) && err.code === "ENOENT") {
      return { plus: [], proxy: [] };
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error(`Invalid connector config: ${absolutePath} is not valid JSON`);
  }
  return parseConnectorsConfig(parsed);
};
