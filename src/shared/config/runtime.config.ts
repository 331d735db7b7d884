export const runtimeCaps = {
  port: { min: 1, max: 65535 },
  reconcileIntervalMs: { min: 1000, max: 600000 },
  archiveIntervalMs: { min: 1000, max: 600000 },
  jobTimeoutMs: { min: 60000, max: 86400000 },
  queuePollIntervalMs: { min: 50, max: 60000 },
  connectorTimeoutMs: { min: 1000, max: 30000 }
} as const;

export type RuntimeConfig = {
  port: number;
  reconcileIntervalMs: number;
  archiveIntervalMs: number;
  jobTimeoutMs: number;
  queuePollIntervalMs: number;
  connectorTimeoutMs: number;
};

export const defaultRuntimeConfig: RuntimeConfig = {
  port: 3000,
  reconcileIntervalMs: 10_000,
  archiveIntervalMs: 5_000,
  jobTimeoutMs: 30 * 60_000,
  queuePollIntervalMs: 1_000,
  connectorTimeoutMs: 8_000
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => ({
  port: parseOptionalIntInRange(env, "PORT", runtimeCaps.port) ?? defaultRuntimeConfig.port,
  reconcileIntervalMs:
    parseOptionalIntInRange(env, "RECONCILE_INTERVAL_MS", runtimeCaps.reconcileIntervalMs) ??
    defaultRuntimeConfig.reconcileIntervalMs,
  archiveIntervalMs:
    parseOptionalIntInRange(env, "ARCHIVE_INTERVAL_MS", runtimeCaps.archiveIntervalMs) ??
    defaultRuntimeConfig.archiveIntervalMs,
  jobTimeoutMs:
    parseOptionalIntInRange(env, "JOB_TIMEOUT_MS", runtimeCaps.jobTimeoutMs) ?? defaultRuntimeConfig.jobTimeoutMs,
  queuePollIntervalMs:
    parseOptionalIntInRange(env, "QUEUE_POLL_INTERVAL_MS", runtimeCaps.queuePollIntervalMs) ??
    defaultRuntimeConfig.queuePollIntervalMs,
  connectorTimeoutMs:
    parseOptionalIntInRange(env, "CONNECTOR_TIMEOUT_MS", runtimeCaps.connectorTimeoutMs) ??
    defaultRuntimeConfig.connectorTimeoutMs
});
