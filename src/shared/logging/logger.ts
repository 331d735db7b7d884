export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type Logger = {
  debug: (event: string, fields?: LogFields) => void;
  info: (event: string, fields?: LogFields) => void;
  warn: (event: string, fields?: LogFields) => void;
  error: (event: string, fields?: LogFields) => void;
};

export const logLevels: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const isLogLevel = (value: string): value is LogLevel =>
  logLevels.some((level) => level === value);

/**
 * JSON-lines logger over `console`. Each line is `{"event": ..., ...fields}`.
 */
export const createLogger = (minLevel: LogLevel = "info", baseFields: LogFields = {}): Logger => {
  const threshold = logLevels.indexOf(minLevel);

  const write = (level: LogLevel, event: string, fields: LogFields = {}) => {
    if (logLevels.indexOf(level) < threshold) return;
    const line = JSON.stringify({ event, ...baseFields, ...fields });
    /* eslint-disable no-console */
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
    /* eslint-enable no-console */
  };

  return {
    debug: (event, fields) => write("debug", event, fields),
    info: (event, fields) => write("info", event, fields),
    warn: (event, fields) => write("warn", event, fields),
    error: (event, fields) => write("error", event, fields)
  };
};
