export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export interface CorrelationContext {
  requestId?: string | null;
}

export interface LogFields {
  [key: string]: unknown;
}

export type LogFunction = (event: string, context: CorrelationContext, fields?: LogFields) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  if (
    normalized === "trace" ||
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }
  return "info";
};

const resolveConfiguredLogLevel = (): LogLevel => {
  const explicit = process.env.LOG_LEVEL;
  if (explicit && explicit.trim().length > 0) {
    return parseLogLevel(explicit);
  }

  const requestTraceMode = process.env.REQUEST_TRACE_MODE?.trim().toLowerCase();
  if (requestTraceMode === "trace" || requestTraceMode === "debug") {
    return requestTraceMode;
  }

  return "info";
};

const configuredLogLevel = resolveConfiguredLogLevel();

export const getConfiguredLogLevel = (): LogLevel => configuredLogLevel;

export const isLogLevelEnabled = (level: LogLevel): boolean =>
  LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[configuredLogLevel];

const toLogEntry = (level: LogLevel, event: string, context: CorrelationContext, fields: LogFields): LogFields => ({
  ts: new Date().toISOString(),
  level,
  event,
  request_id: context.requestId ?? null,
  ...fields
});

const emit = (level: LogLevel, event: string, context: CorrelationContext, fields: LogFields): void => {
  if (!isLogLevelEnabled(level)) {
    return;
  }
  const serialized = JSON.stringify(toLogEntry(level, event, context, fields));
  if (level === "error") {
    console.error(serialized);
    return;
  }
  if (level === "warn") {
    console.warn(serialized);
    return;
  }
  console.info(serialized);
};

export const logInfo: LogFunction = (event, context, fields = {}) => {
  emit("info", event, context, fields);
};

export const logDebug: LogFunction = (event, context, fields = {}) => {
  emit("debug", event, context, fields);
};

export const logTrace: LogFunction = (event, context, fields = {}) => {
  emit("trace", event, context, fields);
};

export const logWarn: LogFunction = (event, context, fields = {}) => {
  emit("warn", event, context, fields);
};

export const logError: LogFunction = (event, context, fields = {}) => {
  emit("error", event, context, fields);
};

export const serializeError = (error: unknown): LogFields => {
  if (!(error instanceof Error)) {
    return { error_raw: String(error) };
  }

  const details: LogFields = {
    error_name: error.name,
    error_message: error.message
  };
  if ("code" in error && typeof error.code === "string") {
    details.error_code = error.code;
  }
  if (error.cause instanceof Error) {
    details.error_cause = { name: error.cause.name, message: error.cause.message };
  } else if (error.cause !== undefined) {
    details.error_cause = String(error.cause);
  }
  return details;
};
