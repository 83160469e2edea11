type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export interface CorrelationContext {
  requestId?: string | null;
  analysisId?: string | null;
  caseId?: string | null;
}

export interface LogFields {
  [key: string]: unknown;
}

export type LogFn = (event: string, context: CorrelationContext, fields?: LogFields) => void;

const toLogEntry = (
  level: LogLevel,
  event: string,
  context: CorrelationContext,
  fields: LogFields
): Record<string, unknown> => ({
  ts: new Date().toISOString(),
  level,
  event,
  request_id: context.requestId ?? null,
  analysis_id: context.analysisId ?? null,
  case_id: context.caseId ?? null,
  ...fields
});

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

export const parseConfiguredLogLevel = (value: string | undefined): LogLevel => {
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

const configuredLogLevel = parseConfiguredLogLevel(process.env.LOG_LEVEL);

export const isLogLevelEnabled = (level: LogLevel): boolean =>
  LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[configuredLogLevel];

const emit = (entry: Record<string, unknown>, level: LogLevel): void => {
  if (!isLogLevelEnabled(level)) {
    return;
  }
  const serialized = JSON.stringify(entry);
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

export const logInfo: LogFn = (event, context, fields = {}) => {
  emit(toLogEntry("info", event, context, fields), "info");
};

export const logDebug: LogFn = (event, context, fields = {}) => {
  emit(toLogEntry("debug", event, context, fields), "debug");
};

export const logTrace: LogFn = (event, context, fields = {}) => {
  emit(toLogEntry("trace", event, context, fields), "trace");
};

export const logWarn: LogFn = (event, context, fields = {}) => {
  emit(toLogEntry("warn", event, context, fields), "warn");
};

export const logError: LogFn = (event, context, fields = {}) => {
  emit(toLogEntry("error", event, context, fields), "error");
};

export const serializeError = (error: unknown): Record<string, unknown> => {
  if (!(error instanceof Error)) {
    return { error_raw: String(error) };
  }

  const details: Record<string, unknown> = {
    error_name: error.name,
    error_message: error.message
  };

  if (error.stack) {
    details.error_stack = error.stack;
  }

  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    details.error_cause = {
      name: cause.name,
      message: cause.message
    };
  } else if (cause !== undefined) {
    details.error_cause = cause;
  }

  return details;
};
