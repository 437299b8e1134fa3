import { getRequestId, getRequestRoute } from "../middleware/requestContext";

export type LogLevel = "info" | "warn" | "error";

type LogFields = {
  requestId?: string;
  route?: string;
  durationMs?: number | null;
  [key: string]: unknown;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  info: 0,
  warn: 1,
  error: 2,
};

function resolveMinLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return raw === "warn" || raw === "error" ? raw : "info";
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

function buildPayload(level: LogLevel, event: string, fields: LogFields = {}): Record<string, unknown> {
  const { requestId, route, durationMs, ...rest } = fields;
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(rest)) {
    extra[key] = serializeValue(value);
  }

  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    requestId: requestId ?? getRequestId() ?? "unknown",
    route: route ?? getRequestRoute() ?? "unknown",
    durationMs: durationMs ?? 0,
    ...extra,
  };
}

function writeLog(level: LogLevel, event: string, fields?: LogFields): void {
  if (process.env.NODE_ENV === "test" && process.env.TEST_LOGGING !== "true") {
    return;
  }
  if (LEVEL_RANK[level] < LEVEL_RANK[resolveMinLevel()]) {
    return;
  }
  try {
    const output = JSON.stringify(buildPayload(level, event, fields));
    if (level === "error") {
      process.stderr.write(`${output}\n`);
    } else {
      process.stdout.write(`${output}\n`);
    }
  } catch (err) {
    // A field that cannot be serialized still leaves a trace of the event.
    process.stderr.write(
      `${JSON.stringify({ level: "error", event: "log_write_failed", original: event, reason: String(err) })}\n`
    );
  }
}

export function logInfo(event: string, fields?: LogFields): void {
  writeLog("info", event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  writeLog("warn", event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  writeLog("error", event, fields);
}
