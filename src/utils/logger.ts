// src/utils/logger.ts

export type LogLevel = "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type HintLogger = {
  info: (msg: string, fields?: LogFields) => void;
  warn: (msg: string, fields?: LogFields) => void;
  error: (msg: string, fields?: LogFields) => void;
};

function truncate(msg: string, max = 500): string {
  return msg.length > max ? `${msg.slice(0, max)}…` : msg;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return truncate(err.message);
  return truncate(String(err || "unknown error"));
}

// One JSON object per line, same shape as the request log.
export function logEvent(level: LogLevel, msg: string, fields: LogFields = {}): void {
  const line = JSON.stringify({ level, msg, ...fields });
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export const jsonLogger: HintLogger = {
  info: (msg, fields) => logEvent("info", msg, fields),
  warn: (msg, fields) => logEvent("warn", msg, fields),
  error: (msg, fields) => logEvent("error", msg, fields),
};

export function logServerError(context: string, err: unknown, requestId?: string) {
  const rid =
    typeof requestId === "string" && requestId.trim() ? ` requestId=${requestId.trim()}` : "";
  const name = err instanceof Error && err.name ? ` ${err.name}` : "";

  console.error(`[${context}]${rid}${name} ${describeError(err)}`.trim());
}
