import fs from "node:fs";
import path from "node:path";
import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_SET: ReadonlySet<string> = new Set<string>(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_SET.has(value);
}

export function parseLogLevel(raw: unknown, fallback: LogLevel): LogLevel {
  const normalized = String(raw ?? "")
    .trim()
    .toLowerCase();
  if (!normalized) return fallback;
  if (isLogLevel(normalized)) return normalized;
  throw new Error(`invalid log level: ${normalized} (expected ${LOG_LEVELS.join("|")})`);
}

// The report owns stdout; logs always go to stderr.
export function createDoctorLogger(params: {
  level: LogLevel;
  logFilePath?: string;
  bindings?: Record<string, unknown>;
}): Logger {
  // Streams accept everything; the logger level does the filtering.
  const streams: pino.StreamEntry[] = [{ level: "trace", stream: pino.destination(2) }];

  const logFilePath = String(params.logFilePath || "").trim();
  if (logFilePath) {
    const resolved = path.resolve(logFilePath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true, mode: 0o700 });
    const fd = fs.openSync(resolved, "a", 0o600);
    fs.closeSync(fd);
    fs.chmodSync(resolved, 0o600);
    streams.push({ level: "trace", stream: pino.destination({ dest: resolved, sync: true }) });
  }

  const logger = pino(
    {
      name: "xmobile",
      level: params.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { err: pino.stdSerializers.err },
    },
    pino.multistream(streams),
  );

  return params.bindings ? logger.child(params.bindings) : logger;
}
