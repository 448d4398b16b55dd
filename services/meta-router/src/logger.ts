// ============================================================================
// Structured logger
// One JSON line per event, filtered by level
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFn = (
  level: LogLevel,
  event: string,
  data?: Record<string, unknown>
) => void;

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export function createLogger(
  service: string,
  minLevel: LogLevel = "info",
  write: (line: string) => void = (line) => console.log(line)
): LogFn {
  return (level, event, data) => {
    if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return;

    const entry = {
      level,
      service,
      event,
      ts: new Date().toISOString(),
      ...data,
    };
    write(JSON.stringify(entry));
  };
}

export const silentLog: LogFn = () => undefined;
