/**
 * Custom log formatters for readable development output.
 *
 * - compact: one line per record
 * - hybrid: event on the first line, fields indented on the second
 * - minimal: seconds-only timestamp, event and fields
 */

export type LogFormat = "compact" | "hybrid" | "minimal";

export interface LogRecord {
  level: number;
  time: number | string;
  msg?: string;
  component?: string;
  event?: string;
  [key: string]: unknown;
}

const colors = {
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  reset: "\x1b[0m",
};

const levelNames: Record<number, string> = {
  10: "TRACE",
  20: "DEBUG",
  30: "INFO",
  40: "WARN",
  50: "ERROR",
  60: "FATAL",
};

const levelValues: Record<string, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Number.POSITIVE_INFINITY,
};

function formatTime(time: number | string, minimal: boolean): string {
  const iso = new Date(time).toISOString();
  // HH:MM:SS.mmm or SS.mmm
  return minimal ? iso.substring(17, 23) : iso.substring(11, 23);
}

function formatValue(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

function splitRecord(log: LogRecord): { event: string | undefined; fields: string[] } {
  const { level: _level, time: _time, msg, component: _component, event, ...data } = log;
  const fields = Object.entries(data).map(
    ([key, value]) => `${colors.yellow}${key}${colors.reset}=${colors.green}${formatValue(value)}${colors.reset}`,
  );
  return { event: event ?? msg, fields };
}

function header(log: LogRecord): string {
  const level = levelNames[log.level] ?? "UNKNOWN";
  return `${colors.dim}${formatTime(log.time, false)} ${level.padEnd(5)} [${log.component ?? "app"}]${colors.reset}`;
}

export function formatCompact(log: LogRecord): string {
  const { event, fields } = splitRecord(log);
  const eventStr = event ? ` ${colors.cyan}${event}${colors.reset}` : "";
  const details = fields.length > 0 ? ` ${fields.join(" ")}` : "";
  return `${header(log)}${eventStr}${details}`;
}

export function formatHybrid(log: LogRecord): string {
  const { event, fields } = splitRecord(log);
  const firstLine = `${header(log)} ${colors.cyan}${event ?? ""}${colors.reset}`;
  return fields.length === 0 ? firstLine : `${firstLine}\n  ${fields.join(" ")}`;
}

export function formatMinimal(log: LogRecord): string {
  const { event, fields } = splitRecord(log);
  const eventStr = event ? ` ${colors.cyan}${event}${colors.reset}` : "";
  const details = fields.length > 0 ? ` ${fields.join(" ")}` : "";
  return `${colors.dim}${formatTime(log.time, true)}${colors.reset}${eventStr}${details}`;
}

export function getFormatter(format: LogFormat): (log: LogRecord) => string {
  switch (format) {
    case "hybrid":
      return formatHybrid;
    case "minimal":
      return formatMinimal;
    default:
      return formatCompact;
  }
}

function isLogRecord(value: unknown): value is LogRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number" &&
    "time" in value &&
    (typeof value.time === "number" || typeof value.time === "string")
  );
}

/**
 * Pino destination that renders records with one of the formatters above.
 * LOG_LEVEL is re-read per record so tests can silence output after import.
 */
export function createFormatterStream(format: LogFormat, out: NodeJS.WritableStream = process.stdout) {
  const formatter = getFormatter(format);

  return {
    write(chunk: string) {
      const configuredLevel = process.env.LOG_LEVEL || "info";
      const threshold = levelValues[configuredLevel] ?? 30;

      let parsed: unknown;
      try {
        parsed = JSON.parse(chunk);
      } catch {
        out.write(chunk);
        return;
      }

      if (!isLogRecord(parsed)) {
        out.write(chunk);
        return;
      }
      if (parsed.level < threshold) return;

      out.write(`${formatter(parsed)}\n`);
    },
  };
}
