/**
 * Human-readable log formats for development.
 *
 * - compact: one line, `TIME LEVEL [component] event key=value ...`
 * - hybrid: event on the first line, key=value pairs indented below
 * - minimal: seconds and event only, then the pairs
 */

export type LogFormat = "compact" | "hybrid" | "minimal";

export interface LogObject {
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

function formatTime(time: number | string): string {
  return new Date(time).toISOString().substring(11, 23); // HH:MM:SS.mmm
}

function formatTimeMinimal(time: number | string): string {
  return new Date(time).toISOString().substring(17, 23); // SS.mmm
}

function formatValue(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

function splitLog(log: LogObject): { event: string; data: Record<string, unknown> } {
  const { level: _level, time: _time, msg, component: _component, event, ...data } = log;
  return { event: event || msg || "", data };
}

function formatPairs(data: Record<string, unknown>): string {
  return Object.entries(data)
    .map(([key, value]) => `${colors.yellow}${key}${colors.reset}=${colors.green}${formatValue(value)}${colors.reset}`)
    .join(" ");
}

function header(log: LogObject): string {
  const level = levelNames[log.level] || "UNKNOWN";
  return `${colors.dim}${formatTime(log.time)} ${level.padEnd(5)} [${log.component || "linewise"}]${colors.reset}`;
}

export function formatCompact(log: LogObject): string {
  const { event, data } = splitLog(log);
  const pairs = formatPairs(data);
  return `${header(log)} ${colors.cyan}${event}${colors.reset}${pairs ? ` ${pairs}` : ""}`;
}

export function formatHybrid(log: LogObject): string {
  const { event, data } = splitLog(log);
  const firstLine = `${header(log)} ${colors.cyan}${event}${colors.reset}`;
  const pairs = formatPairs(data);
  return pairs ? `${firstLine}\n  ${pairs}` : firstLine;
}

export function formatMinimal(log: LogObject): string {
  const { event, data } = splitLog(log);
  const pairs = formatPairs(data);
  return `${colors.dim}${formatTimeMinimal(log.time)}${colors.reset} ${colors.cyan}${event}${colors.reset}${pairs ? ` ${pairs}` : ""}`;
}

export function getFormatter(format: LogFormat): (log: LogObject) => string {
  switch (format) {
    case "hybrid":
      return formatHybrid;
    case "minimal":
      return formatMinimal;
    default:
      return formatCompact;
  }
}

function isLogObject(value: unknown): value is LogObject {
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
 * Pino destination that reformats each JSON line and writes it to `out`
 * (stderr by default). Level filtering is left to pino.
 */
export function createFormatterStream(
  format: LogFormat,
  out: { write(text: string): unknown } = process.stderr,
): { write(chunk: string): void } {
  const formatter = getFormatter(format);

  return {
    write(chunk: string) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(chunk);
      } catch {
        out.write(chunk);
        return;
      }
      out.write(isLogObject(parsed) ? `${formatter(parsed)}\n` : chunk);
    },
  };
}
