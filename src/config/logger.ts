export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_NAMES: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR",
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "info":
      return "info";
    case "warn":
    case "warning":
      return "warn";
    case "error":
      return "error";
    default:
      return undefined;
  }
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function formatRecord(level: LogLevel, message: string, fields?: LogFields): string {
  const suffix = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
  return `[${LEVEL_NAMES[level]}] ${message}${suffix}`;
}

// Errors go to stderr, everything else to stdout
function write(level: LogLevel, message: string, fields?: LogFields): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) {
    return;
  }

  const stream = level === "error" ? process.stderr : process.stdout;
  stream.write(formatRecord(level, message, fields) + "\n");
}

export function debug(message: string, fields?: LogFields): void {
  write("debug", message, fields);
}

export function info(message: string, fields?: LogFields): void {
  write("info", message, fields);
}

export function warn(message: string, fields?: LogFields): void {
  write("warn", message, fields);
}

export function error(message: string, fields?: LogFields): void {
  write("error", message, fields);
}
