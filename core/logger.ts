import chalk from "chalk";

type LogLevel = "debug" | "info" | "success" | "warn" | "error";

interface LogOptions {
  scope?: string;
  data?: unknown;
}

interface Logger {
  debug: (message: string, options?: LogOptions) => void;
  success: (message: string, options?: LogOptions) => void;
  info: (message: string, options?: LogOptions) => void;
  warn: (message: string, options?: LogOptions) => void;
  error: (message: string, options?: LogOptions) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  success: 20,
  warn: 30,
  error: 40,
};

const resolveThreshold = (): number => {
  const raw = process.env.AUTOPR_LOG_LEVEL?.trim().toLowerCase();
  if (raw === "silent") {
    return Number.POSITIVE_INFINITY;
  }
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return LEVEL_ORDER[raw];
  }
  return LEVEL_ORDER.info;
};

const formatData = (data: unknown): string => {
  if (data === undefined) {
    return "";
  }
  if (data instanceof Error) {
    return data.stack ?? data.message;
  }
  if (typeof data === "string") {
    return data;
  }
  if (typeof data === "number" || typeof data === "boolean") {
    return String(data);
  }
  try {
    return JSON.stringify(data, null, 2);
  } catch {
    return "Unable to serialize log data.";
  }
};

const formatScope = (scope?: string) =>
  scope ? ` ${chalk.gray(`[${scope}]`)}` : "";

const withData = (base: string, data: string, color?: (value: string) => string) => {
  if (data.length === 0) {
    return base;
  }
  return `${base}\n${color ? color(data) : data}`;
};

const formatLine = (
  level: LogLevel,
  message: string,
  options?: LogOptions
): string => {
  const timestamp = chalk.gray(new Date().toLocaleString());
  const scope = formatScope(options?.scope);
  const data = formatData(options?.data);

  switch (level) {
    case "success":
      return withData(
        `${timestamp} ${chalk.greenBright("SUCCESS")}${scope} ${message}`,
        data
      );
    case "warn":
      return withData(
        `${timestamp} ${chalk.yellowBright(`WARN${options?.scope ? ` [${options.scope}]` : ""} ${message}`)}`,
        data,
        chalk.yellowBright
      );
    case "error":
      return withData(
        `${timestamp} ${chalk.redBright("ERROR")}${scope} ${message}`,
        data
      );
    case "debug":
      return withData(`${timestamp} ${chalk.dim("DEBUG")}${scope} ${chalk.dim(message)}`, data);
    case "info":
      return withData(`${timestamp}${scope} ${message}`, data);
  }
};

const writeLog = (level: LogLevel, message: string, options?: LogOptions) => {
  if (LEVEL_ORDER[level] < resolveThreshold()) {
    return;
  }
  const line = formatLine(level, message, options);
  if (level === "warn") {
    console.warn(line);
    return;
  }
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
};

export const logger: Logger = {
  debug: (message, options) => writeLog("debug", message, options),
  success: (message, options) => writeLog("success", message, options),
  info: (message, options) => writeLog("info", message, options),
  warn: (message, options) => writeLog("warn", message, options),
  error: (message, options) => writeLog("error", message, options),
};

/** Logger bound to a fixed scope; explicit `scope` options still win. */
export const createScopedLogger = (scope: string): Logger => ({
  debug: (message, options) => logger.debug(message, { scope, ...options }),
  success: (message, options) => logger.success(message, { scope, ...options }),
  info: (message, options) => logger.info(message, { scope, ...options }),
  warn: (message, options) => logger.warn(message, { scope, ...options }),
  error: (message, options) => logger.error(message, { scope, ...options }),
});

export type { LogLevel, LogOptions, Logger };
