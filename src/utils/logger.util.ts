import chalk from "chalk";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: Error) => void;
  debug: (msg: string) => void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEBUG_LEVELS = new Set(["debug", "trace"]);

/**
 * Resolve the minimum level from LOG_LEVEL / DEBUG
 */
export const resolveLogLevel = (
  env: NodeJS.ProcessEnv = process.env,
): LogLevel => {
  const read = (key: string): string | undefined =>
    env[key] ?? env[key.toLowerCase()];
  const logLevel = (read("LOG_LEVEL") ?? "").toLowerCase();
  if (read("DEBUG") === "1" || DEBUG_LEVELS.has(logLevel)) {
    return "debug";
  }
  if (logLevel === "warn" || logLevel === "error") {
    return logLevel;
  }
  return "info";
};

export class ConsoleLogger implements Logger {
  private readonly minPriority: number;

  constructor(level: LogLevel = resolveLogLevel()) {
    this.minPriority = LOG_LEVEL_PRIORITY[level];
  }

  info(msg: string): void {
    if (!this.shouldLog("info")) return;
    console.log(chalk.cyan("[INFO]"), msg);
  }

  warn(msg: string): void {
    if (!this.shouldLog("warn")) return;
    console.warn(chalk.yellow("[WARN]"), msg);
  }

  error(msg: string, err?: Error): void {
    console.error(
      chalk.red("[ERROR]"),
      msg,
      err ? `\n${err.stack ?? err.message}` : "",
    );
  }

  debug(msg: string): void {
    if (!this.shouldLog("debug")) return;
    console.debug(chalk.gray("[DEBUG]"), msg);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= this.minPriority;
  }
}
