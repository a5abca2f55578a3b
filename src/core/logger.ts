export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const prefix = options.prefix ?? "geotool";

  const write = (level: Exclude<LogLevel, "silent">, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = `[${prefix}] ${message}`;
    const args: unknown[] = data ? [line, data] : [line];
    switch (level) {
      case "debug":
        console.debug(...args);
        break;
      case "info":
        console.info(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "error":
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
}

export const silentLogger: Logger = createConsoleLogger({ level: "silent" });

export const defaultLogger: Logger = createConsoleLogger();
