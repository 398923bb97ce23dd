import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "INFO" | "WARNING" | "ERROR";

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type CreateFileLoggerOptions = {
  filePath: string;
  now?: () => Date;
};

export const formatLogLine = (date: Date, level: LogLevel, message: string) =>
  `${date.toISOString()} - ${level} - ${message}\n`;

export const createFileLogger = (options: CreateFileLoggerOptions): Logger => {
  const now = options.now ?? (() => new Date());
  mkdirSync(dirname(options.filePath), { recursive: true });

  const write = (level: LogLevel, message: string) => {
    appendFileSync(options.filePath, formatLogLine(now(), level, message), "utf8");
  };

  return {
    info: (message) => write("INFO", message),
    warn: (message) => write("WARNING", message),
    error: (message) => write("ERROR", message),
  };
};

export type MemoryLogger = Logger & {
  readonly entries: ReadonlyArray<{ level: LogLevel; message: string }>;
};

export const createMemoryLogger = (): MemoryLogger => {
  const entries: Array<{ level: LogLevel; message: string }> = [];
  return {
    entries,
    info: (message) => entries.push({ level: "INFO", message }),
    warn: (message) => entries.push({ level: "WARNING", message }),
    error: (message) => entries.push({ level: "ERROR", message }),
  };
};
