export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

export type LogContext = {
  /** 事件名稱，會接在 namespace 之後顯示 */
  event?: string;
  /** 覆寫此筆紀錄的 emoji */
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLogger = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLogger;
}

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
  code?: string;
};

export type LogRecord = {
  level: LogLevel;
  time: Date;
  path: string[];
  event?: string;
  emoji?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: SerializedError;
};

export interface LogTransport {
  write(record: LogRecord): void;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 建立子 logger，namespace 以 `:` 串接 */
  extend(namespace: string, context?: LogContext): Logger;
  /** 合併 context，不改變 namespace */
  append(context: LogContext): Logger;
  withLevel(level: LogLevel): Logger;
  isLevelEnabled(level: LogLevel): boolean;
}

export type EmojiMap = Partial<Record<LogLevel | string, string>>;
