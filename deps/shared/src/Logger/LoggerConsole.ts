import kleur from "kleur";

import type {
  EmojiMap,
  LogContext,
  LogLevel,
  LogMethod,
  LogRecord,
  LogTransport,
  Logger,
  SerializedError,
  TemplateLogger,
} from "./Logger";

const levelWeight: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

export type LoggerConsoleOptions = {
  path?: string[];
  /** 預設為全域 console；CLI 會改成寫到 stderr 的 Console */
  output?: Console;
  showEmoji?: boolean;
};

export class LoggerConsole implements Logger {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  private readonly path: string[];
  private readonly output: Console;
  private readonly showEmoji: boolean;

  constructor(
    private readonly level: LogLevel,
    private readonly transports: LogTransport[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly options: LoggerConsoleOptions = {}
  ) {
    this.path = options.path ?? [];
    this.output = options.output ?? console;
    this.showEmoji = options.showEmoji ?? true;
    this.trace = this.method("trace");
    this.debug = this.method("debug");
    this.info = this.method("info");
    this.warn = this.method("warn");
    this.error = this.method("error");
  }

  extend(namespace: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      { ...this.options, path: [...this.path, namespace] }
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      this.options
    );
  }

  withLevel(level: LogLevel): LoggerConsole {
    return new LoggerConsole(
      level,
      this.transports,
      this.context,
      this.emojiMap,
      this.options
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  isLevelEnabled(level: LogLevel) {
    return levelWeight[level] >= levelWeight[this.level];
  }

  private method(level: LogLevel): LogMethod {
    const write = (context: LogContext, message: string, plain?: string) =>
      this.write(level, context, message, plain);

    function log(message: string): void;
    function log(context: LogContext, message: string): void;
    function log(context?: LogContext): TemplateLogger;
    function log(
      contextOrMessage?: LogContext | string,
      message?: string
    ): TemplateLogger | void {
      if (typeof contextOrMessage === "string") {
        write({}, contextOrMessage);
        return;
      }
      const context = contextOrMessage ?? {};
      if (message !== undefined) {
        write(context, message);
        return;
      }
      return (strings, ...values) => {
        const { text, plain, captured } = renderTemplate(strings, values);
        write({ ...context, ...captured }, text, plain);
      };
    }

    return log;
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    message: string,
    plainMessage: string = message
  ) {
    if (!this.isLevelEnabled(level)) return;

    const { event, emoji, error, ...rest } = { ...this.context, ...callContext };
    const label = [...this.path, event ?? level].join(":");
    const err = error === undefined ? undefined : serializeError(error);
    const extra = Object.keys(rest).length > 0 ? ` ${safeStringify(rest)}` : "";
    const icon = this.resolveEmoji(level, callContext.emoji, event, emoji);
    const head = this.showEmoji && icon ? `${icon} ${label}` : label;
    const time = kleur.gray(new Date().toISOString());
    const line = `${time} ${head}: ${message}${extra}`;

    const print = consoleMethod(this.output, level);
    print(line);
    if (err) print(err.stack ?? `${err.name}: ${err.message}`);

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      level,
      time: new Date(),
      path: [...this.path],
      event,
      emoji: icon,
      msg: plainMessage,
      context: rest,
      err,
    };
    for (const transport of this.transports) transport.write(record);
  }

  /**
   * emoji 優先順序：呼叫時指定 > 事件對應 > extend 時繼承（僅 warn 以下）> 等級對應
   */
  private resolveEmoji(
    level: LogLevel,
    callEmoji: string | undefined,
    event: string | undefined,
    inherited: string | undefined
  ): string | undefined {
    if (callEmoji) return callEmoji;
    if (event && this.emojiMap[event]) {
      return this.emojiMap[event];
    }
    if (inherited && levelWeight[level] < levelWeight.warn) {
      return inherited;
    }
    return this.emojiMap[level];
  }
}

function renderTemplate(strings: TemplateStringsArray, values: unknown[]) {
  let text = "";
  let plain = "";
  const captured: Record<string, unknown> = {};
  strings.forEach((part, i) => {
    text += part;
    plain += part;
    if (i < values.length) {
      const value = values[i];
      text += kleur.green(String(value));
      plain += String(value);
      captured[`__${i}`] = value;
    }
  });
  return { text, plain, captured };
}

function consoleMethod(output: Console, level: LogLevel) {
  switch (level) {
    case "trace":
    case "debug":
      return (line: string) => output.debug(line);
    case "info":
      return (line: string) => output.info(line);
    case "warn":
      return (line: string) => output.warn(line);
    case "error":
      return (line: string) => output.error(line);
  }
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const code =
      "code" in error && typeof error.code === "string" ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      code,
    };
  }
  return { name: "NonError", message: String(error) };
}

function safeStringify(value: Record<string, unknown>) {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v
    );
  } catch {
    return "[unserializable context]";
  }
}
