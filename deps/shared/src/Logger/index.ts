import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envBoolean } from "../ConfigFactory";

import type { EmojiMap, LogLevel, Logger } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";

export * from "./Logger";
export { LoggerConsole, serializeError } from "./LoggerConsole";
export { MemoryTransport } from "./MemoryTransport";

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  skip: "⏭️",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

export const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      [
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ],
      { default: "info" }
    ),
    LOG_EMOJI: envBoolean({ default: "true" }),
  })
);

/**
 * 依環境變數建立 logger。輸出一律走 stderr，stdout 留給指令結果。
 */
export function createDefaultLoggerFromEnv(
  options: { level?: LogLevel; output?: Console } = {}
): Logger {
  const { LOG_LEVEL, LOG_EMOJI } = getLoggerConfig();
  return new LoggerConsole(options.level ?? LOG_LEVEL, [], {}, defaultEmojiMap, {
    output:
      options.output ??
      new console.Console({ stdout: process.stderr, stderr: process.stderr }),
    showEmoji: LOG_EMOJI,
  });
}
