import { Writable } from "node:stream";

import { type LogLevel, LoggerConsole, MemoryTransport } from "../Logger";

/**
 * 測試用 logger：不輸出到終端機，紀錄保存在 transport.records。
 */
export function buildTestLogger(level: LogLevel = "trace") {
  const sink = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
  const transport = new MemoryTransport();
  const logger = new LoggerConsole(level, [transport], {}, {}, {
    output: new console.Console({ stdout: sink, stderr: sink }),
  });
  return { logger, transport, records: transport.records };
}
