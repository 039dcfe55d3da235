import type { LogRecord, LogTransport } from "./Logger";

export class MemoryTransport implements LogTransport {
  readonly records: LogRecord[] = [];

  write(record: LogRecord) {
    this.records.push(record);
  }

  clear() {
    this.records.length = 0;
  }
}
