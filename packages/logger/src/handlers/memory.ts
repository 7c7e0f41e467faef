import type { LogHandler, LogLevelName, LogRecord } from '../index.js';

export class MemoryHandler implements LogHandler {
  logs: LogRecord[] = [];

  log(record: LogRecord): void {
    this.logs.push(record);
  }

  messages(level?: LogLevelName): string[] {
    return this.logs
      .filter((record) => !level || record.level === level)
      .map((record) => record.message);
  }

  clear() {
    this.logs = [];
  }
}
