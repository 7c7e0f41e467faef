import type { LogRecord, LogHandler } from '../index.js';

export type LogFormatter = (record: LogRecord) => unknown[];

const defaultFormatter: LogFormatter = (record) => {
  const prefix = record.context
    ? `[${record.level}] [${record.context}]`
    : `[${record.level}]`;
  return record.attributes
    ? [prefix, record.message, record.attributes]
    : [prefix, record.message];
};

export class ConsoleHandler implements LogHandler {
  constructor(options: { formatter?: LogFormatter } = {}) {
    this.formatter = options.formatter ?? defaultFormatter;
  }

  private formatter: LogFormatter;

  log(record: LogRecord): void {
    const { level } = record;
    const logArgs = this.formatter(record);
    if (level === 'ERROR' || level === 'FATAL') {
      console.error(...logArgs);
    } else if (level === 'WARN') {
      console.warn(...logArgs);
    } else if (level === 'INFO') {
      console.info(...logArgs);
    } else if (level === 'DEBUG') {
      console.debug(...logArgs);
    } else {
      // TRACE
      console.log(...logArgs);
    }
  }
}
