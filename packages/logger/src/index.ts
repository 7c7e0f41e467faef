export const LOG_LEVELS = [
  'TRACE', // 1-4
  'DEBUG', // 5-8
  'INFO', // 9-12
  'WARN', // 13-16
  'ERROR', // 17-20
  'FATAL', // 21-24
] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

export type LogAttributes = Record<string, unknown>;

export const logLevelNumberToLevelName = (number: number): LogLevelName => {
  if (number < 5) return 'TRACE';
  if (number < 9) return 'DEBUG';
  if (number < 13) return 'INFO';
  if (number < 17) return 'WARN';
  if (number < 21) return 'ERROR';
  return 'FATAL';
};

export const logLevelRank = (level: LogLevelName): number =>
  LOG_LEVELS.indexOf(level);

/***************************************
 * LOG RECORD INTERFACE
 ***************************************/
export interface LogRecord {
  level: LogLevelName;
  message: string;
  timestamp: number; // Date.now()
  context?: string; // e.g. "map2d"
  attributes?: LogAttributes;
  resource?: LogAttributes;
}

export interface LogHandler {
  /**
   * Handles a single LogRecord. For example, writing to console or keeping it
   * in memory for later inspection.
   */
  log(record: LogRecord): void;
}

export interface LoggerOptions {
  /**
   * Records below this level are dropped before they reach any handler.
   */
  minLevel?: LogLevelName;
  resourceAttributes?: LogAttributes;
}

/***************************************
 * LOGGER CLASS
 ***************************************/
export class Logger {
  private handlers: LogHandler[];
  private loggerContext?: string;
  private resourceAttributes: LogAttributes;
  // Shared with child loggers, like the handlers array
  private levelState: { minLevel: LogLevelName };
  exclusiveHandlerMode: boolean = false;

  constructor(handlers?: LogHandler[], options?: LoggerOptions) {
    this.handlers = handlers ?? [];

    // Resource attributes allow you to specify
    // things like service.name, service.version, etc.
    this.resourceAttributes = options?.resourceAttributes ?? {};
    this.levelState = { minLevel: options?.minLevel ?? 'TRACE' };
  }

  registerHandler(
    handler: LogHandler,
    options?: { exclusive?: boolean }
  ): boolean {
    if (this.exclusiveHandlerMode) {
      return false;
    }
    this.handlers.push(handler);
    if (options?.exclusive) {
      this.exclusiveHandlerMode = true;
    }
    return true;
  }

  /**
   * Applies to this logger, the logger it was created from and every logger
   * created through `context()` in the same family, whenever they were made.
   */
  setMinLevel(level: LogLevelName) {
    this.levelState.minLevel = level;
  }

  isLevelEnabled(level: LogLevelName): boolean {
    return logLevelRank(level) >= logLevelRank(this.levelState.minLevel);
  }

  /**
   * Create a new Logger that has a given context.
   * Handlers and the minimum level are shared with the parent, so changes made
   * later on either logger reach both.
   */
  context(context: string): Logger {
    const childLogger = new Logger(this.handlers, {
      resourceAttributes: this.resourceAttributes,
    });
    childLogger.levelState = this.levelState;
    childLogger.loggerContext = context;
    return childLogger;
  }

  /**
   * Catch all internal log method to dispatch to log handlers
   */
  _log(level: LogLevelName, message: string, attributes?: LogAttributes) {
    if (!this.isLevelEnabled(level)) return;
    const record: LogRecord = {
      level,
      message,
      timestamp: Date.now(),
      context: this.loggerContext,
      attributes,
      resource: this.resourceAttributes,
    };

    for (const handler of this.handlers) {
      handler.log(record);
    }
  }

  trace(message: string, attributes?: LogAttributes) {
    this._log('TRACE', message, attributes);
  }

  debug(message: string, attributes?: LogAttributes) {
    this._log('DEBUG', message, attributes);
  }

  // Using `info` is preferred
  log(message: string, attributes?: LogAttributes) {
    this.info(message, attributes);
  }

  info(message: string, attributes?: LogAttributes) {
    this._log('INFO', message, attributes);
  }

  warn(message: string, attributes?: LogAttributes) {
    this._log('WARN', message, attributes);
  }

  error(message: string, attributes?: LogAttributes) {
    this._log('ERROR', message, attributes);
  }

  fatal(message: string, attributes?: LogAttributes) {
    this._log('FATAL', message, attributes);
  }
}

export const logger = new Logger();

export { ConsoleHandler } from './handlers/console.js';
export { MemoryHandler } from './handlers/memory.js';
export { NullHandler } from './handlers/null.js';
