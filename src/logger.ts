import { config, type LogLevelName } from './config.js';

enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVELS: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

/** Where finished lines go. Errors are split out so they reach stderr. */
export interface LogWriter {
  out(line: string): void;
  err(line: string): void;
}

const consoleWriter: LogWriter = {
  out: line => console.log(line),
  err: line => console.error(line),
};

function replaceUnserializable(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
}

/**
 * One JSON object per line, tagged with the instance so lines from several
 * bots sharing a queue can be told apart.
 */
class JsonLogger implements Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly instance: string,
    private readonly writer: LogWriter
  ) {}

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (level < this.level) {return;}

    const line = JSON.stringify(
      {
        timestamp: new Date().toISOString(),
        level: LogLevel[level],
        instance: this.instance,
        message,
        ...meta,
      },
      replaceUnserializable
    );

    if (level >= LogLevel.ERROR) {
      this.writer.err(line);
    } else {
      this.writer.out(line);
    }
  }

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log(LogLevel.ERROR, message, meta);
  }
}

export function createLogger(
  level: LogLevelName,
  instance: string,
  writer: LogWriter = consoleWriter
): Logger {
  return new JsonLogger(LOG_LEVELS[level], instance, writer);
}

export const logger = createLogger(config.logLevel, config.instanceId);
