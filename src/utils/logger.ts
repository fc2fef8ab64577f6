/**
 * Console logging with a bracketed module prefix, e.g. `[Dispatcher] slot 3 drained`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

class ConsoleSink implements LogSink {
  write(e: LogEntry): void {
    const msg = e.data ? `[${e.module}] ${e.message} ${JSON.stringify(e.data)}` : `[${e.module}] ${e.message}`;
    if (e.level === 'error') console.error(msg);
    else if (e.level === 'warn') console.warn(msg);
    else console.log(msg);
  }
}

/** Collects entries in memory; used by tests. */
export class CaptureSink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(e: LogEntry): void {
    this.entries.push(e);
  }

  clear(): void {
    this.entries.length = 0;
  }

  byLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }
}

let activeSink: LogSink = new ConsoleSink();
let minLevel: LogLevel = 'info';

export function setLogSink(sink: LogSink): void {
  activeSink = sink;
}

export function resetLogSink(): void {
  activeSink = new ConsoleSink();
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function createLogger(module: string): Logger {
  const log = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    activeSink.write({ level, module, message, data });
  };
  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
  };
}
