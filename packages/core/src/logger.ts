import type { LogLevel } from '@lla-docs/shared';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: line => console.log(line),
  err: line => console.error(line),
};

export function createLogger(level: LogLevel = 'info', sink: LogSink = consoleSink): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];

  return {
    debug: message => { if (enabled('debug')) sink.out(message); },
    info: message => { if (enabled('info')) sink.out(message); },
    warn: message => { if (enabled('warn')) sink.err(`Warning: ${message}`); },
    error: message => { if (enabled('error')) sink.err(message); },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
