export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

function format(tag: string, msg: string, extra?: Record<string, unknown>): string {
  return extra ? `[${tag}] ${msg} ${JSON.stringify(extra)}` : `[${tag}] ${msg}`;
}

/** Console logger that prefixes every line with `[tag]`. */
export function createLogger(tag: string): Logger {
  return {
    debug: (msg, extra) => {
      if (enabled('debug')) console.debug(format(tag, msg, extra));
    },
    info: (msg, extra) => {
      if (enabled('info')) console.log(format(tag, msg, extra));
    },
    warn: (msg, extra) => {
      if (enabled('warn')) console.warn(format(tag, msg, extra));
    },
    error: (msg, extra) => {
      if (enabled('error')) console.error(format(tag, msg, extra));
    },
  };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
