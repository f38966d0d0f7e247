// =============================================================================
// Tagged console logger
//
// Created once per process from configuration and handed to each component.
// Lines look like `[Transport] GET /api/flight-tracks -> 200 (retries=0)`.
// =============================================================================

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

export type Logger = {
  readonly level: LogLevel;
  readonly tag: string;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(tag: string): Logger;
  /** Lines the sink failed to accept. */
  dropped(): number;
};

export type LoggerOptions = {
  level?: LogLevel;
  tag?: string;
  sink?: LogSink;
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const sink = options.sink ?? console;
  const counter = { dropped: 0 };
  return buildLogger(options.tag ?? 'App', level, sink, counter);
}

function buildLogger(
  tag: string,
  level: LogLevel,
  sink: LogSink,
  counter: { dropped: number },
): Logger {
  const threshold = LEVEL_RANK[level];

  function emit(lineLevel: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
    if (LEVEL_RANK[lineLevel] < threshold) return;
    const line = `[${tag}] ${message}`;
    try {
      switch (lineLevel) {
        case 'debug': sink.debug(line, ...args); break;
        case 'info': sink.log(line, ...args); break;
        case 'warn': sink.warn(line, ...args); break;
        case 'error': sink.error(line, ...args); break;
      }
    } catch {
      counter.dropped++;
    }
  }

  return {
    level,
    tag,
    debug: (message, ...args) => emit('debug', message, args),
    info: (message, ...args) => emit('info', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    error: (message, ...args) => emit('error', message, args),
    child: (childTag) => buildLogger(childTag, level, sink, counter),
    dropped: () => counter.dropped,
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
