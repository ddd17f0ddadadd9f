/**
 * Prefixed stderr logging. stdout is reserved for command results.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogSink {
  write(chunk: string): unknown;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  scope?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.DIFFPROBE_LOG_LEVEL?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? levelFromEnv();
  const sink = options.sink ?? process.stderr;
  const prefix = options.scope ? `[diffprobe:${options.scope}]` : '[diffprobe]';

  const emit = (
    at: LogLevel,
    message: string,
    details?: Record<string, unknown>
  ): void => {
    if (LEVEL_ORDER[at] < LEVEL_ORDER[level]) return;
    const tag = at === 'info' ? '' : ` ${at}:`;
    const suffix = details ? ` ${JSON.stringify(details)}` : '';
    sink.write(`${prefix}${tag} ${message}${suffix}\n`);
  };

  return {
    level,
    debug: (message, details) => emit('debug', message, details),
    info: (message, details) => emit('info', message, details),
    warn: (message, details) => emit('warn', message, details),
    error: (message, details) => emit('error', message, details),
    child: (scope) =>
      createLogger({
        level,
        sink,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      }),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
