export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface ModuleLogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string | Error, meta?: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const noopLogger: ModuleLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

export interface ConsoleLoggerOptions {
  prefix?: string;
  level?: LogLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ModuleLogger {
  const base = options.prefix ? `[${options.prefix}]` : undefined;
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;
  const format = (message: string) => (base ? `${base} ${message}` : message);

  return {
    debug(message, meta) {
      if (enabled('debug')) {
        console.debug(format(message), meta ?? '');
      }
    },
    info(message, meta) {
      if (enabled('info')) {
        console.info(format(message), meta ?? '');
      }
    },
    warn(message, meta) {
      if (enabled('warn')) {
        console.warn(format(message), meta ?? '');
      }
    },
    error(message, meta) {
      if (message instanceof Error) {
        console.error(format(message.message), meta ?? '', message);
      } else {
        console.error(format(message), meta ?? '');
      }
    }
  } satisfies ModuleLogger;
}

/** Returns a logger that merges `context` into the meta of every entry. */
export function withLogContext(logger: ModuleLogger, context: LogMeta): ModuleLogger {
  const merge = (meta?: LogMeta): LogMeta => ({ ...context, ...meta });
  return {
    debug: (message, meta) => logger.debug(message, merge(meta)),
    info: (message, meta) => logger.info(message, merge(meta)),
    warn: (message, meta) => logger.warn(message, merge(meta)),
    error: (message, meta) => logger.error(message, merge(meta))
  };
}
