import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export type LogWriter = (message: string, meta?: LogMeta) => void;

export interface LogEvent {
  level: keyof Logger;
  message: string;
  meta?: LogMeta;
  timestamp: string;
  prefix?: string;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface CreateLoggerOptions {
  level?: LogLevel;
  prefix?: string;
  writers?: Partial<Record<keyof Logger, LogWriter>>;
  onLog?: (event: LogEvent) => void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const TAGS: Record<keyof Logger, string> = {
  debug: chalk.dim('debug'),
  info: chalk.blue('info'),
  warn: chalk.yellow('warn'),
  error: chalk.red('error'),
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Create a levelled logger. Events below `level` are dropped before they
 * reach writers or `onLog`.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level: LogLevel = options.level ?? 'info';
  const prefix = options.prefix?.trim();
  const consoleRef = globalThis.console;

  const writers: Record<keyof Logger, LogWriter> = {
    debug: options.writers?.debug ?? consoleRef.debug.bind(consoleRef),
    info: options.writers?.info ?? consoleRef.log.bind(consoleRef),
    warn: options.writers?.warn ?? consoleRef.warn.bind(consoleRef),
    error: options.writers?.error ?? consoleRef.error.bind(consoleRef),
  };

  const format = (target: keyof Logger, message: string): string =>
    prefix ? `${TAGS[target]} ${chalk.dim(prefix)} ${message}` : `${TAGS[target]} ${message}`;

  const emit = (target: keyof Logger, message: string, meta?: LogMeta): void => {
    if (RANK[target] < RANK[level]) {
      return;
    }

    options.onLog?.({
      level: target,
      message,
      meta,
      timestamp: new Date().toISOString(),
      prefix,
    });

    if (meta && Object.keys(meta).length > 0) {
      writers[target](format(target, message), meta);
      return;
    }
    writers[target](format(target, message));
  };

  return {
    debug(message, meta) {
      emit('debug', message, meta);
    },
    info(message, meta) {
      emit('info', message, meta);
    },
    warn(message, meta) {
      emit('warn', message, meta);
    },
    error(message, meta) {
      emit('error', message, meta);
    },
  };
}

/**
 * Level from PROMPTWRIGHT_LOG_LEVEL, or `fallback` when unset or unknown.
 */
export function logLevelFromEnv(fallback: LogLevel = 'warn'): LogLevel {
  const value = process.env.PROMPTWRIGHT_LOG_LEVEL?.toLowerCase();
  return isLogLevel(value) ? value : fallback;
}
