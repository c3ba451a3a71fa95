export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogSink = (...args: unknown[]) => void;

const sinkFor = (level: LogLevel): LogSink => {
  switch (level) {
    case 'debug':
      // eslint-disable-next-line no-console
      return console.log;
    case 'info':
      // eslint-disable-next-line no-console
      return console.info;
    case 'warn':
      // eslint-disable-next-line no-console
      return console.warn;
    case 'error':
      // eslint-disable-next-line no-console
      return console.error;
  }
};

export class Logger {
  constructor(private readonly namespace: string, private readonly level: LogLevel = 'info') {}

  static levels = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
  } as const;

  private shouldLog(level: LogLevel) {
    return Logger.levels[level] >= Logger.levels[this.level];
  }

  private emit(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;
    const tag = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.namespace}]`;
    const sink = sinkFor(level);
    if (meta && Object.keys(meta).length > 0) {
      sink(tag, message, meta);
    } else {
      sink(tag, message);
    }
  }

  /** Sub-logger sharing this logger's threshold, namespaced as `parent.name`. */
  child(namespace: string) {
    return new Logger(`${this.namespace}.${namespace}`, this.level);
  }

  debug(message: string, meta?: Record<string, unknown>) { this.emit('debug', message, meta); }
  info(message: string, meta?: Record<string, unknown>) { this.emit('info', message, meta); }
  warn(message: string, meta?: Record<string, unknown>) { this.emit('warn', message, meta); }
  error(message: string, meta?: Record<string, unknown>) { this.emit('error', message, meta); }
}

export const createLogger = (namespace: string, level: LogLevel = 'info') => new Logger(namespace, level);

export const errorMeta = (error: unknown): Record<string, unknown> => ({
  error: error instanceof Error ? error.message : String(error),
  kind: error instanceof Error ? error.name : typeof error,
});
