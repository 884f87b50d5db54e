export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export type LogContext = Record<string, unknown>;

let silent = false;
let level = LogLevel.INFO;

function format(tag: string, msg: string, ctx?: LogContext): string {
  return `[${new Date().toISOString()}] [${tag}] ${msg}${ctx ? ` ${JSON.stringify(ctx)}` : ''}`;
}

export const logger = {
  error: (msg: string, ctx?: LogContext) => {
    if (!silent && level >= LogLevel.ERROR) {
      console.error(format('ERROR', msg, ctx));
    }
  },

  warn: (msg: string, ctx?: LogContext) => {
    if (!silent && level >= LogLevel.WARN) {
      console.warn(format('WARN', msg, ctx));
    }
  },

  info: (msg: string, ctx?: LogContext) => {
    if (!silent && level >= LogLevel.INFO) {
      console.log(format('INFO', msg, ctx));
    }
  },

  debug: (msg: string, ctx?: LogContext) => {
    if (!silent && level >= LogLevel.DEBUG) {
      console.log(format('DEBUG', msg, ctx));
    }
  },

  operation: async <T>(op: string, fn: () => Promise<T>): Promise<T> => {
    const start = Date.now();
    try {
      const result = await fn();
      logger.debug(`${op} completed`, { duration: Date.now() - start });
      return result;
    } catch (error) {
      logger.error(`${op} failed`, { duration: Date.now() - start });
      throw error;
    }
  }
};

export function configureLogger(options: { level?: LogLevel; silent?: boolean }): void {
  if (options.level !== undefined) level = options.level;
  if (options.silent !== undefined) silent = options.silent;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toLowerCase()) {
    case 'error': return LogLevel.ERROR;
    case 'warn': return LogLevel.WARN;
    case 'info': return LogLevel.INFO;
    case 'debug': return LogLevel.DEBUG;
    default: return undefined;
  }
}
