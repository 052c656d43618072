import { pino, type Logger as PinoLogger, type LoggerOptions as PinoOptions } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Route output through pino-pretty (development only) */
  pretty?: boolean;
  /** Stream log lines are written to (default: stdout) */
  destination?: LogDestination;
}

export type LogDestination = 'stdout' | 'stderr';

/**
 * Logger wrapper for scopeset
 */
export class Logger {
  private pino: PinoLogger;

  constructor(options: LoggerOptions = {}) {
    const pinoOptions: PinoOptions = {
      name: options.name ?? 'scopeset',
      level: options.level ?? 'info',
    };
    if (options.pretty) {
      pinoOptions.transport = {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: options.destination === 'stderr' ? 2 : 1,
        },
      };
      this.pino = pino(pinoOptions);
    } else if (options.destination === 'stderr') {
      this.pino = pino(pinoOptions, process.stderr);
    } else {
      this.pino = pino(pinoOptions);
    }
  }

  get level(): string {
    return this.pino.level;
  }

  debug(message: string, data?: unknown): void {
    if (data) {
      this.pino.debug(data, message);
    } else {
      this.pino.debug(message);
    }
  }

  info(message: string, data?: unknown): void {
    if (data) {
      this.pino.info(data, message);
    } else {
      this.pino.info(message);
    }
  }

  warn(message: string, data?: unknown): void {
    if (data) {
      this.pino.warn(data, message);
    } else {
      this.pino.warn(message);
    }
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, message);
    } else if (error) {
      this.pino.error(error, message);
    } else {
      this.pino.error(message);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger({ level: 'silent' });
    child.pino = this.pino.child(bindings);
    return child;
  }
}

// Default logger instance
export const logger = new Logger();
