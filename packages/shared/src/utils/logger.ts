/**
 * Structured JSON logger for code that runs outside the API process
 * (the command-line surface and shared helpers).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  child(namespace: string): Logger;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LogSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

const processSink: LogSink = {
  stdout: line => process.stdout.write(line + '\n'),
  stderr: line => process.stderr.write(line + '\n'),
};

class FlakeLensLogger implements Logger {
  constructor(
    private readonly namespace: string,
    private readonly logLevel: LogLevel,
    private readonly sink: LogSink
  ) {}

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVELS[level] >= LEVELS[this.logLevel];
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext, error?: Error): string {
    const baseLog: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level: level.toUpperCase(),
      namespace: this.namespace,
      message,
      ...context,
    };

    if (error) {
      baseLog.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return JSON.stringify(baseLog);
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) {return;}
    this.sink.stdout(this.formatMessage('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) {return;}
    this.sink.stdout(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) {return;}
    this.sink.stderr(this.formatMessage('warn', message, context));
  }

  error(message: string, error?: Error, context?: LogContext): void {
    if (!this.shouldLog('error')) {return;}
    this.sink.stderr(this.formatMessage('error', message, context, error));
  }

  child(namespace: string): Logger {
    return new FlakeLensLogger(`${this.namespace}:${namespace}`, this.logLevel, this.sink);
  }
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVELS;
}

/**
 * Creates a logger instance for the given namespace
 */
export function createLogger(
  namespace: string,
  options: { level?: LogLevel; sink?: LogSink } = {}
): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  return new FlakeLensLogger(namespace, level, options.sink ?? processSink);
}

export const logger = createLogger('flakelens');
