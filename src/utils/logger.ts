// Utility: Structured logger
// One JSON line per record; session records carry their session id

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, string | number | boolean | undefined>;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * LOG_LEVEL wins; otherwise debug in development, info in production.
 * Nothing is written under NODE_ENV=test.
 */
export function thresholdFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel | 'silent' {
  if (env.NODE_ENV === 'test') {
    return 'silent';
  }
  if (isLogLevel(env.LOG_LEVEL)) {
    return env.LOG_LEVEL;
  }
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

export class Logger {
  constructor(
    private readonly component: string,
    private readonly bound: LogContext = {},
    private readonly threshold: () => LogLevel | 'silent' = () => thresholdFromEnv(),
    private readonly sink: LogSink = consoleSink
  ) {}

  /**
   * Logger whose records all name the given session
   */
  forSession(sessionId: string): Logger {
    return new Logger(this.component, { ...this.bound, sessionId }, this.threshold, this.sink);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    const threshold = this.threshold();
    if (threshold === 'silent' || LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }

    const record = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...this.bound,
      ...context,
    };
    this.sink(level, `[XIUXIAN] ${JSON.stringify(record)}`);
  }
}

export const sessionLogger = new Logger('Session');

export const apiLogger = new Logger('Api');

export const eventLogger = new Logger('Events');
