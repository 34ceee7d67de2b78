type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

// Request-scoped fields worth printing; anything else in a context is dropped
const CONTEXT_KEYS = new Set(['requestId', 'method', 'path', 'status', 'ms', 'source']);

const RESET = '\x1b[0m';
const COLORS = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
} as const;

const isLogLevel = (value: string): value is LogLevel => LEVELS.some((level) => level === value);

class Logger {
  private static instance: Logger;
  private appName = 'tiktok-meta';
  private logLevel: LogLevel = 'info';

  private constructor() {
    const envLogLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (envLogLevel && isLogLevel(envLogLevel)) {
      this.logLevel = envLogLevel;
    }
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.logLevel)) return;

    const fields = Object.entries(context ?? {})
      .filter(([key, value]) => CONTEXT_KEYS.has(key) && value !== undefined)
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(' ');
    const line = `${this.appName} | ${level.toUpperCase()}:${fields ? ` [${fields}]` : ''} ${message}`;
    const stream = level === 'error' || level === 'warn' ? process.stderr : process.stdout;
    stream.write(`${COLORS[level]}${line}${RESET}\n`);
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  public error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    let details = '';
    if (error instanceof Error) {
      details = `: ${error.message}`;
      if (error.cause instanceof Error) details += ` (caused by: ${error.cause.message})`;
    } else if (error) {
      details = `: ${String(error)}`;
    }
    this.write('error', `${message}${details}`, context);
  }
}

export const logger = Logger.getInstance();
