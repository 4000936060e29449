export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Leveled sink the resolver core logs through. `Logger` is the process implementation;
 * tests hand in their own.
 */
export interface LogSink {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  color?: boolean;
  /** Receives each formatted line. Defaults to the console stream for the level. */
  write?: (level: LogLevel, line: string) => void;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  timestamp: '\x1b[90m', // Gray
  context: '\x1b[90m', // Gray
};

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in levels;
}

function writeToConsole(level: LogLevel, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export class Logger implements LogSink {
  private minLevel: LogLevel;
  private useJSON: boolean;
  private supportsColor: boolean;
  private write: (level: LogLevel, line: string) => void;

  constructor(options: LoggerOptions = {}) {
    const envLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
    this.minLevel = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');

    // JSON lines in production, readable lines in development
    this.useJSON = options.json ?? (process.env.NODE_ENV === 'production' || process.env.LOG_FORMAT === 'json');

    this.supportsColor =
      options.color ??
      (process.stdout.isTTY === true && process.env.NO_COLOR === undefined && process.env.FORCE_COLOR !== '0');

    this.write = options.write ?? writeToConsole;
  }

  private shouldLog(level: LogLevel): boolean {
    return levels[level] >= levels[this.minLevel];
  }

  private formatTimestamp(now: Date): string {
    // Fixed width: 12 characters
    const hours = now.getHours().toString().padStart(2, '0');
    const minutes = now.getMinutes().toString().padStart(2, '0');
    const seconds = now.getSeconds().toString().padStart(2, '0');
    const ms = now.getMilliseconds().toString().padStart(3, '0');
    return `${hours}:${minutes}:${seconds}.${ms}`.padEnd(12);
  }

  private formatMessage(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): string {
    const now = new Date();

    if (this.useJSON) {
      const entry: LogEntry = {
        timestamp: now.toISOString(),
        level,
        message,
      };

      if (context) {
        entry.context = context;
      }

      if (error) {
        entry.error = {
          message: error.message,
          stack: error.stack,
          name: error.name,
        };
      }

      return JSON.stringify(entry);
    }

    const paint = (color: string, text: string) => (this.supportsColor ? `${color}${text}${colors.reset}` : text);

    // timestamp (12 chars) + 1 space + level (5 chars, includes trailing space) + message
    let output = `${paint(colors.timestamp, this.formatTimestamp(now))} ${paint(colors[level], level.toUpperCase().padEnd(5))}${message}`;

    if (context && Object.keys(context).length > 0) {
      const contextPairs = Object.entries(context)
        .map(([key, value]) => {
          const formattedValue = typeof value === 'string' ? value : JSON.stringify(value);
          return `${key}=${formattedValue}`;
        })
        .join(' ');
      output += ` ${paint(colors.context, contextPairs)}`;
    }

    if (error) {
      output += `\n${paint(colors.error, `  Error: ${error.message}`)}`;
      if (error.stack) {
        const stackLines = error.stack.split('\n').slice(1, 4);
        output += `\n${paint(colors.timestamp, `  ${stackLines.join('\n  ')}`)}`;
      }
    }

    return output;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      this.write('debug', this.formatMessage('debug', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      this.write('info', this.formatMessage('info', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      this.write('warn', this.formatMessage('warn', message, context));
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      this.write('error', this.formatMessage('error', message, context, error));
    }
  }
}

/**
 * Normalize anything thrown into an Error for `LogSink.error`.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export const logger = new Logger();
