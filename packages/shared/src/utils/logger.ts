import { randomUUID } from 'node:crypto';
import type { ILogger, LogContext, LogLevel } from './logger-interface';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
  SILENT: 6,
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  TRACE: '\x1b[37m',
  DEBUG: '\x1b[36m',
  INFO: '\x1b[32m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  FATAL: '\x1b[35m',
  SILENT: '\x1b[0m',
};

const RESET = '\x1b[0m';

function isLogLevel(level: string): level is LogLevel {
  return level in LEVEL_PRIORITY;
}

/**
 * Resolve the active level: LOG_LEVEL wins (case-insensitive), otherwise
 * tests are silent, production logs warnings and above, everything else info.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.LOG_LEVEL?.toUpperCase();
  if (requested && isLogLevel(requested)) {
    return requested;
  }

  switch (env.NODE_ENV) {
    case 'test':
      return 'SILENT';
    case 'production':
      return 'WARN';
    default:
      return 'INFO';
  }
}

class LoggerImpl implements ILogger {
  private level: LogLevel;

  constructor(level: LogLevel = resolveLogLevel()) {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== 'SILENT' && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const correlationId = context?.correlationId;

    if (process.env.NODE_ENV === 'production') {
      return JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...context,
      });
    }

    const prefix = correlationId ? `[${correlationId.slice(0, 8)}] ` : '';
    const rest = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `${LEVEL_COLOR[level]}[${level}]${RESET} ${prefix}${message}${rest}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;

    const formatted = this.formatMessage(level, message, context);
    if (level === 'ERROR' || level === 'FATAL') {
      console.error(formatted);
    } else if (level === 'WARN') {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }

  createCorrelationId(): string {
    return randomUUID();
  }

  trace(message: string, context?: LogContext): void {
    this.log('TRACE', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.log('FATAL', message, context);
  }
}

export type Logger = LoggerImpl;

export const logger = new LoggerImpl();
export default logger;
