/**
 * Structured logging.
 *
 * Development prints readable lines; everything else prints one JSON object
 * per entry so log collectors can pick them up.
 */

import { LOG_LEVELS } from "./env";

type LogLevel = (typeof LOG_LEVELS)[number];

interface LogContext {
  roomId?: string;
  route?: string;
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(v: string | undefined): v is LogLevel {
  return v !== undefined && LOG_LEVELS.some((l) => l === v);
}

class Logger {
  private isDev = process.env.NODE_ENV === 'development';

  // Read on every call: tests and scripts flip LOG_LEVEL at runtime
  private threshold(): LogLevel {
    const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
    if (isLogLevel(raw)) return raw;
    if (process.env.NODE_ENV === 'test') return 'warn';
    return this.isDev ? 'debug' : 'info';
  }

  private log(level: LogLevel, message: string, context?: LogContext) {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.threshold()]) return;

    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      message,
      ...context,
    };

    if (this.isDev) {
      const emoji = {
        debug: '🔍',
        info: 'ℹ️',
        warn: '⚠️',
        error: '❌',
      }[level];

      console.log(`${emoji} [${level.toUpperCase()}] ${message}`);
      if (context && Object.keys(context).length > 0) {
        console.log('  Context:', context);
      }
    } else {
      console.log(JSON.stringify(logEntry));
    }
  }

  debug(message: string, context?: LogContext) {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext) {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext) {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext) {
    this.log('error', message, context);
  }
}

export const logger = new Logger();
