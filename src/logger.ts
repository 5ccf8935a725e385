/**
 * termexpect Logger - Centralized logging for the termexpect package
 *
 * Usage:
 *   import { createLogger, setLogLevel, LogLevel } from './logger.js';
 *   const log = createLogger('Session');
 *   log.debug('Pattern compiled');
 *   log.info('Connected');
 *   log.timing('expect', startTime);
 *
 * Enable debug logging:
 *   TERMEXPECT_DEBUG=1 node your-script.js
 *   TERMEXPECT_LOG_LEVEL=debug node your-script.js
 *
 * Log levels (in order of verbosity):
 *   - debug: Detailed debug info (only when TERMEXPECT_DEBUG=1 or TERMEXPECT_LOG_LEVEL=debug)
 *   - info: General info (default)
 *   - warn: Warnings
 *   - error: Errors only
 *   - silent: No logging
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

let globalLogLevel: LogLevel = LogLevel.INFO;

const isDebugEnabled = (): boolean => {
  return process.env.TERMEXPECT_DEBUG === '1' ||
         process.env.TERMEXPECT_DEBUG === 'true' ||
         process.env.TERMEXPECT_LOG_LEVEL === 'debug';
};

/**
 * Map a level name to a LogLevel, or null for unknown names
 */
export function parseLogLevel(name: string): LogLevel | null {
  switch (name.toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    case 'silent': return LogLevel.SILENT;
    default: return null;
  }
}

if (isDebugEnabled()) {
  globalLogLevel = LogLevel.DEBUG;
} else if (process.env.TERMEXPECT_LOG_LEVEL) {
  globalLogLevel = parseLogLevel(process.env.TERMEXPECT_LOG_LEVEL) ?? globalLogLevel;
}

/**
 * Set the global log level
 */
export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

/**
 * Get the current global log level
 */
export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  magenta: '\x1b[35m',
};

const useColors = process.env.NO_COLOR !== '1' && process.stderr.isTTY;

function formatMessage(name: string, level: string, args: unknown[]): unknown[] {
  const timestamp = new Date().toISOString().split('T')[1].slice(0, -1);
  const prefix = `[termexpect:${name}:${level}]`;

  if (useColors) {
    const colorMap: Record<string, string> = {
      DEBUG: colors.dim,
      INFO: colors.cyan,
      WARN: colors.yellow,
      ERROR: colors.red,
      EVENT: colors.magenta,
      TIMING: colors.green,
    };
    const color = colorMap[level] || colors.reset;
    return [`${colors.dim}${timestamp}${colors.reset} ${color}${prefix}${colors.reset}`, ...args];
  }

  return [`${timestamp} ${prefix}`, ...args];
}

/**
 * Logger interface
 */
export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  event: (eventName: string, data?: unknown) => void;
  timing: (label: string, startTime: number) => void;
  isDebugEnabled: () => boolean;
}

function joinArgs(args: unknown[]): string {
  return args.map(arg =>
    typeof arg === 'string' ? arg : arg instanceof Error ? arg.message : JSON.stringify(arg)
  ).join(' ');
}

function writeToStream(stream: NodeJS.WriteStream, args: unknown[]): void {
  stream.write(joinArgs(args) + '\n');
}

/**
 * Create a logger instance for a component
 *
 * @param name - Name of the component (e.g., 'Session', 'Transport:remote')
 */
export function createLogger(name: string, options: { forceDebug?: boolean } = {}): Logger {
  return {
    debug: (...args: unknown[]) => {
      if (options.forceDebug || globalLogLevel <= LogLevel.DEBUG) {
        writeToStream(process.stderr, formatMessage(name, 'DEBUG', args));
      }
    },

    info: (...args: unknown[]) => {
      if (globalLogLevel <= LogLevel.INFO) {
        writeToStream(process.stderr, formatMessage(name, 'INFO', args));
      }
    },

    warn: (...args: unknown[]) => {
      if (globalLogLevel <= LogLevel.WARN) {
        writeToStream(process.stderr, formatMessage(name, 'WARN', args));
      }
    },

    error: (...args: unknown[]) => {
      if (globalLogLevel <= LogLevel.ERROR) {
        writeToStream(process.stderr, formatMessage(name, 'ERROR', args));
      }
    },

    event: (eventName: string, data?: unknown) => {
      if (options.forceDebug || globalLogLevel <= LogLevel.DEBUG) {
        const dataStr = data === undefined ? '' : JSON.stringify(data).substring(0, 500);
        writeToStream(process.stderr, formatMessage(name, 'EVENT', [eventName, dataStr]));
      }
    },

    timing: (label: string, startTime: number) => {
      if (options.forceDebug || globalLogLevel <= LogLevel.DEBUG) {
        const duration = Date.now() - startTime;
        writeToStream(process.stderr, formatMessage(name, 'TIMING', [`${label}: ${duration}ms`]));
      }
    },

    isDebugEnabled: () => options.forceDebug === true || globalLogLevel <= LogLevel.DEBUG,
  };
}
