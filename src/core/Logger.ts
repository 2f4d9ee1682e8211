/**
 * Logger configuration using Pino
 * Structured logging on stderr with configurable levels and user-friendly output;
 * stdout is left to command output
 */
import pino from 'pino';
import pretty from 'pino-pretty';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

// Emoji symbols for pretty logging
const levelSymbols: Record<string, string> = {
  fatal: '💀',
  error: '❌',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🔍',
  trace: '📝',
};

export const symbols = {
  success: '✅',
  error: '❌',
  warning: '⚠️',
  dns: '🌐',
  provider: '🔌',
  file: '📄',
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function levelFromEnv(): LogLevel {
  const value = process.env['LOG_LEVEL']?.toLowerCase();
  return value && isLogLevel(value) ? value : 'info';
}

const defaultOptions: LoggerOptions = {
  level: levelFromEnv(),
  pretty: process.env['LOG_PRETTY'] !== 'false',
};

/**
 * Format a value for clean inline display
 */
function formatValue(value: unknown, maxLen: number = 40): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') {
    return value.length > maxLen ? value.substring(0, maxLen) + '...' : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    if (value.length <= 3) {
      return value.map((v) => formatValue(v, 30)).join(', ');
    }
    return `${value.length} items`;
  }

  if (typeof value === 'object') {
    const keys = Object.keys(value);
    return keys.length === 0 ? '{}' : `{${keys.length} fields}`;
  }

  return String(value);
}

/**
 * Format context data in a clean, readable way
 * Prioritizes DNS fields and keeps output short
 */
function formatContext(log: Record<string, unknown>, excludeKeys: string[]): string {
  const contextKeys = Object.keys(log).filter((k) => !excludeKeys.includes(k));
  if (contextKeys.length === 0) return '';

  const priorityKeys = ['domain', 'type', 'name', 'data', 'count', 'ttl', 'output'];

  const sortedKeys = contextKeys.sort((a, b) => {
    const aIdx = priorityKeys.indexOf(a);
    const bIdx = priorityKeys.indexOf(b);
    if (aIdx >= 0 && bIdx >= 0) return aIdx - bIdx;
    if (aIdx >= 0) return -1;
    if (bIdx >= 0) return 1;
    return 0;
  });

  const contextParts: string[] = [];
  for (const key of sortedKeys.slice(0, 5)) {
    const formatted = formatValue(log[key]);
    if (formatted) {
      contextParts.push(`${key}=${formatted}`);
    }
  }

  return contextParts.length > 0 ? ` (${contextParts.join(', ')})` : '';
}

function createPrettyStream() {
  return pretty({
    destination: 2,
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'app',
    hideObject: true,
    messageFormat: (log, messageKey) => {
      const level = String(log['level']);
      const service = log['service'];
      const msg = String(log[messageKey] ?? '');
      const symbol = levelSymbols[level] ?? 'ℹ️';

      let output = '';

      // e.g. [GoDaddy]
      if (typeof service === 'string') {
        output += `[${service}] `;
      }

      output += msg;

      const excludeKeys = ['level', 'time', 'pid', 'hostname', 'app', 'service', messageKey, 'err', 'error', 'stack'];
      output += formatContext(log, excludeKeys);

      return `${symbol} ${output}`;
    },
    // Hide the default level label since we're using emojis
    customPrettifiers: {
      level: () => '',
    },
  });
}

function createLogger(options: LoggerOptions = defaultOptions): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    level: options.level,
    base: {
      app: 'zone-migrate',
      pid: undefined,
      hostname: undefined,
    },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (options.pretty) {
    return pino(baseConfig, createPrettyStream());
  }

  // Structured JSON on stderr
  return pino(baseConfig, pino.destination(2));
}

export const logger = createLogger();

/**
 * Set the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return logger.child(bindings);
}

export default logger;
