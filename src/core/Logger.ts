/**
 * Logger configuration using Pino
 * Provides structured logging with configurable levels and human-readable output
 */
import pino from 'pino';
import pretty from 'pino-pretty';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

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
  download: '📥',
  sync: '🔄',
  startup: '🚀',
};

const defaultOptions: LoggerOptions = {
  level: 'info',
  pretty: true,
};

/**
 * Format a value for clean inline display
 */
function formatValue(value: unknown, maxLen: number = 60): string {
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
    if (keys.length === 0) return '{}';
    return `{${keys.length} fields}`;
  }

  return String(value);
}

/**
 * Format context data, most useful fields first
 */
function formatContext(log: Record<string, unknown>, excludeKeys: string[]): string {
  const contextKeys = Object.keys(log).filter((k) => !excludeKeys.includes(k));
  if (contextKeys.length === 0) return '';

  const priorityKeys = [
    'domain', 'answer', 'services', 'url', 'processed',
    'total', 'added', 'updated', 'skipped', 'failed', 'count',
  ];

  const sortedKeys = [...contextKeys].sort((a, b) => {
    const aIdx = priorityKeys.indexOf(a);
    const bIdx = priorityKeys.indexOf(b);
    if (aIdx >= 0 && bIdx >= 0) return aIdx - bIdx;
    if (aIdx >= 0) return -1;
    if (bIdx >= 0) return 1;
    return 0;
  });

  const contextParts: string[] = [];
  for (const key of sortedKeys.slice(0, 6)) {
    const formatted = formatValue(log[key]);
    if (formatted) {
      contextParts.push(`${key}=${formatted}`);
    }
  }

  return contextParts.length > 0 ? ` (${contextParts.join(', ')})` : '';
}

function createPrettyStream() {
  return pretty({
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'app',
    hideObject: true,
    messageFormat: (log, messageKey) => {
      const level = typeof log['level'] === 'string' ? log['level'] : 'info';
      const service = log['service'];
      const msg = String(log[messageKey] ?? '');
      const symbol = levelSymbols[level] ?? 'ℹ️';

      let output = typeof service === 'string' ? `[${service}] ` : '';
      output += msg;

      const excludeKeys = ['level', 'time', 'pid', 'hostname', 'app', 'service', messageKey, 'err', 'error', 'stack'];
      output += formatContext(log, excludeKeys);

      // Error details are hidden by hideObject; surface the message inline
      const err = log['err'] ?? log['error'];
      if (err && typeof err === 'object' && 'message' in err) {
        output += ` - ${String(err.message)}`;
      }

      return `${symbol} ${output}`;
    },
    customPrettifiers: {
      level: () => '',
    },
  });
}

function createLogger(options: LoggerOptions = defaultOptions): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    level: options.level,
    base: {
      app: 'adguard-lancache-sync',
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

  return pino(baseConfig, process.stdout);
}

// Live binding: configureLogger() swaps the root for the rest of the process
export let logger: pino.Logger = createLogger();

/**
 * Rebuild the root logger from loaded configuration.
 * Child loggers created before this call keep the previous root.
 */
export function configureLogger(options: LoggerOptions): pino.Logger {
  logger = createLogger(options);
  return logger;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return logger.child(bindings);
}
