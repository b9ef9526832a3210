import { loadDebugConfig, LogLevel } from '../config/debug.js';

const debugConfig = loadDebugConfig();

export type DebugCategory = 'parsing' | 'linting' | 'translation' | 'registry' | 'upgrade';

function categoryEnabled(category: DebugCategory): boolean {
  if (!debugConfig.enabled) {
    return false;
  }

  switch (category) {
    case 'parsing':
      return debugConfig.logParsing;
    case 'linting':
      return debugConfig.logLinting;
    case 'translation':
      return debugConfig.logTranslation;
    case 'registry':
      return debugConfig.logRegistry;
    case 'upgrade':
      return debugConfig.logUpgrade;
    default:
      return false;
  }
}

interface LogEntry {
  timestamp: string;
  level: string;
  category?: string;
  message: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[debugConfig.logLevel];
}

const serialize = (value: unknown) => {
  try {
    return JSON.stringify(
      value,
      (_key, val) => {
        if (val instanceof Error) {
          return { name: val.name, message: val.message, stack: val.stack };
        }
        return val;
      },
      2
    );
  } catch (error) {
    return `[unserializable: ${error instanceof Error ? error.message : String(error)}]`;
  }
};

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, category, message, ...rest } = entry;
  const categoryStr = category ? `[search-query:${category}]` : '[search-query]';
  const levelStr = `[${level.toUpperCase()}]`;

  const base = `${timestamp} ${levelStr} ${categoryStr} ${message}`;

  const hasAdditionalData = Object.keys(rest).length > 0;
  if (!hasAdditionalData) {
    return base;
  }

  return `${base}\n${serialize(rest)}`;
}

function formatJson(entry: LogEntry): string {
  try {
    return JSON.stringify(entry, (_key, val) => {
      if (val instanceof Error) {
        return { name: val.name, message: val.message, stack: val.stack };
      }
      return val;
    });
  } catch (error) {
    return JSON.stringify({
      ...entry,
      _serializationError: `Failed to serialize: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
}

function emit(entry: LogEntry): void {
  const output = debugConfig.logFormat === 'json' ? formatJson(entry) : formatPretty(entry);
  console.error(output);
}

type LogPayload = Record<string, unknown>;

class Logger {
  private createEntry(level: LogLevel, category: string | undefined, message: string, payload?: LogPayload): LogEntry {
    // Error values in the payload are expanded by the formatters
    return {
      ...payload,
      timestamp: new Date().toISOString(),
      level,
      ...(category ? { category } : {}),
      message,
    };
  }

  debug(category: DebugCategory, message: string, payload?: LogPayload): void {
    if (!categoryEnabled(category) || !shouldLog(LogLevel.DEBUG)) {
      return;
    }

    const entry = this.createEntry(LogLevel.DEBUG, category, message, payload);
    emit(entry);
  }

  info(message: string, payload?: LogPayload): void {
    if (!shouldLog(LogLevel.INFO)) {
      return;
    }

    const entry = this.createEntry(LogLevel.INFO, undefined, message, payload);
    emit(entry);
  }

  warn(message: string, payload?: LogPayload): void {
    if (!shouldLog(LogLevel.WARN)) {
      return;
    }

    const entry = this.createEntry(LogLevel.WARN, undefined, message, payload);
    emit(entry);
  }

  error(message: string, payload?: LogPayload): void {
    if (!shouldLog(LogLevel.ERROR)) {
      return;
    }

    const entry = this.createEntry(LogLevel.ERROR, undefined, message, payload);
    emit(entry);
  }

  private metric(metricName: string, payload: LogPayload): void {
    if (!shouldLog(LogLevel.INFO)) {
      return;
    }

    const entry = this.createEntry(LogLevel.INFO, undefined, metricName, payload);
    entry.type = 'metric';
    emit(entry);
  }

  /**
   * Run `fn` and record its duration as a metric, or as an error when it throws.
   * Query operations are synchronous, so only plain return values are timed.
   */
  withTimer<T>(spanName: string, metadata: LogPayload, fn: () => T): T {
    if (!debugConfig.enableRequestTiming) {
      return fn();
    }

    const start = Date.now();
    try {
      const result = fn();
      this.metric(spanName, { ...metadata, durationMs: Date.now() - start });
      return result;
    } catch (error) {
      this.error(`${spanName} failed`, {
        ...metadata,
        durationMs: Date.now() - start,
        error: error instanceof Error ? { name: error.name, message: error.message } : error,
      });
      throw error;
    }
  }
}

// Singleton instance
export const logger = new Logger();

export function debugLog(category: DebugCategory, message: string, payload?: LogPayload) {
  logger.debug(category, message, payload);
}

export function trackOperation<T>(category: DebugCategory, label: string, meta?: LogPayload) {
  debugLog(category, `${label} START`, meta);
  const start = Date.now();
  return (result?: T) => {
    debugLog(category, `${label} END`, {
      durationMs: Date.now() - start,
      result,
    });
  };
}
