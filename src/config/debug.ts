export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogFormat = 'json' | 'pretty';

export interface DebugConfig {
  enabled: boolean;
  logParsing: boolean;
  logLinting: boolean;
  logTranslation: boolean;
  logRegistry: boolean;
  logUpgrade: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
  enableRequestTiming: boolean;
}

export const toBool = (value: string | undefined, defaultValue: boolean) => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return defaultValue;
  }
};

const toLogFormat = (value: string | undefined, defaultValue: LogFormat): LogFormat => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === 'json' ? 'json' : defaultValue;
};

export function loadDebugConfig(): DebugConfig {
  const enabled = toBool(process.env.SEARCH_QUERY_DEBUG_MODE, false);

  // Independent of SEARCH_QUERY_DEBUG_MODE
  const logLevel = toLogLevel(process.env.SEARCH_QUERY_LOG_LEVEL, LogLevel.INFO);
  const logFormat = toLogFormat(process.env.SEARCH_QUERY_LOG_FORMAT, 'pretty');
  const enableRequestTiming = toBool(process.env.SEARCH_QUERY_ENABLE_REQUEST_TIMING, true);

  if (!enabled) {
    return {
      enabled: false,
      logParsing: false,
      logLinting: false,
      logTranslation: false,
      logRegistry: false,
      logUpgrade: false,
      logLevel,
      logFormat,
      enableRequestTiming,
    };
  }

  return {
    enabled: true,
    logParsing: toBool(process.env.SEARCH_QUERY_DEBUG_PARSING, true),
    logLinting: toBool(process.env.SEARCH_QUERY_DEBUG_LINTING, true),
    logTranslation: toBool(process.env.SEARCH_QUERY_DEBUG_TRANSLATION, true),
    logRegistry: toBool(process.env.SEARCH_QUERY_DEBUG_REGISTRY, true),
    logUpgrade: toBool(process.env.SEARCH_QUERY_DEBUG_UPGRADE, true),
    logLevel,
    logFormat,
    enableRequestTiming,
  };
}
