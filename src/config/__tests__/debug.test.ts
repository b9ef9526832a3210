import { describe, it, expect, beforeEach, afterAll } from '@jest/globals';
import { loadDebugConfig, LogLevel } from '../debug.js';

describe('loadDebugConfig', () => {
  const ORIGINAL_ENV = { ...process.env };

  const CATEGORY_VARIABLES = [
    'SEARCH_QUERY_DEBUG_PARSING',
    'SEARCH_QUERY_DEBUG_LINTING',
    'SEARCH_QUERY_DEBUG_TRANSLATION',
    'SEARCH_QUERY_DEBUG_REGISTRY',
    'SEARCH_QUERY_DEBUG_UPGRADE',
  ];

  beforeEach(() => {
    process.env = { ...ORIGINAL_ENV };
    delete process.env.SEARCH_QUERY_DEBUG_MODE;
    delete process.env.SEARCH_QUERY_LOG_LEVEL;
    delete process.env.SEARCH_QUERY_LOG_FORMAT;
    delete process.env.SEARCH_QUERY_ENABLE_REQUEST_TIMING;
    for (const name of CATEGORY_VARIABLES) {
      delete process.env[name];
    }
  });

  afterAll(() => {
    process.env = ORIGINAL_ENV;
  });

  it('should default to debug disabled when env is not set', () => {
    const config = loadDebugConfig();

    expect(config.enabled).toBe(false);
    expect(config.logParsing).toBe(false);
    expect(config.logLinting).toBe(false);
    expect(config.logTranslation).toBe(false);
    expect(config.logRegistry).toBe(false);
    expect(config.logUpgrade).toBe(false);
  });

  it('should enable every category when debug mode is on', () => {
    process.env.SEARCH_QUERY_DEBUG_MODE = 'true';

    const config = loadDebugConfig();

    expect(config.enabled).toBe(true);
    expect(config.logParsing).toBe(true);
    expect(config.logLinting).toBe(true);
    expect(config.logTranslation).toBe(true);
    expect(config.logRegistry).toBe(true);
    expect(config.logUpgrade).toBe(true);
  });

  it('should allow explicit false flags when debug is enabled', () => {
    process.env.SEARCH_QUERY_DEBUG_MODE = 'true';
    process.env.SEARCH_QUERY_DEBUG_PARSING = 'false';
    process.env.SEARCH_QUERY_DEBUG_UPGRADE = 'false';

    const config = loadDebugConfig();

    expect(config.logParsing).toBe(false);
    expect(config.logUpgrade).toBe(false);
    expect(config.logLinting).toBe(true);
    expect(config.logTranslation).toBe(true);
    expect(config.logRegistry).toBe(true);
  });

  it('should ignore category flags while debug mode is off', () => {
    process.env.SEARCH_QUERY_DEBUG_PARSING = 'true';

    expect(loadDebugConfig().logParsing).toBe(false);
  });

  it('should handle case-insensitive debug mode TRUE', () => {
    process.env.SEARCH_QUERY_DEBUG_MODE = 'TRUE';

    expect(loadDebugConfig().enabled).toBe(true);
  });

  it('should treat values other than true as false', () => {
    process.env.SEARCH_QUERY_DEBUG_MODE = 'yes';

    expect(loadDebugConfig().enabled).toBe(false);
  });

  it('should default log level to info and format to pretty', () => {
    const config = loadDebugConfig();

    expect(config.logLevel).toBe(LogLevel.INFO);
    expect(config.logFormat).toBe('pretty');
    expect(config.enableRequestTiming).toBe(true);
  });

  it('should read log level and format regardless of debug mode', () => {
    process.env.SEARCH_QUERY_LOG_LEVEL = 'WARN';
    process.env.SEARCH_QUERY_LOG_FORMAT = 'json';
    process.env.SEARCH_QUERY_ENABLE_REQUEST_TIMING = 'false';

    const config = loadDebugConfig();

    expect(config.enabled).toBe(false);
    expect(config.logLevel).toBe(LogLevel.WARN);
    expect(config.logFormat).toBe('json');
    expect(config.enableRequestTiming).toBe(false);
  });

  it('should fall back to defaults for unknown level and format', () => {
    process.env.SEARCH_QUERY_LOG_LEVEL = 'verbose';
    process.env.SEARCH_QUERY_LOG_FORMAT = 'xml';

    const config = loadDebugConfig();

    expect(config.logLevel).toBe(LogLevel.INFO);
    expect(config.logFormat).toBe('pretty');
  });
});
