import type { Logger, LogLevel } from './types.js';
import { LOG_LEVELS } from './types.js';
import { createRootLogger } from './create-logger.js';

/**
 * Logger for code that runs BEFORE the DI container exists
 * (the composition root itself, config loading).
 *
 * After DI is ready, use the injected ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger(bootstrapLevel(process.env['SIGNUP_LOG_LEVEL']));
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}

function bootstrapLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'silent';
}
