import type { Logger as PinoLogger, LevelWithSilent } from 'pino';

/**
 * Logger type - pino's own, no wrapper.
 *
 * API follows pino idiom (data-first):
 *   logger.info({ identityKind: 'email' }, 'Submitting sign-up');
 *   logger.warn({ err }, 'Sign-up failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export type LogLevel = LevelWithSilent;

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const satisfies readonly LogLevel[];
