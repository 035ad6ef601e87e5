import pino from 'pino';
import { inject, singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';

/**
 * Root pino logger.
 *
 * - JSON lines on stderr (stdout stays free for the host application)
 * - ISO timestamps
 * - error serializer so `{ err }` carries name, message and stack
 */
export function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers.
 * Level comes from validated config, not from the environment directly.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Config.App) config: ValidatedConfig) {
    this._root = createRootLogger(config.logging.level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
