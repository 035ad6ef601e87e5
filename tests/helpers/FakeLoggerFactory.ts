import type { ILoggerFactory, Logger } from '../../src/core/logging/index.js';
import { FakeLogger } from './FakeLogger.js';

/**
 * Fake logger factory for testing.
 * One FakeLogger per component, created on demand.
 */
export class FakeLoggerFactory implements ILoggerFactory {
  readonly loggers = new Map<string, FakeLogger>();
  private readonly _root = new FakeLogger();

  get root(): Logger {
    return this._root as unknown as Logger;
  }

  create(component: string): Logger {
    return this.fakeFor(component) as unknown as Logger;
  }

  fakeFor(component: string): FakeLogger {
    let logger = this.loggers.get(component);
    if (!logger) {
      logger = new FakeLogger();
      this.loggers.set(component, logger);
    }
    return logger;
  }
}
