import 'reflect-metadata';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { AppError } from '../errors/app-error.js';
import { AppErr } from '../errors/factories.js';
import { formatAppError } from '../errors/formatter.js';
import { createBootstrapLogger, PinoLoggerFactory } from '../core/logging/index.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { InMemorySignUpApi } from '../infrastructure/sign-up/in-memory-sign-up-api.js';
import type { SignUpApi } from '../infrastructure/sign-up/sign-up-api.port.js';
import { RemoteUserRepository } from '../infrastructure/sign-up/remote-user-repository.js';
import type { UserRepository } from '../domain/user-repository.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  /** Environment to read config from (defaults to process.env) */
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRATION
// Anything already registered (by tests) is left alone.
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>): Result<ValidatedConfig, AppError> {
  if (container.isRegistered(DI.Config.App)) {
    return ok(container.resolve<ValidatedConfig>(DI.Config.App));
  }

  const loaded = loadConfig({ env });
  if (loaded.isErr()) {
    return err(loaded.error);
  }

  container.register<ValidatedConfig>(DI.Config.App, { useValue: loaded.value });
  return ok(loaded.value);
}

function registerLogging(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }
}

function registerSignUp(config: ValidatedConfig): void {
  if (!container.isRegistered(DI.SignUp.Api)) {
    container.register<SignUpApi>(DI.SignUp.Api, {
      useValue: new InMemorySignUpApi({
        latencyMs: config.api.latencyMs,
        connectivity: config.api.connectivity,
      }),
    });
  }

  if (!container.isRegistered(DI.SignUp.UserRepository)) {
    container.register<UserRepository>(DI.SignUp.UserRepository, {
      useFactory: instanceCachingFactory((c) => c.resolve(RemoteUserRepository)),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Composition root. Idempotent: a second call returns the same container.
 *
 * Config problems come back as data; callers decide whether to exit.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<DependencyContainer, AppError> {
  if (initialized) {
    return ok(container);
  }

  const logger = createBootstrapLogger('Container');

  const configResult = registerConfig(options.env ?? process.env);
  if (configResult.isErr()) {
    logger.error(formatAppError(configResult.error));
    return err(configResult.error);
  }

  try {
    registerLogging();
    registerSignUp(configResult.value);
  } catch (cause) {
    const error = AppErr.unexpected('Container registration failed', cause);
    logger.error({ err: cause }, formatAppError(error));
    return err(error);
  }

  initialized = true;
  logger.debug('Container initialized');
  return ok(container);
}

export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export { container };
