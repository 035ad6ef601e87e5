import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

/** Failures of the application shell (startup, wiring), as opposed to sign-up outcomes. */
export type AppError = ConfigInvalidError | UnexpectedError;

/**
 * Branded config type.
 * Lets callers require a parsed config without re-checking it.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
