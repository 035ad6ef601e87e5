import type { NonEmptyArray } from '../runtime/non-empty.js';
import { assertNever } from '../runtime/assert-never.js';
import type { FieldError } from './form-field.js';

export type ValidationError = Readonly<{
  readonly _tag: 'ValidationError';
  readonly errors: NonEmptyArray<FieldError>;
}>;

export type HttpError = Readonly<{
  readonly _tag: 'HttpError';
  readonly message: string;
}>;

/** `cause` is kept for diagnostics only and is never shown to the user. */
export type ConnectivityError = Readonly<{
  readonly _tag: 'ConnectivityError';
  readonly cause: unknown;
}>;

export type SignUpError = ValidationError | HttpError | ConnectivityError;

export const SignUpErr = {
  validation: (errors: NonEmptyArray<FieldError>): ValidationError => ({
    _tag: 'ValidationError',
    errors,
  }),

  http: (message: string): HttpError => ({
    _tag: 'HttpError',
    message,
  }),

  connectivity: (cause: unknown): ConnectivityError => ({
    _tag: 'ConnectivityError',
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => SignUpError>;

/** One-line description for logs. */
export function describeSignUpError(error: SignUpError): string {
  switch (error._tag) {
    case 'ValidationError':
      return `Validation failed for ${error.errors.map((e) => e.field).join(', ')}`;
    case 'HttpError':
      return `Server rejected sign-up: ${error.message}`;
    case 'ConnectivityError':
      return error.cause instanceof Error
        ? `Connectivity failure: ${error.cause.message}`
        : 'Connectivity failure';
    default:
      return assertNever(error);
  }
}
