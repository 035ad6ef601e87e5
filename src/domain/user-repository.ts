import type { ResultAsync } from 'neverthrow';
import type { SignUpError } from './sign-up-error.js';
import type { SignUpPayload } from './sign-up-payload.js';
import type { Token } from './token.js';

/**
 * Port: user registration.
 *
 * Guarantees:
 * - never rejects; every failure is a `SignUpError` value
 * - no retries (retry policy belongs to the transport, if anywhere)
 */
export interface UserRepository {
  doSignUp(payload: SignUpPayload): ResultAsync<Token, SignUpError>;
}
