import type { SignUpBody } from './dto.js';

/**
 * Raw answer of the sign-up endpoint: an HTTP-like status and an unparsed JSON body.
 * 2xx carries a `SignUpResultDto`; anything else a `SignUpErrorDto`.
 */
export interface SignUpApiResponse {
  readonly status: number;
  readonly body: unknown;
}

/**
 * Port: the remote collaborator that registers users.
 *
 * Contract:
 * - resolves with a response whenever the server answered (success or not)
 * - rejects (or throws) only when the server could not be reached (connectivity fault)
 * - timeouts and retries, if any, live behind this port
 */
export interface SignUpApi {
  signUp(body: SignUpBody): Promise<SignUpApiResponse>;
}
