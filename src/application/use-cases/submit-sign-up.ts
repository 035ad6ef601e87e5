import type { ResultAsync } from 'neverthrow';
import type { SignUpError } from '../../domain/sign-up-error.js';
import { SignUpErr } from '../../domain/sign-up-error.js';
import type { IdentityKind } from '../../domain/sign-up-identity.js';
import { createForKind } from '../../domain/sign-up-payload.js';
import type { Token } from '../../domain/token.js';
import type { UserRepository } from '../../domain/user-repository.js';
import { toResult } from '../../runtime/validated.js';

// =============================================================================
// Types
// =============================================================================

export interface SubmitSignUpArgs {
  readonly name: string;
  readonly rawId: string;
  readonly identityKind: IdentityKind;
}

export interface SubmitSignUpPorts {
  readonly userRepository: UserRepository;
}

// =============================================================================
// Use Case
// =============================================================================

/**
 * Validate the form, then register the user.
 *
 * Railway: all field errors are collected first (Validated), then the pipeline
 * continues on a single track (Result). An invalid form never reaches the
 * repository.
 */
export function submitSignUp(args: SubmitSignUpArgs, ports: SubmitSignUpPorts): ResultAsync<Token, SignUpError> {
  return toResult(createForKind(args.identityKind, args.name, args.rawId))
    .mapErr((errors): SignUpError => SignUpErr.validation(errors))
    .asyncAndThen((payload) => ports.userRepository.doSignUp(payload));
}
