import { assertNever } from '../runtime/assert-never.js';
import { combine2 } from '../runtime/validated.js';
import type { IdentityKind, SignUpIdentity } from './sign-up-identity.js';
import type { FieldValidated } from './validators.js';
import { validateEmail, validateName, validatePhoneNumber } from './validators.js';

/**
 * A fully validated sign-up request.
 * Only the assemblers below produce one; it is consumed once by submission.
 */
export interface SignUpPayload {
  readonly name: string;
  readonly identity: SignUpIdentity;
}

export function createEmail(name: string, email: string): FieldValidated<SignUpPayload> {
  return combine2(validateName(name), validateEmail(email), toPayload);
}

export function createPhone(name: string, phoneNumber: string): FieldValidated<SignUpPayload> {
  return combine2(validateName(name), validatePhoneNumber(phoneNumber), toPayload);
}

/** Runs the assembler for the identity the form currently collects. */
export function createForKind(kind: IdentityKind, name: string, rawId: string): FieldValidated<SignUpPayload> {
  switch (kind) {
    case 'email':
      return createEmail(name, rawId);
    case 'phone':
      return createPhone(name, rawId);
    default:
      return assertNever(kind);
  }
}

export function emailOf(payload: SignUpPayload): string | null {
  return payload.identity.kind === 'email' ? payload.identity.value : null;
}

export function phoneNumberOf(payload: SignUpPayload): string | null {
  return payload.identity.kind === 'phoneNumber' ? payload.identity.value : null;
}

function toPayload(name: string, identity: SignUpIdentity): SignUpPayload {
  return { name, identity };
}
