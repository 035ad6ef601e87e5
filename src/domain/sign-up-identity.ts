import type { Brand } from '../runtime/brand.js';
import type { Validated } from '../runtime/validated.js';
import { combine2, invalidOne, valid } from '../runtime/validated.js';

export type EmailAddress = Brand<string, 'EmailAddress'>;
export type PhoneNumber = Brand<string, 'PhoneNumber'>;

export type EmailIdentity = { readonly kind: 'email'; readonly value: EmailAddress };
export type PhoneIdentity = { readonly kind: 'phoneNumber'; readonly value: PhoneNumber };

/**
 * How a user identifies when signing up: exactly one of email or phone number.
 * Only the parsers below mint the branded values.
 */
export type SignUpIdentity = EmailIdentity | PhoneIdentity;

/** Which identity the form is collecting. */
export type IdentityKind = 'email' | 'phone';

export const EMAIL_MISSING_AT = "Email must contain '@'";
export const PHONE_MISSING_PLUS = "Phone number must start with '+'";
export const PHONE_TOO_SHORT = 'Phone number must be longer than 4 characters';

const PHONE_MIN_EXCLUSIVE_LENGTH = 4;

/**
 * Single-cause rule: the only way to fail is a missing '@'.
 * Deliberately weak; it is not an RFC 5322 check.
 */
export function parseEmail(raw: string): EmailIdentity | null {
  return raw.includes('@') ? { kind: 'email', value: raw as EmailAddress } : null;
}

/** Multi-cause rule: both checks run and both messages are kept. */
export function parsePhoneNumber(raw: string): Validated<PhoneIdentity, string> {
  return combine2(validateStart(raw), validateLength(raw), (_, phone) => ({
    kind: 'phoneNumber' as const,
    value: phone as PhoneNumber,
  }));
}

function validateStart(raw: string): Validated<string, string> {
  return raw.startsWith('+') ? valid(raw) : invalidOne(PHONE_MISSING_PLUS);
}

function validateLength(raw: string): Validated<string, string> {
  return raw.length > PHONE_MIN_EXCLUSIVE_LENGTH ? valid(raw) : invalidOne(PHONE_TOO_SHORT);
}
