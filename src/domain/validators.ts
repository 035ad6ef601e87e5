/**
 * Field validators: raw input in, field-scoped `Validated` out.
 *
 * Two tiers on purpose:
 * - name and email have one rule each, so their parsers return a value or `null`
 * - phone number has independent rules, so its parser accumulates messages
 *
 * Both tiers are lifted to `Validated<_, FieldError>` here so the form
 * assembler can combine them uniformly.
 */

import type { Validated } from '../runtime/validated.js';
import { fromNullable, mapErrors } from '../runtime/validated.js';
import type { FieldError } from './form-field.js';
import { FieldName, fieldError } from './form-field.js';
import type { EmailIdentity, PhoneIdentity } from './sign-up-identity.js';
import { EMAIL_MISSING_AT, parseEmail, parsePhoneNumber } from './sign-up-identity.js';

export const NAME_BLANK = "Name can't be blank";

export type FieldValidated<A> = Validated<A, FieldError>;

/** `null` for empty or whitespace-only input; otherwise the input as typed. */
export function parseName(raw: string): string | null {
  return raw.trim().length === 0 ? null : raw;
}

export function validateName(raw: string): FieldValidated<string> {
  return fromNullable(parseName(raw), () => [fieldError(FieldName.Name, [NAME_BLANK])]);
}

export function validateEmail(raw: string): FieldValidated<EmailIdentity> {
  return fromNullable(parseEmail(raw), () => [fieldError(FieldName.Email, [EMAIL_MISSING_AT])]);
}

export function validatePhoneNumber(raw: string): FieldValidated<PhoneIdentity> {
  return mapErrors(parsePhoneNumber(raw), (messages) => [fieldError(FieldName.PhoneNumber, messages)]);
}
