import type { NonEmptyArray } from '../runtime/non-empty.js';

/**
 * Fields that take part in sign-up validation.
 * Values double as the wire names the sign-up endpoint uses.
 */
export const FieldName = {
  Name: 'name',
  Email: 'email',
  PhoneNumber: 'phoneNumber',
} as const;

export type FieldName = (typeof FieldName)[keyof typeof FieldName];

/** Exists only when at least one rule failed for the field. */
export interface FieldError {
  readonly field: FieldName;
  readonly messages: NonEmptyArray<string>;
}

export function fieldError(field: FieldName, messages: NonEmptyArray<string>): FieldError {
  return { field, messages };
}

/**
 * Map a field name received from outside (e.g. a server response) to a known field.
 * Unknown names yield `null`; callers decide whether that is tolerable.
 */
export function parseFieldName(raw: string): FieldName | null {
  switch (raw) {
    case FieldName.Name:
      return FieldName.Name;
    case FieldName.Email:
      return FieldName.Email;
    case FieldName.PhoneNumber:
      return FieldName.PhoneNumber;
    default:
      return null;
  }
}

/** First message reported for `field`, if any. */
export function firstMessageFor(errors: readonly FieldError[], field: FieldName): string | null {
  return errors.find((e) => e.field === field)?.messages[0] ?? null;
}
