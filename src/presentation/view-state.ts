import { assertNever } from '../runtime/assert-never.js';
import type { IdentityKind } from '../domain/sign-up-identity.js';

export interface FormFieldState {
  readonly value: string;
  readonly error: string | null;
}

/**
 * Everything the sign-up screen renders from.
 * Never mutated: every transition produces a new object.
 */
export interface ViewState {
  readonly busy: boolean;
  /** Top-level message (server or connectivity problem) */
  readonly message: string | null;
  readonly identityKind: IdentityKind;
  readonly name: FormFieldState;
  readonly id: FormFieldState;
}

export const EMPTY_FIELD: FormFieldState = { value: '', error: null };

export const DEFAULT_VIEW_STATE: ViewState = {
  busy: false,
  message: null,
  identityKind: 'email',
  name: EMPTY_FIELD,
  id: EMPTY_FIELD,
};

export const NAME_LABEL = 'Name';

export function idLabel(kind: IdentityKind): string {
  switch (kind) {
    case 'email':
      return 'Email';
    case 'phone':
      return 'Phone number';
    default:
      return assertNever(kind);
  }
}

export function switchButtonLabel(kind: IdentityKind): string {
  switch (kind) {
    case 'email':
      return 'Use phone number instead';
    case 'phone':
      return 'Use email instead';
    default:
      return assertNever(kind);
  }
}
