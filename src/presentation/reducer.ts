/**
 * Pure ViewState transitions.
 *
 * Each function takes the current state and returns the next one; nothing
 * here performs I/O or touches a store.
 */

import { assertNever } from '../runtime/assert-never.js';
import type { FieldError } from '../domain/form-field.js';
import { FieldName, firstMessageFor } from '../domain/form-field.js';
import type { SignUpError } from '../domain/sign-up-error.js';
import type { IdentityKind } from '../domain/sign-up-identity.js';
import type { ViewState } from './view-state.js';

export const CONNECTIVITY_MESSAGE = 'Problem connecting to server';

/** Field that carries errors for the identity currently collected. */
export function identityFieldFor(kind: IdentityKind): FieldName {
  switch (kind) {
    case 'email':
      return FieldName.Email;
    case 'phone':
      return FieldName.PhoneNumber;
    default:
      return assertNever(kind);
  }
}

/** Busy, with the previous outcome (message and field errors) cleared. */
export function startSubmission(state: ViewState, name: string, id: string): ViewState {
  return {
    ...state,
    busy: true,
    message: null,
    name: { value: name, error: null },
    id: { value: id, error: null },
  };
}

export function applyFieldErrors(state: ViewState, errors: readonly FieldError[]): ViewState {
  return {
    ...state,
    busy: false,
    name: { ...state.name, error: firstMessageFor(errors, FieldName.Name) },
    id: { ...state.id, error: firstMessageFor(errors, identityFieldFor(state.identityKind)) },
  };
}

export function applySignUpError(state: ViewState, error: SignUpError): ViewState {
  switch (error._tag) {
    case 'ValidationError':
      return applyFieldErrors(state, error.errors);
    case 'HttpError':
      return { ...state, busy: false, message: error.message };
    case 'ConnectivityError':
      return { ...state, busy: false, message: CONNECTIVITY_MESSAGE };
    default:
      return assertNever(error);
  }
}

export function applySignUpSuccess(state: ViewState): ViewState {
  return {
    ...state,
    busy: false,
    message: null,
    name: { ...state.name, error: null },
    id: { ...state.id, error: null },
  };
}

/** Changes which rule applies on the next submit; does not revalidate. */
export function switchIdentityKind(state: ViewState): ViewState {
  return { ...state, identityKind: state.identityKind === 'email' ? 'phone' : 'email' };
}

export function changeName(state: ViewState, value: string): ViewState {
  return { ...state, name: { ...state.name, value } };
}

export function changeId(state: ViewState, value: string): ViewState {
  return { ...state, id: { ...state.id, value } };
}
