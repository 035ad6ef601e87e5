/**
 * Validated type (accumulating validation).
 *
 * Counterpart to `Result` from neverthrow:
 * - `Result` stops at the first failure (dependent steps)
 * - `Validated` collects every failure (independent checks)
 *
 * `toResult` is the seam between the two: validate all fields, then continue
 * on a single railway.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { NonEmptyArray } from './non-empty.js';
import { concat } from './non-empty.js';

export type Valid<A> = { readonly kind: 'valid'; readonly value: A };
export type Invalid<E> = { readonly kind: 'invalid'; readonly errors: NonEmptyArray<E> };

export type Validated<A, E> = Valid<A> | Invalid<E>;

export const valid = <A>(value: A): Validated<A, never> => ({ kind: 'valid', value });
export const invalid = <E>(errors: NonEmptyArray<E>): Validated<never, E> => ({ kind: 'invalid', errors });
export const invalidOne = <E>(error: E): Validated<never, E> => invalid([error]);

export function isValid<A, E>(validated: Validated<A, E>): validated is Valid<A> {
  return validated.kind === 'valid';
}

export function isInvalid<A, E>(validated: Validated<A, E>): validated is Invalid<E> {
  return validated.kind === 'invalid';
}

/**
 * Lift an optional value. Used by single-cause rules that only report
 * "present or not".
 */
export function fromNullable<A, E>(
  value: A | null | undefined,
  onAbsent: () => NonEmptyArray<E>
): Validated<A, E> {
  return value === null || value === undefined ? invalid(onAbsent()) : valid(value);
}

export function map<A, E, B>(validated: Validated<A, E>, fn: (value: A) => B): Validated<B, E> {
  return validated.kind === 'valid' ? valid(fn(validated.value)) : validated;
}

/** Transforms the whole error sequence (e.g. wrapping raw messages in a field error). */
export function mapErrors<A, E, F>(
  validated: Validated<A, E>,
  fn: (errors: NonEmptyArray<E>) => NonEmptyArray<F>
): Validated<A, F> {
  return validated.kind === 'invalid' ? invalid(fn(validated.errors)) : validated;
}

/**
 * Combine two independent validations.
 *
 * `fn` runs only when both sides are valid. When both are invalid the errors
 * of `a` come before the errors of `b`.
 */
export function combine2<A, B, E, R>(
  a: Validated<A, E>,
  b: Validated<B, E>,
  fn: (a: A, b: B) => R
): Validated<R, E> {
  if (a.kind === 'invalid') {
    return b.kind === 'invalid' ? invalid(concat(a.errors, b.errors)) : a;
  }
  if (b.kind === 'invalid') {
    return b;
  }
  return valid(fn(a.value, b.value));
}

export function combine3<A, B, C, E, R>(
  a: Validated<A, E>,
  b: Validated<B, E>,
  c: Validated<C, E>,
  fn: (a: A, b: B, c: C) => R
): Validated<R, E> {
  const ab = combine2(a, b, (va, vb) => [va, vb] as const);
  return combine2(ab, c, ([va, vb], vc) => fn(va, vb, vc));
}

export function toResult<A, E>(validated: Validated<A, E>): Result<A, NonEmptyArray<E>> {
  return validated.kind === 'valid' ? ok(validated.value) : err(validated.errors);
}

export function match<A, E, R>(
  validated: Validated<A, E>,
  onValid: (value: A) => R,
  onInvalid: (errors: NonEmptyArray<E>) => R
): R {
  return validated.kind === 'valid' ? onValid(validated.value) : onInvalid(validated.errors);
}
