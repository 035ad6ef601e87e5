/**
 * Ordered sequence with at least one element.
 *
 * Encoded as a readonly tuple so the head is typed as present
 * (`xs[0]` is `T`, not `T | undefined`).
 */
export type NonEmptyArray<T> = readonly [T, ...T[]];

export function nonEmpty<T>(head: T, ...tail: T[]): NonEmptyArray<T> {
  return [head, ...tail];
}

export function isNonEmpty<T>(items: readonly T[]): items is NonEmptyArray<T> {
  return items.length > 0;
}

/** Returns `null` for an empty input. */
export function fromArray<T>(items: readonly T[]): NonEmptyArray<T> | null {
  return isNonEmpty(items) ? items : null;
}

/** Left-to-right concatenation, no deduplication. */
export function concat<T>(left: NonEmptyArray<T>, right: readonly T[]): NonEmptyArray<T> {
  const [head, ...tail] = left;
  return [head, ...tail, ...right];
}

export function head<T>(items: NonEmptyArray<T>): T {
  return items[0];
}
