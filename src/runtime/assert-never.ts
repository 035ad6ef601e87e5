/**
 * Exhaustiveness check for discriminated unions.
 *
 * Reaching it at runtime means a union member was added (or a value was forged)
 * without updating the `switch`; that is a programming error, so it throws.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled union member: ${JSON.stringify(value)}`);
}
