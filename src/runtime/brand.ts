/**
 * Brand helper for "parse, don't validate".
 *
 * A branded value can only be produced by the parser that owns the brand, so
 * holding one proves the rule already ran. Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
