/** Opaque credential returned by a successful sign-up. */
export interface Token {
  readonly value: string;
}

export const toToken = (value: string): Token => ({ value });
