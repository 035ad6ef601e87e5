/**
 * Redaction configuration for pino.
 *
 * Tokens are credentials; email addresses and phone numbers are personal data.
 * Neither belongs in logs.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    '*.token',
    'password',
    '*.password',

    // Sign-up request bodies
    'body.email',
    'body.phoneNumber',

    // Domain payloads
    'identity.value',
    'payload.identity.value',
  ],
  censor: '[REDACTED]',
};
