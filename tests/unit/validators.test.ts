import { describe, it, expect } from 'vitest';
import { NAME_BLANK, parseName, validateEmail, validateName, validatePhoneNumber } from '../../src/domain/validators.js';
import {
  EMAIL_MISSING_AT,
  PHONE_MISSING_PLUS,
  PHONE_TOO_SHORT,
  parseEmail,
  parsePhoneNumber,
} from '../../src/domain/sign-up-identity.js';
import { FieldName } from '../../src/domain/form-field.js';

describe('validateName', () => {
  it.each(['', '   ', '\t\n'])('rejects blank input %j', (raw) => {
    expect(validateName(raw)).toEqual({
      kind: 'invalid',
      errors: [{ field: FieldName.Name, messages: [NAME_BLANK] }],
    });
  });

  it('keeps the input as typed', () => {
    expect(validateName('  Stojan ')).toEqual({ kind: 'valid', value: '  Stojan ' });
  });

  it('parseName returns null only for blank input', () => {
    expect(parseName(' ')).toBeNull();
    expect(parseName('A')).toBe('A');
  });
});

describe('validateEmail', () => {
  it('accepts anything containing @', () => {
    expect(validateEmail('a@b')).toEqual({ kind: 'valid', value: { kind: 'email', value: 'a@b' } });
    expect(validateEmail('@')).toEqual({ kind: 'valid', value: { kind: 'email', value: '@' } });
  });

  it('rejects input without @', () => {
    expect(validateEmail('not-an-email')).toEqual({
      kind: 'invalid',
      errors: [{ field: FieldName.Email, messages: [EMAIL_MISSING_AT] }],
    });
  });

  it('parseEmail returns null when the rule fails', () => {
    expect(parseEmail('nope')).toBeNull();
  });
});

describe('validatePhoneNumber', () => {
  it('reports both rules for empty input, start rule first', () => {
    expect(validatePhoneNumber('')).toEqual({
      kind: 'invalid',
      errors: [{ field: FieldName.PhoneNumber, messages: [PHONE_MISSING_PLUS, PHONE_TOO_SHORT] }],
    });
  });

  it('accepts +123456', () => {
    expect(validatePhoneNumber('+123456')).toEqual({
      kind: 'valid',
      value: { kind: 'phoneNumber', value: '+123456' },
    });
  });

  it('reports only the length rule for +123', () => {
    expect(validatePhoneNumber('+123')).toEqual({
      kind: 'invalid',
      errors: [{ field: FieldName.PhoneNumber, messages: [PHONE_TOO_SHORT] }],
    });
  });

  it('reports only the start rule for 12345', () => {
    expect(validatePhoneNumber('12345')).toEqual({
      kind: 'invalid',
      errors: [{ field: FieldName.PhoneNumber, messages: [PHONE_MISSING_PLUS] }],
    });
  });

  it('treats exactly 5 characters as long enough', () => {
    expect(parsePhoneNumber('+1234').kind).toBe('valid');
  });

  it('parsePhoneNumber yields raw messages before field scoping', () => {
    expect(parsePhoneNumber('1')).toEqual({ kind: 'invalid', errors: [PHONE_MISSING_PLUS, PHONE_TOO_SHORT] });
  });
});
