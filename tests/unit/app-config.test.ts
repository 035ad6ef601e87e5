import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config/app-config.js';
import { formatAppError } from '../../src/errors/formatter.js';
import { AppErr } from '../../src/errors/factories.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = expectOk(loadConfig({ env: {} }), 'loadConfig');

    expect(config).toEqual({
      logging: { level: 'silent' },
      api: { latencyMs: 0, connectivity: { kind: 'online' } },
    });
  });

  it('reads every variable', () => {
    const config = expectOk(
      loadConfig({
        env: { SIGNUP_LOG_LEVEL: 'DEBUG', SIGNUP_API_LATENCY_MS: '250', SIGNUP_API_OFFLINE: '1' },
      }),
      'loadConfig'
    );

    expect(config).toEqual({
      logging: { level: 'debug' },
      api: { latencyMs: 250, connectivity: { kind: 'offline' } },
    });
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ env: { PATH: '/usr/bin', HOME: '/root' } }).isOk()).toBe(true);
  });

  it('reports each invalid variable as an issue', () => {
    const error = expectErr(
      loadConfig({ env: { SIGNUP_API_LATENCY_MS: '-5', SIGNUP_API_OFFLINE: 'yes' } }),
      'loadConfig'
    );

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues).toEqual([
      { path: 'SIGNUP_API_LATENCY_MS', message: 'SIGNUP_API_LATENCY_MS cannot be negative' },
      { path: 'SIGNUP_API_OFFLINE', message: expect.stringContaining("Expected '0' | '1'") },
    ]);
  });

  it('formats config errors one issue per line', () => {
    const error = expectErr(loadConfig({ env: { SIGNUP_API_LATENCY_MS: '1.5' } }), 'loadConfig');

    expect(formatAppError(error)).toBe(
      'Invalid configuration\n\n  - SIGNUP_API_LATENCY_MS: SIGNUP_API_LATENCY_MS must be a whole number of milliseconds'
    );
  });
});

describe('formatAppError', () => {
  it('appends the cause of an unexpected failure', () => {
    const error = AppErr.unexpected('Container registration failed', new TypeError('boom'));

    expect(formatAppError(error)).toBe('Container registration failed\nCause: TypeError: boom');
  });
});
