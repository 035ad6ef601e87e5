/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { AppErr } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';
import { LOG_LEVELS } from '../core/logging/types.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type ApiLatencyMs = Brand<number, 'ApiLatencyMs'>;

export type ApiConnectivity = { readonly kind: 'online' } | { readonly kind: 'offline' };

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
  readonly api: {
    /** Delay the in-memory sign-up API waits before answering */
    readonly latencyMs: ApiLatencyMs;
    /** `offline` makes the in-memory API fail every call with a connectivity fault */
    readonly connectivity: ApiConnectivity;
  };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const EnvSchema = z.object({
  SIGNUP_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('silent')),

  SIGNUP_API_LATENCY_MS: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('SIGNUP_API_LATENCY_MS must be a whole number of milliseconds')
        .min(0, 'SIGNUP_API_LATENCY_MS cannot be negative')
        .max(60_000, 'SIGNUP_API_LATENCY_MS cannot exceed 60 seconds (60000ms)')
        .default(0)
    ),

  SIGNUP_API_OFFLINE: z.enum(['0', '1']).default('0'),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(AppErr.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  const connectivity: ApiConnectivity =
    env.SIGNUP_API_OFFLINE === '1' ? { kind: 'offline' } : { kind: 'online' };

  return {
    logging: { level: env.SIGNUP_LOG_LEVEL },
    api: {
      latencyMs: env.SIGNUP_API_LATENCY_MS as ApiLatencyMs,
      connectivity,
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
