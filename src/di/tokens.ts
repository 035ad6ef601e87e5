/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by concern.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the matching namespace
 * 2. Register it in container.ts (skip if already registered, so tests can override)
 * 3. Use @inject(DI.YourToken) on every constructor parameter
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Parsed, branded application config */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** ILoggerFactory */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // SIGN-UP
  // ═══════════════════════════════════════════════════════════════════
  SignUp: {
    /** Remote collaborator (transport) */
    Api: Symbol('SignUp.Api'),
    /** UserRepository port */
    UserRepository: Symbol('SignUp.UserRepository'),
  },
} as const;
