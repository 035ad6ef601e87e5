export type { AppError, ConfigIssue, ConfigInvalidError, UnexpectedError, ValidatedAppConfig } from './app-error.js';
export { AppErr } from './factories.js';
export { formatAppError } from './formatter.js';
