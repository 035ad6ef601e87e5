// DI Container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Runtime
export type { NonEmptyArray } from './runtime/non-empty.js';
export { nonEmpty, fromArray, isNonEmpty } from './runtime/non-empty.js';
export type { Validated, Valid, Invalid } from './runtime/validated.js';
export {
  valid,
  invalid,
  invalidOne,
  isValid,
  isInvalid,
  fromNullable,
  map,
  mapErrors,
  combine2,
  combine3,
  toResult,
  match,
} from './runtime/validated.js';

// Domain
export type { FieldError } from './domain/form-field.js';
export { FieldName, parseFieldName } from './domain/form-field.js';
export type { SignUpIdentity, IdentityKind, EmailIdentity, PhoneIdentity } from './domain/sign-up-identity.js';
export { validateName, validateEmail, validatePhoneNumber } from './domain/validators.js';
export type { SignUpPayload } from './domain/sign-up-payload.js';
export { createEmail, createPhone, createForKind, emailOf, phoneNumberOf } from './domain/sign-up-payload.js';
export type { SignUpError, ValidationError, HttpError, ConnectivityError } from './domain/sign-up-error.js';
export { SignUpErr, describeSignUpError } from './domain/sign-up-error.js';
export type { Token } from './domain/token.js';
export type { UserRepository } from './domain/user-repository.js';

// Application
export { submitSignUp } from './application/use-cases/submit-sign-up.js';
export type { SubmitSignUpArgs, SubmitSignUpPorts } from './application/use-cases/submit-sign-up.js';

// Infrastructure
export type { SignUpApi, SignUpApiResponse } from './infrastructure/sign-up/sign-up-api.port.js';
export type { SignUpBody } from './infrastructure/sign-up/dto.js';
export { InMemorySignUpApi } from './infrastructure/sign-up/in-memory-sign-up-api.js';
export { RemoteUserRepository } from './infrastructure/sign-up/remote-user-repository.js';

// Presentation
export type { ViewState, FormFieldState } from './presentation/view-state.js';
export { DEFAULT_VIEW_STATE, NAME_LABEL, idLabel, switchButtonLabel } from './presentation/view-state.js';
export * as reducer from './presentation/reducer.js';
export type { StateStore, ReadonlyStateStore, Unsubscribe } from './presentation/state-store.js';
export { InMemoryStateStore } from './presentation/state-store.js';
export { SignUpController } from './presentation/sign-up-controller.js';

// Config & errors
export type { AppConfig, ValidatedConfig } from './config/app-config.js';
export { loadConfig, createValidatedConfig } from './config/app-config.js';
export type { AppError } from './errors/index.js';
export { formatAppError } from './errors/index.js';
