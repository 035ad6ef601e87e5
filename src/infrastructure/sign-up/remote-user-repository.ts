import type { Result } from 'neverthrow';
import { ResultAsync, ok, err } from 'neverthrow';
import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { FieldError } from '../../domain/form-field.js';
import { fieldError, parseFieldName } from '../../domain/form-field.js';
import type { SignUpError } from '../../domain/sign-up-error.js';
import { SignUpErr, describeSignUpError } from '../../domain/sign-up-error.js';
import type { SignUpPayload } from '../../domain/sign-up-payload.js';
import type { Token } from '../../domain/token.js';
import { toToken } from '../../domain/token.js';
import type { UserRepository } from '../../domain/user-repository.js';
import { assertNever } from '../../runtime/assert-never.js';
import { fromArray } from '../../runtime/non-empty.js';
import type { SignUpBody, SignUpErrorDto } from './dto.js';
import { SignUpErrorDtoSchema, SignUpResultDtoSchema } from './dto.js';
import type { SignUpApi, SignUpApiResponse } from './sign-up-api.port.js';

export const MALFORMED_RESPONSE_MESSAGE = 'Unexpected response from server';

/**
 * UserRepository backed by the sign-up endpoint.
 *
 * Translates transport outcomes into `SignUpError`:
 * - rejected or throwing call -> ConnectivityError
 * - error body w/ fields  -> ValidationError (unknown fields dropped)
 * - error body otherwise  -> HttpError
 * - unparseable body      -> HttpError
 */
@singleton()
export class RemoteUserRepository implements UserRepository {
  private readonly logger: Logger;

  constructor(
    @inject(DI.SignUp.Api) private readonly api: SignUpApi,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('RemoteUserRepository');
  }

  doSignUp(payload: SignUpPayload): ResultAsync<Token, SignUpError> {
    const send = ResultAsync.fromThrowable(
      (body: SignUpBody) => this.api.signUp(body),
      (cause): SignUpError => SignUpErr.connectivity(cause)
    );

    return send(toBody(payload))
      .andThen(interpretResponse)
      .map((token) => {
        this.logger.info({ identityKind: payload.identity.kind }, 'Sign-up accepted');
        return token;
      })
      .mapErr((error) => {
        this.logger.warn(
          { identityKind: payload.identity.kind, tag: error._tag },
          describeSignUpError(error)
        );
        return error;
      });
  }
}

// =============================================================================
// Mapping (pure)
// =============================================================================

export function toBody(payload: SignUpPayload): SignUpBody {
  switch (payload.identity.kind) {
    case 'email':
      return { name: payload.name, email: payload.identity.value };
    case 'phoneNumber':
      return { name: payload.name, phoneNumber: payload.identity.value };
    default:
      return assertNever(payload.identity);
  }
}

export function interpretResponse(response: SignUpApiResponse): Result<Token, SignUpError> {
  if (isSuccessStatus(response.status)) {
    const parsed = SignUpResultDtoSchema.safeParse(response.body);
    return parsed.success ? ok(toToken(parsed.data.token)) : err(SignUpErr.http(MALFORMED_RESPONSE_MESSAGE));
  }

  const parsed = SignUpErrorDtoSchema.safeParse(response.body);
  return err(parsed.success ? toDomainError(parsed.data) : SignUpErr.http(MALFORMED_RESPONSE_MESSAGE));
}

/**
 * Descriptors for fields this client does not know are ignored, whatever they
 * carry. A known field without messages makes the whole body malformed.
 */
export function toDomainError(dto: SignUpErrorDto): SignUpError {
  const recognized: FieldError[] = [];
  for (const descriptor of dto.errors) {
    const field = parseFieldName(descriptor.field);
    if (field === null) continue;

    const messages = fromArray(descriptor.errors);
    if (messages === null) {
      return SignUpErr.http(MALFORMED_RESPONSE_MESSAGE);
    }
    recognized.push(fieldError(field, messages));
  }

  const errors = fromArray(recognized);
  return errors ? SignUpErr.validation(errors) : SignUpErr.http(dto.message);
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
