import type { Result } from 'neverthrow';
import { inject, injectable } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import { submitSignUp } from '../application/use-cases/submit-sign-up.js';
import type { SignUpError } from '../domain/sign-up-error.js';
import type { Token } from '../domain/token.js';
import type { UserRepository } from '../domain/user-repository.js';
import {
  applySignUpError,
  applySignUpSuccess,
  changeId,
  changeName,
  startSubmission,
  switchIdentityKind,
} from './reducer.js';
import type { ReadonlyStateStore, StateStore } from './state-store.js';
import { InMemoryStateStore } from './state-store.js';
import type { ViewState } from './view-state.js';
import { DEFAULT_VIEW_STATE } from './view-state.js';

/**
 * Sign-up form session.
 *
 * Receives UI intents, owns the only writer to the form's ViewState, and
 * drives submissions through the use case. Resolve one per form session.
 */
@injectable()
export class SignUpController {
  private readonly store: StateStore<ViewState> = new InMemoryStateStore(DEFAULT_VIEW_STATE);
  private readonly logger: Logger;
  private inFlight: Promise<Result<Token, SignUpError>> | null = null;

  constructor(
    @inject(DI.SignUp.UserRepository) private readonly userRepository: UserRepository,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('SignUpController');
  }

  get state(): ReadonlyStateStore<ViewState> {
    return this.store;
  }

  /**
   * Submit the form with the identity kind currently selected.
   *
   * While a submission is in flight, further calls join it: they get the same
   * result and cause neither a second remote call nor a state change.
   */
  onSubmit(name: string, id: string): Promise<Result<Token, SignUpError>> {
    if (this.inFlight) {
      this.logger.debug('Submission already in flight, joining it');
      return this.inFlight;
    }

    const identityKind = this.store.snapshot().identityKind;
    this.store.update((s) => startSubmission(s, name, id));
    this.logger.debug({ identityKind }, 'Submitting sign-up');

    const submission = this.runSubmission(name, id, identityKind);
    this.inFlight = submission;
    return submission;
  }

  onSwitchIdentityKind(): void {
    this.store.update(switchIdentityKind);
  }

  onNameChange(value: string): void {
    this.store.update((s) => changeName(s, value));
  }

  onIdChange(value: string): void {
    this.store.update((s) => changeId(s, value));
  }

  private async runSubmission(
    name: string,
    rawId: string,
    identityKind: ViewState['identityKind']
  ): Promise<Result<Token, SignUpError>> {
    try {
      const result = await submitSignUp({ name, rawId, identityKind }, { userRepository: this.userRepository });

      this.store.update((s) =>
        result.match(
          () => applySignUpSuccess(s),
          (error) => applySignUpError(s, error)
        )
      );
      this.logger.debug({ identityKind, outcome: result.isOk() ? 'ok' : result.error._tag }, 'Submission settled');

      return result;
    } finally {
      this.inFlight = null;
    }
  }
}
