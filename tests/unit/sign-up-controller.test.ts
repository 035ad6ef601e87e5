import { describe, it, expect, beforeEach } from 'vitest';
import { SignUpController } from '../../src/presentation/sign-up-controller.js';
import { RemoteUserRepository } from '../../src/infrastructure/sign-up/remote-user-repository.js';
import { CONNECTIVITY_MESSAGE } from '../../src/presentation/reducer.js';
import type { ViewState } from '../../src/presentation/view-state.js';
import { DEFAULT_VIEW_STATE } from '../../src/presentation/view-state.js';
import { NAME_BLANK } from '../../src/domain/validators.js';
import { PHONE_MISSING_PLUS } from '../../src/domain/sign-up-identity.js';
import type { SignUpApi } from '../../src/infrastructure/sign-up/sign-up-api.port.js';
import { ScriptedSignUpApi } from '../fakes/sign-up-api.fake.js';
import { FakeLoggerFactory } from '../helpers/FakeLoggerFactory.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

function controllerFor(api: SignUpApi): SignUpController {
  const loggers = new FakeLoggerFactory();
  return new SignUpController(new RemoteUserRepository(api, loggers), loggers);
}

describe('SignUpController', () => {
  let history: ViewState[];

  function record(controller: SignUpController): void {
    controller.state.subscribe((s) => history.push(s));
  }

  beforeEach(() => {
    history = [];
  });

  it('starts from the default state', () => {
    expect(controllerFor(ScriptedSignUpApi.succeeding('abc')).state.snapshot()).toEqual(DEFAULT_VIEW_STATE);
  });

  it('signs up with a valid email and ends idle without errors', async () => {
    const api = ScriptedSignUpApi.succeeding('abc');
    const controller = controllerFor(api);
    record(controller);

    const result = await controller.onSubmit('Stojan', 'stojan@example.com');

    expect(expectOk(result, 'onSubmit')).toEqual({ value: 'abc' });
    expect(controller.state.snapshot()).toEqual({
      busy: false,
      message: null,
      identityKind: 'email',
      name: { value: 'Stojan', error: null },
      id: { value: 'stojan@example.com', error: null },
    });
    expect(history.map((s) => s.busy)).toEqual([true, false]);
  });

  it('publishes the busy state before the remote call answers', async () => {
    const api = ScriptedSignUpApi.succeeding('abc').hold();
    const controller = controllerFor(api);

    const pending = controller.onSubmit('Stojan', 'stojan@example.com');
    expect(controller.state.snapshot().busy).toBe(true);

    api.release();
    await pending;
    expect(controller.state.snapshot().busy).toBe(false);
  });

  it('does not call the server for an invalid form', async () => {
    const api = ScriptedSignUpApi.succeeding('abc');
    const controller = controllerFor(api);

    const result = await controller.onSubmit('', 'bad');

    expect(api.calls).toHaveLength(0);
    expect(expectErr(result, 'onSubmit')._tag).toBe('ValidationError');
    expect(controller.state.snapshot().name.error).toBe(NAME_BLANK);
    expect(controller.state.snapshot().busy).toBe(false);
  });

  it('shows a server field error on the identity field only', async () => {
    const api = ScriptedSignUpApi.responding(409, {
      message: 'dup',
      errors: [{ field: 'email', errors: ['taken'] }],
    });
    const controller = controllerFor(api);

    await controller.onSubmit('Stojan', 'stojan@example.com');

    const state = controller.state.snapshot();
    expect(state.id.error).toBe('taken');
    expect(state.name.error).toBeNull();
    expect(state.message).toBeNull();
    expect(state.busy).toBe(false);
  });

  it('shows the generic message on connectivity failure', async () => {
    const controller = controllerFor(ScriptedSignUpApi.unreachable());

    const result = await controller.onSubmit('Stojan', 'stojan@example.com');

    expect(expectErr(result, 'onSubmit')._tag).toBe('ConnectivityError');
    const state = controller.state.snapshot();
    expect(state.message).toBe(CONNECTIVITY_MESSAGE);
    expect(state.name.error).toBeNull();
    expect(state.id.error).toBeNull();
  });

  it('settles idle with the generic message when the API throws synchronously', async () => {
    const controller = controllerFor({
      signUp: () => {
        throw new Error('socket closed');
      },
    });

    const result = await controller.onSubmit('Stojan', 'stojan@example.com');

    expect(expectErr(result, 'onSubmit')._tag).toBe('ConnectivityError');
    expect(controller.state.snapshot().busy).toBe(false);
    expect(controller.state.snapshot().message).toBe(CONNECTIVITY_MESSAGE);
  });

  it('validates with the phone rule after switching identity kind', async () => {
    const api = ScriptedSignUpApi.succeeding('abc');
    const controller = controllerFor(api);

    controller.onSwitchIdentityKind();
    await controller.onSubmit('Stojan', '070123456');

    expect(controller.state.snapshot().identityKind).toBe('phone');
    expect(controller.state.snapshot().id.error).toBe(PHONE_MISSING_PLUS);
    expect(api.calls).toHaveLength(0);
  });

  it('joins an in-flight submission instead of starting another', async () => {
    const api = ScriptedSignUpApi.succeeding('abc').hold();
    const controller = controllerFor(api);
    record(controller);

    const first = controller.onSubmit('Stojan', 'stojan@example.com');
    const second = controller.onSubmit('Someone else', 'other@example.com');
    api.release();

    expect(second).toBe(first);
    expect(expectOk(await second, 'second onSubmit')).toEqual({ value: 'abc' });
    expect(api.calls).toEqual([{ name: 'Stojan', email: 'stojan@example.com' }]);
    expect(history.map((s) => s.busy)).toEqual([true, false]);
  });

  it('accepts a new submission once the previous one settled', async () => {
    const api = ScriptedSignUpApi.succeeding('abc');
    const controller = controllerFor(api);

    await controller.onSubmit('Stojan', 'stojan@example.com');
    await controller.onSubmit('Ana', 'ana@example.com');

    expect(api.calls).toHaveLength(2);
  });

  it('live edits update field values', () => {
    const controller = controllerFor(ScriptedSignUpApi.succeeding('abc'));

    controller.onNameChange('Sto');
    controller.onIdChange('sto@');

    expect(controller.state.snapshot().name.value).toBe('Sto');
    expect(controller.state.snapshot().id.value).toBe('sto@');
  });
});
