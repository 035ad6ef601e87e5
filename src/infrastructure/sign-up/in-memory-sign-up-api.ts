import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import type { ApiConnectivity } from '../../config/app-config.js';
import type { SignUpBody, SignUpErrorDto, SignUpResultDto } from './dto.js';
import type { SignUpApi, SignUpApiResponse } from './sign-up-api.port.js';

export interface InMemorySignUpApiOptions {
  readonly latencyMs?: number;
  readonly connectivity?: ApiConnectivity;
  readonly generateToken?: () => string;
}

export const USER_EXISTS_MESSAGE = 'User already exists';
export const INVALID_REQUEST_MESSAGE = 'Invalid sign-up request';

/**
 * In-process sign-up endpoint.
 *
 * Behaves like the real server as far as the client can tell: answers with
 * status + JSON body, re-checks the name, rejects already registered
 * identities, and rejects the call outright while offline.
 */
export class InMemorySignUpApi implements SignUpApi {
  private readonly emails = new Set<string>();
  private readonly phoneNumbers = new Set<string>();
  private readonly latencyMs: number;
  private readonly connectivity: ApiConnectivity;
  private readonly generateToken: () => string;

  constructor(options: InMemorySignUpApiOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
    this.connectivity = options.connectivity ?? { kind: 'online' };
    this.generateToken = options.generateToken ?? randomUUID;
  }

  async signUp(body: SignUpBody): Promise<SignUpApiResponse> {
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs);
    }
    if (this.connectivity.kind === 'offline') {
      throw new Error('Network unreachable');
    }

    if (body.name.trim().length === 0) {
      return reject(422, {
        message: INVALID_REQUEST_MESSAGE,
        errors: [{ field: 'name', errors: ['Name is required'] }],
      });
    }

    if (body.email !== undefined) {
      if (this.emails.has(body.email)) {
        return reject(409, {
          message: USER_EXISTS_MESSAGE,
          errors: [{ field: 'email', errors: ['Email is already taken'] }],
        });
      }
      this.emails.add(body.email);
    } else {
      if (this.phoneNumbers.has(body.phoneNumber)) {
        return reject(409, {
          message: USER_EXISTS_MESSAGE,
          errors: [{ field: 'phoneNumber', errors: ['Phone number is already taken'] }],
        });
      }
      this.phoneNumbers.add(body.phoneNumber);
    }

    const result: SignUpResultDto = { token: this.generateToken() };
    return { status: 201, body: result };
  }
}

function reject(status: number, body: SignUpErrorDto): SignUpApiResponse {
  return { status, body };
}
