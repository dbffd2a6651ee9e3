import { randomBytes } from 'crypto';
import type { TokenEndpoint } from './google.js';
import type { CredentialStore } from './store.js';
import {
  AuthorizationDeniedError,
  StateMismatchError,
  TokenExchangeError,
} from '../errors.js';
import type { CallbackParams, Credential, TokenSet } from '../../types/index.js';

export interface AuthorizationFlowOptions {
  clientId: string;
  clientSecret?: string;
  scopes: string[];
  createState?: () => string;
}

export interface AuthorizationRequest {
  url: string;
  state: string;
}

export function createStateToken(): string {
  return randomBytes(24).toString('base64url');
}

export class AuthorizationFlow {
  private createState: () => string;

  constructor(
    private readonly endpoint: TokenEndpoint,
    private readonly store: CredentialStore,
    private readonly options: AuthorizationFlowOptions
  ) {
    this.createState = options.createState ?? createStateToken;
  }

  async beginAuthorization(): Promise<AuthorizationRequest> {
    const state = this.createState();
    const session = await this.store.load();
    await this.store.save({ ...session, pendingState: state });

    const url = this.endpoint.authorizationUrl({ scopes: this.options.scopes, state });
    return { url, state };
  }

  /**
   * Verifies the callback against the pending state and exchanges the code.
   * The pending state is consumed whatever the outcome, so any failure means
   * starting over from beginAuthorization().
   */
  async completeAuthorization(params: CallbackParams): Promise<Credential> {
    const session = await this.store.load();
    const expectedState = session.pendingState;
    delete session.pendingState;
    await this.store.save(session);

    if (params.error) {
      throw new AuthorizationDeniedError(params.error);
    }
    if (!expectedState || params.state !== expectedState) {
      throw new StateMismatchError();
    }
    if (!params.code) {
      throw new AuthorizationDeniedError('no authorization code in callback');
    }

    let tokens: TokenSet;
    try {
      tokens = await this.endpoint.exchangeCode(params.code);
    } catch (error) {
      throw new TokenExchangeError(error);
    }

    const credential: Credential = {
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken,
      tokenUri: this.endpoint.tokenUri,
      clientId: this.options.clientId,
      clientSecret: this.options.clientSecret,
      scopes: tokens.scopes ?? [...this.options.scopes],
      expiresAt: tokens.expiresAt,
    };

    await this.store.save({ ...session, credential });
    return credential;
  }
}
