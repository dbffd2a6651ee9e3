import type { TokenEndpoint } from './google.js';
import type { CredentialStore } from './store.js';
import { ReauthorizationRequiredError } from '../errors.js';
import type { AuthStatus, Credential, TokenSet } from '../../types/index.js';

export interface AuthSessionOptions {
  requiredScopes: string[];
  expirySkewMs?: number;
  now?: () => number;
  onDebug?: (message: string) => void;
}

export const DEFAULT_EXPIRY_SKEW_MS = 60_000;

export class AuthSession {
  private expirySkewMs: number;
  private now: () => number;

  constructor(
    private readonly endpoint: TokenEndpoint,
    private readonly store: CredentialStore,
    private readonly options: AuthSessionOptions
  ) {
    this.expirySkewMs = options.expirySkewMs ?? DEFAULT_EXPIRY_SKEW_MS;
    this.now = options.now ?? Date.now;
  }

  isExpired(credential: Credential): boolean {
    if (credential.expiresAt === undefined) return false;
    return credential.expiresAt - this.expirySkewMs <= this.now();
  }

  hasRequiredScopes(credential: Credential): boolean {
    return this.options.requiredScopes.every((scope) => credential.scopes.includes(scope));
  }

  async status(): Promise<AuthStatus> {
    const { credential } = await this.store.load();
    if (!credential || !this.hasRequiredScopes(credential)) {
      return { kind: 'unauthenticated' };
    }
    if (!this.isExpired(credential)) {
      return { kind: 'authenticated', expiresAt: credential.expiresAt, scopes: credential.scopes };
    }
    if (credential.refreshToken) {
      return { kind: 'refreshable', expiresAt: credential.expiresAt, scopes: credential.scopes };
    }
    return { kind: 'unauthenticated' };
  }

  /**
   * Returns a credential that is usable right now, refreshing it first when
   * it has expired. Anything that cannot be repaired clears the stored
   * credential and demands a new sign-in.
   */
  async getValidCredential(): Promise<Credential> {
    const session = await this.store.load();
    const credential = session.credential;

    if (!credential) {
      throw new ReauthorizationRequiredError('missing');
    }
    if (!this.hasRequiredScopes(credential)) {
      await this.reset();
      throw new ReauthorizationRequiredError('scope');
    }
    if (!this.isExpired(credential)) {
      return credential;
    }
    if (!credential.refreshToken) {
      await this.reset();
      throw new ReauthorizationRequiredError('expired');
    }

    this.options.onDebug?.('Access token expired, refreshing');
    let tokens: TokenSet;
    try {
      tokens = await this.endpoint.refresh(credential.refreshToken);
    } catch (error) {
      await this.reset();
      throw new ReauthorizationRequiredError('refresh-failed', { cause: error });
    }

    const refreshed: Credential = {
      ...credential,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken ?? credential.refreshToken,
      scopes: tokens.scopes ?? credential.scopes,
      // no reported lifetime: the next use refreshes again
      expiresAt: tokens.expiresAt ?? credential.expiresAt,
    };
    await this.store.save({ ...session, credential: refreshed });
    return refreshed;
  }

  async reset(): Promise<void> {
    await this.store.clear();
  }
}
