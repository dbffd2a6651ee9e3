import { google, type Auth } from 'googleapis';
import type { Credential, TokenSet } from '../../types/index.js';

export const GOOGLE_AUTH_URI = 'https://accounts.google.com/o/oauth2/auth';
export const GOOGLE_TOKEN_URI = 'https://oauth2.googleapis.com/token';

/**
 * The slice of an OAuth2 provider that the session needs. The Google
 * implementation below delegates to googleapis; tests substitute a fake.
 */
export interface TokenEndpoint {
  readonly tokenUri: string;
  authorizationUrl(request: { scopes: string[]; state: string }): string;
  exchangeCode(code: string): Promise<TokenSet>;
  refresh(refreshToken: string): Promise<TokenSet>;
}

export interface OAuthClientConfig {
  clientId: string;
  clientSecret?: string;
  redirectUri: string;
}

export class GoogleTokenEndpoint implements TokenEndpoint {
  readonly tokenUri = GOOGLE_TOKEN_URI;

  constructor(private readonly config: OAuthClientConfig) {}

  authorizationUrl(request: { scopes: string[]; state: string }): string {
    return this.createClient().generateAuthUrl({
      access_type: 'offline',
      include_granted_scopes: true,
      prompt: 'consent',
      scope: request.scopes,
      state: request.state,
    });
  }

  async exchangeCode(code: string): Promise<TokenSet> {
    const { tokens } = await this.createClient().getToken(code);
    return toTokenSet(tokens);
  }

  async refresh(refreshToken: string): Promise<TokenSet> {
    const client = this.createClient();
    client.setCredentials({ refresh_token: refreshToken });
    const { credentials } = await client.refreshAccessToken();
    return toTokenSet(credentials);
  }

  private createClient(): Auth.OAuth2Client {
    return new google.auth.OAuth2(this.config.clientId, this.config.clientSecret, this.config.redirectUri);
  }
}

export function toTokenSet(tokens: Auth.Credentials): TokenSet {
  if (!tokens.access_token) {
    throw new Error('Token response did not include an access token');
  }

  return {
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token ?? undefined,
    scopes: tokens.scope ? tokens.scope.split(' ').filter(Boolean) : undefined,
    expiresAt: tokens.expiry_date ?? undefined,
  };
}

export function createAuthorizedClient(credential: Credential): Auth.OAuth2Client {
  const client = new google.auth.OAuth2(credential.clientId, credential.clientSecret);
  client.setCredentials({
    access_token: credential.accessToken,
    refresh_token: credential.refreshToken,
    expiry_date: credential.expiresAt,
    scope: credential.scopes.join(' '),
  });
  return client;
}
