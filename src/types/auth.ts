export interface Credential {
  accessToken: string;
  refreshToken?: string;
  tokenUri: string;
  clientId: string;
  clientSecret?: string;
  scopes: string[];
  expiresAt?: number; // epoch ms
}

export interface StoredSession {
  credential?: Credential;
  pendingState?: string;
}

export interface TokenSet {
  accessToken: string;
  refreshToken?: string;
  scopes?: string[];
  expiresAt?: number;
}

export interface CallbackParams {
  code?: string;
  state?: string;
  error?: string;
}

export type AuthStatus =
  | { kind: 'unauthenticated' }
  | { kind: 'authenticated'; expiresAt?: number; scopes: string[] }
  | { kind: 'refreshable'; expiresAt?: number; scopes: string[] };

export type ReauthorizationReason = 'missing' | 'scope' | 'expired' | 'refresh-failed';
