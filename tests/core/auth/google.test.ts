import { describe, it, expect } from 'vitest';
import { toTokenSet } from '../../../src/core/auth/google.js';

describe('toTokenSet', () => {
  it('maps a full token response', () => {
    expect(
      toTokenSet({
        access_token: 'test-access',
        refresh_token: 'test-refresh',
        expiry_date: 1_700_000_000_000,
        scope: 'https://www.googleapis.com/auth/youtube  openid',
        token_type: 'Bearer',
      })
    ).toEqual({
      accessToken: 'test-access',
      refreshToken: 'test-refresh',
      scopes: ['https://www.googleapis.com/auth/youtube', 'openid'],
      expiresAt: 1_700_000_000_000,
    });
  });

  it('leaves out null refresh token, expiry and scope', () => {
    expect(toTokenSet({ access_token: 'test-access', refresh_token: null, expiry_date: null })).toEqual({
      accessToken: 'test-access',
      refreshToken: undefined,
      scopes: undefined,
      expiresAt: undefined,
    });
  });

  it('rejects a response without an access token', () => {
    expect(() => toTokenSet({ access_token: null, refresh_token: 'test-refresh' })).toThrow(
      'Token response did not include an access token'
    );
    expect(() => toTokenSet({})).toThrow('Token response did not include an access token');
  });
});
