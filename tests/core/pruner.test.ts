import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PlaylistPruner, type PrunerCallbacks } from '../../src/core/pruner.js';
import { MemoryCredentialStore } from '../../src/core/auth/store.js';
import { AuditLog } from '../../src/core/audit/log.js';
import { ReauthorizationRequiredError, YouTubeApiError } from '../../src/core/errors.js';
import { DEFAULT_SCOPES } from '../../src/core/config/loader.js';
import type { AppConfig, Credential } from '../../src/types/index.js';
import { FakePlaylistApi, FakeTokenEndpoint, makeApiItem, makeApiPlaylist } from '../helpers/fakes.js';

const credential: Credential = {
  accessToken: 'test-access',
  refreshToken: 'test-refresh',
  tokenUri: 'https://oauth.example.test/token',
  clientId: 'test-client',
  scopes: [...DEFAULT_SCOPES],
};

function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    clientId: 'test-client',
    redirectUri: 'http://127.0.0.1:8765/oauth2callback',
    scopes: [...DEFAULT_SCOPES],
    credentialsFile: 'unused.json',
    sessionOnly: true,
    auditDb: ':memory:',
    resetOnError: true,
    ...overrides,
  };
}

describe('PlaylistPruner', () => {
  let api: FakePlaylistApi;
  let store: MemoryCredentialStore;
  let audit: AuditLog;
  let callbacks: Required<PrunerCallbacks>;

  function makePruner(overrides: Partial<AppConfig> = {}): PlaylistPruner {
    return new PlaylistPruner(
      makeConfig(overrides),
      { endpoint: new FakeTokenEndpoint(), store, audit, createApi: () => api },
      callbacks
    );
  }

  beforeEach(() => {
    api = new FakePlaylistApi();
    store = new MemoryCredentialStore({ credential });
    audit = new AuditLog(':memory:');
    callbacks = { onProgress: vi.fn(), onDebug: vi.fn(), onSessionReset: vi.fn() };
  });

  afterEach(() => {
    audit.close();
  });

  it('lists playlist items through the signed-in session', async () => {
    api.itemPages.PL1 = {
      '': { items: [makeApiItem('item-1', 'vid-1', 'First')], nextPageToken: 'p2' },
      p2: { items: [makeApiItem('item-2', 'vid-2', 'Second')] },
    };

    const items = await makePruner().listPlaylistItems('PL1');

    expect(items.map((item) => item.id)).toEqual(['item-1', 'item-2']);
    expect(callbacks.onProgress).toHaveBeenCalledWith('Fetching items of playlist PL1...');
  });

  it('requires a sign-in when nothing is stored', async () => {
    store = new MemoryCredentialStore();

    await expect(makePruner().listPlaylists()).rejects.toBeInstanceOf(ReauthorizationRequiredError);
    expect(api.playlistRequests).toEqual([]);
  });

  it('clears the session after an authorization failure from the API', async () => {
    const failure = new YouTubeApiError(401, 'Listing playlists: Invalid Credentials');
    api.listError = failure;

    await expect(makePruner().listPlaylists()).rejects.toBe(failure);
    expect(await store.load()).toEqual({});
    expect(callbacks.onSessionReset).toHaveBeenCalledWith(failure);
  });

  it('keeps the session when reset on error is disabled', async () => {
    api.listError = new YouTubeApiError(500, 'Listing playlists: Backend Error');

    await expect(makePruner({ resetOnError: false }).listPlaylists()).rejects.toThrow('Backend Error');
    expect(await store.load()).toEqual({ credential });
    expect(callbacks.onSessionReset).not.toHaveBeenCalled();
  });

  it('does not reset the session for per-item removal failures', async () => {
    api.failingDeletes.set('item-1', new YouTubeApiError(404, 'Deleting playlist item: Not Found'));
    const playlist = { id: 'PL1', title: 'Favourites' };
    const item = {
      id: 'item-1',
      videoId: 'vid-1',
      title: 'First',
      channel: 'Test Channel',
      link: 'https://www.youtube.com/watch?v=vid-1',
      position: 0,
    };

    const result = await makePruner().removeItems(playlist, [item]);

    expect(result.failed.map((failure) => failure.error.message)).toEqual(['Deleting playlist item: Not Found']);
    expect(await store.load()).toEqual({ credential });
    expect(callbacks.onSessionReset).not.toHaveBeenCalled();
    expect(audit.count()).toBe(1);
  });

  it('resolves a playlist URL to the named playlist', async () => {
    api.playlistPages = { '': { items: [makeApiPlaylist('PL1', 'Favourites', 3)] } };

    const playlist = await makePruner().resolvePlaylist('https://www.youtube.com/playlist?list=PL1');

    expect(playlist).toEqual({ id: 'PL1', title: 'Favourites', itemCount: 3, privacyStatus: undefined });
  });

  it('falls back to the id for playlists the user does not own', async () => {
    const playlist = await makePruner().resolvePlaylist('PLother');

    expect(playlist).toEqual({ id: 'PLother', title: 'PLother' });
  });

  it('reads back the audit trail', async () => {
    audit.record({
      videoId: 'vid-1',
      title: 'First',
      link: 'https://www.youtube.com/watch?v=vid-1',
      channel: 'Test Channel',
      playlistId: 'PL1',
      playlistName: 'Favourites',
      removedAt: '2026-10-01T12:00:00.000Z',
    });

    expect(makePruner().auditRecords({ playlistId: 'PL2' })).toEqual([]);
    expect(makePruner().auditRecords().map((record) => record.videoId)).toEqual(['vid-1']);
  });
});
