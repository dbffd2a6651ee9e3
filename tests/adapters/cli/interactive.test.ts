import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { listPlaylistsSignedIn } from '../../../src/adapters/cli/commands/interactive.js';
import { PlaylistPruner } from '../../../src/core/pruner.js';
import { MemoryCredentialStore } from '../../../src/core/auth/store.js';
import { AuditLog } from '../../../src/core/audit/log.js';
import { ReauthorizationRequiredError, YouTubeApiError } from '../../../src/core/errors.js';
import {
  FakePlaylistApi,
  FakeTokenEndpoint,
  makeApiPlaylist,
  makeTestConfig,
  testCredential,
} from '../../helpers/fakes.js';

describe('listPlaylistsSignedIn', () => {
  let api: FakePlaylistApi;
  let store: MemoryCredentialStore;
  let audit: AuditLog;
  let pruner: PlaylistPruner;

  beforeEach(() => {
    api = new FakePlaylistApi();
    api.playlistPages = { '': { items: [makeApiPlaylist('PL1', 'Favourites')] } };
    store = new MemoryCredentialStore({ credential: testCredential });
    audit = new AuditLog(':memory:');
    pruner = new PlaylistPruner(makeTestConfig(), {
      endpoint: new FakeTokenEndpoint(),
      store,
      audit,
      createApi: () => api,
    });
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    audit.close();
    vi.restoreAllMocks();
  });

  it('signs in again when the credential is gone', async () => {
    await store.clear();
    const signIn = vi.fn(async () => {
      await store.save({ credential: testCredential });
    });

    const playlists = await listPlaylistsSignedIn(pruner, signIn);

    expect(playlists.map((playlist) => playlist.id)).toEqual(['PL1']);
    expect(signIn).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith('⚠️  Not signed in; run "yt-pruner auth login"');
  });

  it('signs in again after the API rejects the token', async () => {
    api.listError = new YouTubeApiError(401, 'Failed to list playlists: Invalid Credentials');
    const signIn = vi.fn(async () => {
      api.listError = null;
      await store.save({ credential: testCredential });
    });

    const playlists = await listPlaylistsSignedIn(pruner, signIn);

    expect(playlists.map((playlist) => playlist.id)).toEqual(['PL1']);
    expect(signIn).toHaveBeenCalledTimes(1);
    expect(api.playlistRequests).toHaveLength(2);
  });

  it('passes other failures through without signing in', async () => {
    api.listError = new YouTubeApiError(500, 'Failed to list playlists: Backend Error');
    const signIn = vi.fn(async () => undefined);

    await expect(listPlaylistsSignedIn(pruner, signIn)).rejects.toThrow('Backend Error');
    expect(signIn).not.toHaveBeenCalled();
  });

  it('signs in only once', async () => {
    await store.clear();
    const signIn = vi.fn(async () => undefined);

    await expect(listPlaylistsSignedIn(pruner, signIn)).rejects.toBeInstanceOf(ReauthorizationRequiredError);
    expect(signIn).toHaveBeenCalledTimes(1);
  });
});
