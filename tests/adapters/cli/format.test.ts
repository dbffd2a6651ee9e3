import { describe, it, expect } from 'vitest';
import {
  formatAuditLine,
  formatItemLine,
  formatPlaylistLine,
  formatRemovalSummary,
  formatStatus,
} from '../../../src/adapters/cli/format.js';
import { isConfirmation } from '../../../src/adapters/cli/prompt.js';
import { parseTimeoutSeconds } from '../../../src/adapters/cli/commands/auth.js';
import type { PlaylistItem } from '../../../src/types/index.js';

const item: PlaylistItem = {
  id: 'item-1',
  videoId: 'vid-1',
  title: 'First',
  channel: 'Test Channel',
  link: 'https://www.youtube.com/watch?v=vid-1',
  position: 0,
};

describe('CLI formatting', () => {
  it('numbers playlists from one', () => {
    expect(formatPlaylistLine({ id: 'PL1', title: 'Favourites', itemCount: 12 }, 0)).toBe(
      '  1. Favourites (12 items)  [PL1]'
    );
    expect(formatPlaylistLine({ id: 'PL2', title: 'Later' }, 9)).toBe(' 10. Later  [PL2]');
  });

  it('shows items with channel and video id', () => {
    expect(formatItemLine(item, 1)).toBe('  2. First · Test Channel  [vid-1]');
    expect(formatItemLine({ ...item, title: '', channel: '', videoId: '' }, 0)).toBe(
      '  1. (no title)  [unavailable]'
    );
  });

  it('prints an audit record on one line', () => {
    expect(
      formatAuditLine({
        videoId: 'vid-1',
        title: 'First',
        link: item.link,
        channel: 'Test Channel',
        playlistId: 'PL1',
        playlistName: 'Favourites',
        removedAt: '2026-10-01T12:00:00.000Z',
      })
    ).toBe('2026-10-01T12:00:00.000Z  Favourites  First  [vid-1]');
  });

  it('describes each sign-in state', () => {
    expect(formatStatus({ kind: 'unauthenticated' })).toBe('Not signed in');
    expect(formatStatus({ kind: 'authenticated', scopes: [] })).toBe('Signed in');
    expect(formatStatus({ kind: 'authenticated', scopes: [], expiresAt: Date.UTC(2026, 9, 1, 12) })).toBe(
      'Signed in; access token valid until 2026-10-01T12:00:00.000Z'
    );
    expect(formatStatus({ kind: 'refreshable', scopes: [] })).toBe(
      'Signed in; access token expired and will be refreshed on next use'
    );
  });

  it('summarizes partial removals', () => {
    expect(formatRemovalSummary({ attempted: 2, removed: [item], failed: [] })).toBe('1/2 removed');
    expect(
      formatRemovalSummary({ attempted: 2, removed: [item], failed: [{ item, error: new Error('boom') }] })
    ).toBe('1/2 removed, 1 failed');
  });
});

describe('prompt answers', () => {
  it('accepts only y and yes as confirmation', () => {
    expect(isConfirmation(' Y ')).toBe(true);
    expect(isConfirmation('yes')).toBe(true);
    expect(isConfirmation('')).toBe(false);
    expect(isConfirmation('nope')).toBe(false);
  });

  it('converts the login timeout to milliseconds', () => {
    expect(parseTimeoutSeconds('90')).toBe(90_000);
    expect(() => parseTimeoutSeconds('0')).toThrow('Invalid timeout: 0');
    expect(() => parseTimeoutSeconds('soon')).toThrow('Invalid timeout: soon');
  });
});
