import type { AuditRecord, AuthStatus, Playlist, PlaylistItem, RemovalResult } from '../../types/index.js';

export function formatPlaylistLine(playlist: Playlist, index: number): string {
  const count = playlist.itemCount === undefined ? '' : ` (${playlist.itemCount} items)`;
  return `${String(index + 1).padStart(3)}. ${playlist.title}${count}  [${playlist.id}]`;
}

export function formatItemLine(item: PlaylistItem, index: number): string {
  const channel = item.channel ? ` · ${item.channel}` : '';
  const title = item.title || '(no title)';
  return `${String(index + 1).padStart(3)}. ${title}${channel}  [${item.videoId || 'unavailable'}]`;
}

export function formatAuditLine(record: AuditRecord): string {
  return `${record.removedAt}  ${record.playlistName}  ${record.title}  [${record.videoId}]`;
}

export function formatStatus(status: AuthStatus): string {
  switch (status.kind) {
    case 'unauthenticated':
      return 'Not signed in';
    case 'authenticated':
      return status.expiresAt === undefined
        ? 'Signed in'
        : `Signed in; access token valid until ${new Date(status.expiresAt).toISOString()}`;
    case 'refreshable':
      return 'Signed in; access token expired and will be refreshed on next use';
  }
}

export function formatRemovalSummary(result: RemovalResult): string {
  const parts = [`${result.removed.length}/${result.attempted} removed`];
  if (result.failed.length > 0) {
    parts.push(`${result.failed.length} failed`);
  }
  return parts.join(', ');
}
