import type { youtube_v3 } from 'googleapis';
import { MAX_PAGE_SIZE, type PlaylistApi } from './api.js';
import { collectPages } from './pagination.js';
import type { Playlist, PlaylistItem } from '../../types/index.js';

export interface ListPlaylistsOptions {
  all?: boolean;
}

export interface YouTubeClientOptions {
  onDebug?: (message: string) => void;
}

export function videoLink(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function toPlaylist(playlist: youtube_v3.Schema$Playlist): Playlist | null {
  if (!playlist.id) return null;
  return {
    id: playlist.id,
    title: playlist.snippet?.title || '(untitled)',
    itemCount: playlist.contentDetails?.itemCount ?? undefined,
    privacyStatus: playlist.status?.privacyStatus ?? undefined,
  };
}

export function toPlaylistItem(
  item: youtube_v3.Schema$PlaylistItem,
  fallbackPosition: number
): PlaylistItem | null {
  if (!item.id) return null;
  const videoId = item.contentDetails?.videoId || item.snippet?.resourceId?.videoId || '';
  return {
    id: item.id,
    videoId,
    title: item.snippet?.title || '',
    channel: item.snippet?.videoOwnerChannelTitle || '',
    link: videoId ? videoLink(videoId) : '',
    position: item.snippet?.position ?? fallbackPosition,
  };
}

export function parsePlaylistId(input: string): string {
  const trimmed = input.trim();
  const patterns = [
    /[?&]list=([a-zA-Z0-9_-]+)/,
    /^([a-zA-Z0-9_-]+)$/,
  ];

  for (const pattern of patterns) {
    const match = trimmed.match(pattern);
    if (match) return match[1];
  }

  throw new Error(`Invalid playlist id or URL: ${input}`);
}

export function filterItems(items: PlaylistItem[], query: string | undefined): PlaylistItem[] {
  const needle = query?.trim().toLowerCase();
  if (!needle) return items;
  return items.filter(
    (item) =>
      item.title.toLowerCase().includes(needle) ||
      item.channel.toLowerCase().includes(needle) ||
      item.videoId.toLowerCase() === needle
  );
}

export class YouTubeClient {
  constructor(
    private readonly api: PlaylistApi,
    private readonly options: YouTubeClientOptions = {}
  ) {}

  /**
   * Playlists owned by the signed-in user. Without `all` this is a single
   * page of at most 50, the provider's cap.
   */
  async listPlaylists(options: ListPlaylistsOptions = {}): Promise<Playlist[]> {
    const raw = options.all
      ? await collectPages(
          (pageToken) => this.api.listPlaylists({ pageToken, maxResults: MAX_PAGE_SIZE }),
          { keyOf: (playlist) => playlist.id ?? '' }
        )
      : (await this.api.listPlaylists({ maxResults: MAX_PAGE_SIZE })).items;

    return raw.map(toPlaylist).filter((playlist): playlist is Playlist => playlist !== null);
  }

  async listPlaylistItems(playlistId: string): Promise<PlaylistItem[]> {
    const raw = await collectPages(
      (pageToken) => this.api.listPlaylistItems(playlistId, { pageToken, maxResults: MAX_PAGE_SIZE }),
      {
        keyOf: (item) => item.id ?? '',
        onPage: (pageNumber, count) =>
          this.options.onDebug?.(`playlist ${playlistId}: page ${pageNumber} (${count} items)`),
      }
    );

    return raw
      .map((item, index) => toPlaylistItem(item, index))
      .filter((item): item is PlaylistItem => item !== null);
  }

  async removePlaylistItem(itemId: string): Promise<void> {
    await this.api.deletePlaylistItem(itemId);
  }
}
