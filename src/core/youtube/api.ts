import { google, type Auth, type youtube_v3 } from 'googleapis';
import { YouTubeApiError, describeError } from '../errors.js';
import type { Page } from '../../types/index.js';

export const MAX_PAGE_SIZE = 50;

export interface ListRequest {
  pageToken?: string;
  maxResults: number;
}

/**
 * The three Data API calls this tool makes. Kept narrow so tests can stand
 * in a fake without a network.
 */
export interface PlaylistApi {
  listPlaylists(request: ListRequest): Promise<Page<youtube_v3.Schema$Playlist>>;
  listPlaylistItems(
    playlistId: string,
    request: ListRequest
  ): Promise<Page<youtube_v3.Schema$PlaylistItem>>;
  deletePlaylistItem(itemId: string): Promise<void>;
}

function asStatus(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^\d{3}$/.test(value)) return Number(value);
  return undefined;
}

// googleapis rejects with a GaxiosError; its HTTP status sits on the
// response, with `status`/`code` on the error itself as fallbacks.
export function statusOf(error: unknown): number {
  if (typeof error !== 'object' || error === null) return 0;
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const status = 'status' in error.response ? asStatus(error.response.status) : undefined;
    if (status !== undefined) return status;
  }
  const status = 'status' in error ? asStatus(error.status) : undefined;
  if (status !== undefined) return status;
  return ('code' in error ? asStatus(error.code) : undefined) ?? 0;
}

export function toYouTubeApiError(error: unknown, context: string): YouTubeApiError {
  if (error instanceof YouTubeApiError) return error;
  return new YouTubeApiError(statusOf(error), `${context}: ${describeError(error)}`, { cause: error });
}

export function createGooglePlaylistApi(auth: Auth.OAuth2Client): PlaylistApi {
  const youtube = google.youtube({ version: 'v3', auth });

  return {
    async listPlaylists(request) {
      try {
        const response = await youtube.playlists.list({
          part: ['snippet', 'contentDetails', 'status'],
          mine: true,
          maxResults: request.maxResults,
          pageToken: request.pageToken,
        });
        return { items: response.data.items ?? [], nextPageToken: response.data.nextPageToken };
      } catch (error) {
        throw toYouTubeApiError(error, 'Failed to list playlists');
      }
    },

    async listPlaylistItems(playlistId, request) {
      try {
        const response = await youtube.playlistItems.list({
          part: ['snippet', 'contentDetails'],
          playlistId,
          maxResults: request.maxResults,
          pageToken: request.pageToken,
        });
        return { items: response.data.items ?? [], nextPageToken: response.data.nextPageToken };
      } catch (error) {
        throw toYouTubeApiError(error, `Failed to list items of playlist ${playlistId}`);
      }
    },

    async deletePlaylistItem(itemId) {
      try {
        await youtube.playlistItems.delete({ id: itemId });
      } catch (error) {
        throw toYouTubeApiError(error, `Failed to delete playlist item ${itemId}`);
      }
    },
  };
}
