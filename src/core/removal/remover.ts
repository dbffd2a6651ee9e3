import { toError } from '../errors.js';
import type {
  AuditRecord,
  NewAuditRecord,
  Playlist,
  PlaylistItem,
  RemovalResult,
} from '../../types/index.js';

export interface AuditSink {
  record(entry: NewAuditRecord): AuditRecord;
}

export interface PlaylistItemRemover {
  removePlaylistItem(itemId: string): Promise<void>;
}

export interface RemovalCallbacks {
  onItemStart?: (item: PlaylistItem, index: number, total: number) => void;
  onItemRemoved?: (item: PlaylistItem, index: number, total: number) => void;
  onItemError?: (item: PlaylistItem, error: Error) => void;
}

export function uniqueById(items: PlaylistItem[]): PlaylistItem[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    if (seen.has(item.id)) return false;
    seen.add(item.id);
    return true;
  });
}

export class BatchRemover {
  constructor(
    private readonly youtube: PlaylistItemRemover,
    private readonly audit: AuditSink
  ) {}

  /**
   * Removes each selected item in turn: one audit row, then one delete call.
   * A failing item is reported and skipped; the rest of the batch still runs,
   * so a partial removal comes back as a normal result.
   */
  async removeItems(
    playlist: Playlist,
    items: PlaylistItem[],
    callbacks: RemovalCallbacks = {}
  ): Promise<RemovalResult> {
    const { onItemStart, onItemRemoved, onItemError } = callbacks;
    const batch = uniqueById(items);
    const result: RemovalResult = { attempted: batch.length, removed: [], failed: [] };

    for (let i = 0; i < batch.length; i++) {
      const item = batch[i];
      onItemStart?.(item, i + 1, batch.length);

      try {
        this.audit.record({
          videoId: item.videoId,
          title: item.title,
          link: item.link,
          channel: item.channel,
          playlistId: playlist.id,
          playlistName: playlist.title,
        });
        await this.youtube.removePlaylistItem(item.id);
        result.removed.push(item);
        onItemRemoved?.(item, i + 1, batch.length);
      } catch (error) {
        const failure = toError(error);
        result.failed.push({ item, error: failure });
        onItemError?.(item, failure);
      }
    }

    return result;
  }
}
