import type { PlaylistItem } from './youtube.js';

export interface RemovalFailure {
  item: PlaylistItem;
  error: Error;
}

export interface RemovalResult {
  attempted: number;
  removed: PlaylistItem[];
  failed: RemovalFailure[];
}
