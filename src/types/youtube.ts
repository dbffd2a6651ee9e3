export interface Playlist {
  id: string;
  title: string;
  itemCount?: number;
  privacyStatus?: string;
}

export interface PlaylistItem {
  id: string; // playlist item id, not the video id
  videoId: string;
  title: string;
  channel: string;
  link: string;
  position: number;
}

export interface Page<T> {
  items: T[];
  nextPageToken?: string | null;
}
