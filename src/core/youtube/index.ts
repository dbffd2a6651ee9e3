export { YouTubeClient, filterItems, parsePlaylistId, videoLink, toPlaylist, toPlaylistItem } from './client.js';
export { createGooglePlaylistApi, MAX_PAGE_SIZE, type PlaylistApi } from './api.js';
export { collectPages } from './pagination.js';
