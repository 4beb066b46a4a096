export { JellyfinClient } from './client.js';
export { createHttpContext, buildAuthorizationHeader, joinUrl } from './http.js';
export { filterAlbums, matchesSearchTerm } from './search.js';
export { toAlbum, toSong } from './mappers.js';
export { pickDirectContainer } from './stream.js';
export { DEFAULT_CONFIG as DEFAULT_CLIENT_CONFIG } from './config.js';
export type { JellyfinClientConfig } from './types.js';
