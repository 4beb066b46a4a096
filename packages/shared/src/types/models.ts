// Library and registry models shared by core and tui

export interface Server {
  name: string;
  /** Normalized base URL, no trailing slash */
  url: string;
  username: string;
  userId: string;
  accessToken: string;
}

export interface Album {
  id: string;
  title: string;
  artist: string | null;
  genres: string[];
  year: number | null;
  trackCount: number | null;
  imageTag: string | null;
}

export interface Song {
  id: string;
  title: string;
  albumId: string;
  artists: string[];
  trackNumber: number | null;
  discNumber: number | null;
  durationSeconds: number | null;
}

export interface StreamDescriptor {
  url: string;
  container: string;
  codec: string | null;
  transcoded: boolean;
}

export interface AuthResult {
  userId: string;
  accessToken: string;
}

/** skipped: 다음 곡으로 넘기기 위해 중지됨 */
export type PlaybackOutcome = 'completedNormally' | 'interrupted' | 'skipped' | 'failed';

export interface PlaybackResult {
  outcome: PlaybackOutcome;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

// Persisted server list
export interface RegistryRecord {
  version: 1;
  active: string | null;
  servers: Server[];
}

// Media library interface for dependency injection
export interface MediaLibrary {
  authenticate(url: string, username: string, password: string): Promise<AuthResult>;
  listAlbums(server: Server, searchTerm?: string): Promise<Album[]>;
  listSongs(server: Server, albumId: string): Promise<Song[]>;
  resolveStreamUrl(server: Server, songId: string): Promise<StreamDescriptor>;
}

// Event data types
export interface PlayEventData {
  song: Song | null;
  descriptor: StreamDescriptor;
}

export interface PlaybackEndEventData {
  song: Song | null;
  result: PlaybackResult;
}
