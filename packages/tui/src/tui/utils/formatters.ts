import type { Album, Server, Song } from '@jellyfzf/shared';
import { UIConfig } from '@jellyfzf/shared';
import { paint } from '../../utils/ansi.js';

export function formatDuration(seconds: number | null | undefined): string {
  if (seconds == null || !Number.isFinite(seconds) || seconds < 0) return '--:--';

  const total = Math.round(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = String(total % 60).padStart(2, '0');

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${secs}`;
  }
  return `${minutes}:${secs}`;
}

/**
 * 트랙 번호 표시 (2번째 디스크부터는 "2-05" 형식)
 */
export function formatTrackNumber(trackNumber: number | null, discNumber: number | null = null): string {
  const padLength = UIConfig.TRACK_NUMBER_PADDING;
  const track = trackNumber == null ? '-'.repeat(padLength) : String(trackNumber).padStart(padLength, '0');
  return discNumber != null && discNumber > 1 ? `${discNumber}-${track}` : track;
}

export function truncate(str: string | undefined | null, maxLength: number): string {
  if (!str) return '';
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

// Tabs and newlines would break fzf's line protocol
export function singleLine(str: string): string {
  return str.replace(/[\t\r\n]+/g, ' ');
}

export function formatArtists(artists: readonly string[]): string {
  return artists.length > 0 ? artists.join(', ') : 'Unknown Artist';
}

export function formatServerLabel(server: Server, isActive: boolean): string {
  const marker = isActive ? paint('*', 'green', 'bold') : ' ';
  return [
    marker,
    paint(singleLine(server.name), 'cyan', 'bold'),
    paint(`(${server.url})`, 'white'),
    paint(singleLine(server.username), 'gray'),
  ].join(' ');
}

export function formatAlbumLabel(album: Album): string {
  const artist = paint(truncate(singleLine(album.artist ?? 'Unknown Artist'), 40), 'yellow', 'bold');
  const title = paint(truncate(singleLine(album.title), UIConfig.MAX_LABEL_LENGTH), 'green', 'bold');
  const year = album.year != null ? ` ${paint(`(${album.year})`, 'gray')}` : '';
  return `${artist} ${paint('-', 'white')} ${title}${year}`;
}

export function formatSongLabel(song: Song): string {
  const number = paint(`${formatTrackNumber(song.trackNumber, song.discNumber)}.`, 'magenta', 'bold');
  const title = paint(truncate(singleLine(song.title), UIConfig.MAX_LABEL_LENGTH), 'green', 'bold');
  const artists = paint(truncate(singleLine(formatArtists(song.artists)), 60), 'yellow');
  const duration = paint(formatDuration(song.durationSeconds), 'gray');
  return `${number} ${title} ${paint('-', 'white')} ${artists} ${duration}`;
}

export function formatNowPlaying(song: Song, album: Album | null): string {
  const from = album ? ` ${paint('from', 'white')} ${paint(album.title, 'cyan')}` : '';
  return `${paint('▶ Now Playing:', 'green', 'bold')} ${paint(song.title, 'yellow', 'bold')} ${paint('-', 'white')} ${paint(formatArtists(song.artists), 'magenta', 'bold')}${from}`;
}

// Escape blessed markup characters in user-provided text
// Blessed uses {tag} syntax for colors/styles, so curly braces must be escaped
export function escapeBlessedMarkup(str: string | undefined | null): string {
  if (!str) return '';
  return str.replace(/[{}]/g, ch => (ch === '{' ? '{open}' : '{close}'));
}
