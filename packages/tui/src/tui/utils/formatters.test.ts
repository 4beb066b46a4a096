import { describe, it, expect } from 'vitest';
import type { Album, Server, Song } from '@jellyfzf/shared';
import { stripAnsi } from '../../utils/ansi.js';
import {
  escapeBlessedMarkup,
  formatAlbumLabel,
  formatDuration,
  formatNowPlaying,
  formatServerLabel,
  formatSongLabel,
  formatTrackNumber,
  singleLine,
  truncate,
} from './formatters.js';

const album: Album = {
  id: 'a1',
  title: 'Abbey Road',
  artist: 'The Beatles',
  genres: ['Rock'],
  year: 1969,
  trackCount: 17,
  imageTag: null,
};

const song: Song = {
  id: 's1',
  title: 'Come Together',
  albumId: 'a1',
  artists: ['The Beatles'],
  trackNumber: 1,
  discNumber: 1,
  durationSeconds: 259,
};

describe('formatters', () => {
  describe('formatDuration', () => {
    it('should format minutes and seconds', () => {
      expect(formatDuration(259)).toBe('4:19');
      expect(formatDuration(5)).toBe('0:05');
    });

    it('should include hours for long tracks', () => {
      expect(formatDuration(3725)).toBe('1:02:05');
    });

    it('should show placeholder for unknown duration', () => {
      expect(formatDuration(null)).toBe('--:--');
      expect(formatDuration(undefined)).toBe('--:--');
      expect(formatDuration(-1)).toBe('--:--');
    });
  });

  describe('formatTrackNumber', () => {
    it('should pad track numbers', () => {
      expect(formatTrackNumber(3)).toBe('03');
      expect(formatTrackNumber(12, 1)).toBe('12');
    });

    it('should prefix later discs', () => {
      expect(formatTrackNumber(5, 2)).toBe('2-05');
    });

    it('should show dashes for missing numbers', () => {
      expect(formatTrackNumber(null)).toBe('--');
    });
  });

  describe('truncate', () => {
    it('should truncate long strings', () => {
      expect(truncate('Hello World', 8)).toBe('Hello...');
    });

    it('should not truncate short strings', () => {
      expect(truncate('Hello', 10)).toBe('Hello');
    });

    it('should handle null/undefined', () => {
      expect(truncate(null, 10)).toBe('');
      expect(truncate(undefined, 10)).toBe('');
    });
  });

  it('should collapse tabs and newlines', () => {
    expect(singleLine('Side A\tTrack\n2')).toBe('Side A Track 2');
  });

  describe('labels', () => {
    it('should format an album as artist - title (year)', () => {
      expect(stripAnsi(formatAlbumLabel(album))).toBe('The Beatles - Abbey Road (1969)');
    });

    it('should fall back to Unknown Artist', () => {
      expect(stripAnsi(formatAlbumLabel({ ...album, artist: null, year: null }))).toBe('Unknown Artist - Abbey Road');
    });

    it('should format a song with number, artists and duration', () => {
      expect(stripAnsi(formatSongLabel(song))).toBe('01. Come Together - The Beatles 4:19');
    });

    it('should mark the active server', () => {
      const server: Server = { name: 'home', url: 'http://jf.lan', username: 'listener', userId: 'u1', accessToken: 'test-token' };
      expect(stripAnsi(formatServerLabel(server, true))).toBe('* home (http://jf.lan) listener');
      expect(stripAnsi(formatServerLabel(server, false))).toBe('  home (http://jf.lan) listener');
    });

    it('should describe the playing song', () => {
      expect(stripAnsi(formatNowPlaying(song, album))).toBe('▶ Now Playing: Come Together - The Beatles from Abbey Road');
    });
  });

  describe('escapeBlessedMarkup', () => {
    it('should escape curly braces', () => {
      expect(escapeBlessedMarkup('{bold}text{/bold}')).toBe('{open}bold{close}text{open}/bold{close}');
    });

    it('should handle null/undefined', () => {
      expect(escapeBlessedMarkup(null)).toBe('');
      expect(escapeBlessedMarkup(undefined)).toBe('');
    });
  });
});
