import { describe, it, expect } from 'vitest';
import type { Album } from '@jellyfzf/shared';
import { filterAlbums, matchesSearchTerm } from './search.js';
import { pickDirectContainer } from './stream.js';

function album(id: string, title: string, artist: string | null, genres: string[] = []): Album {
  return { id, title, artist, genres, year: null, trackCount: null, imageTag: null };
}

describe('album search', () => {
  const albums = [
    album('1', 'Blue Train', 'John Coltrane', ['Jazz']),
    album('2', 'Blue', null, ['Folk']),
    album('3', 'Discovery', 'Daft Punk', ['Electronic']),
  ];

  it('should return the list untouched for a blank term', () => {
    expect(filterAlbums(albums)).toBe(albums);
    expect(filterAlbums(albums, '   ')).toBe(albums);
  });

  it('should keep API order', () => {
    expect(filterAlbums(albums, 'blue').map(a => a.id)).toEqual(['1', '2']);
  });

  it('should not match a missing artist', () => {
    expect(matchesSearchTerm(album('4', 'Untitled', null), 'null')).toBe(false);
  });

  it('should match genres', () => {
    expect(filterAlbums(albums, 'electro').map(a => a.id)).toEqual(['3']);
  });
});

describe('pickDirectContainer', () => {
  it('should accept known containers case-insensitively', () => {
    expect(pickDirectContainer('FLAC')).toBe('flac');
  });

  it('should return null for unknown or missing containers', () => {
    expect(pickDirectContainer('wma')).toBeNull();
    expect(pickDirectContainer(null)).toBeNull();
    expect(pickDirectContainer('')).toBeNull();
  });
});
