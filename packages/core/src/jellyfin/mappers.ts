/**
 * Jellyfin 항목 → 도메인 모델 변환
 */

import type { Album, Song } from '@jellyfzf/shared';
import type { BaseItem } from './schemas.js';
import { TICKS_PER_SECOND } from './config.js';

function firstAlbumArtist(item: BaseItem): string | null {
  if (item.AlbumArtist) {
    return item.AlbumArtist;
  }
  const named = item.AlbumArtists?.find(artist => artist.Name);
  return named?.Name ?? null;
}

export function toAlbum(item: BaseItem): Album {
  return {
    id: item.Id,
    title: item.Name,
    artist: firstAlbumArtist(item),
    genres: item.Genres ?? [],
    year: item.ProductionYear ?? null,
    trackCount: item.ChildCount ?? null,
    imageTag: item.ImageTags?.Primary ?? null,
  };
}

/**
 * @param albumId - 목록을 요청한 앨범 (AlbumId가 없을 때 사용)
 */
export function toSong(item: BaseItem, albumId: string): Song {
  const albumArtist = firstAlbumArtist(item);
  const artists = item.Artists && item.Artists.length > 0
    ? item.Artists
    : albumArtist ? [albumArtist] : [];

  return {
    id: item.Id,
    title: item.Name,
    albumId: item.AlbumId ?? albumId,
    artists,
    trackNumber: item.IndexNumber ?? null,
    discNumber: item.ParentIndexNumber ?? null,
    durationSeconds: item.RunTimeTicks != null ? Math.round(item.RunTimeTicks / TICKS_PER_SECOND) : null,
  };
}
