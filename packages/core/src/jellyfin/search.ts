import type { Album } from '@jellyfzf/shared';

/**
 * 제목, 앨범 아티스트, 장르 중 하나라도 검색어를 포함하면 true (대소문자 무시)
 */
export function matchesSearchTerm(album: Album, searchTerm: string): boolean {
  const needle = searchTerm.trim().toLowerCase();
  if (!needle) {
    return true;
  }
  const haystacks = [album.title, album.artist ?? '', ...album.genres];
  return haystacks.some(value => value.toLowerCase().includes(needle));
}

/**
 * 검색어로 앨범 목록 좁히기 (원래 순서 유지)
 */
export function filterAlbums(albums: Album[], searchTerm?: string): Album[] {
  if (!searchTerm || !searchTerm.trim()) {
    return albums;
  }
  return albums.filter(album => matchesSearchTerm(album, searchTerm));
}
