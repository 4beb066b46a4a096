/**
 * 탐색 세션 (활성 서버 + 탐색 스택)
 *
 * 스택 맨 위 프레임의 목록이 null이면 다음 단계에서 그 목록을 가져온다.
 */

import type { Album, Server, Song } from '@jellyfzf/shared';

export interface AlbumFrame {
  kind: 'albums';
  searchTerm: string;
  albums: Album[] | null;
  /** 마지막 조회 실패 (다음 렌더링은 Retry만 제공) */
  failed: boolean;
}

export interface SongFrame {
  kind: 'songs';
  album: Album;
  songs: Song[] | null;
  failed: boolean;
}

export type NavigationFrame = AlbumFrame | SongFrame;

export interface Session {
  server: Server | null;
  /** 저장하지 않은 서버 (이번 실행에서만 사용, 레지스트리에 쓰지 않음) */
  temporary: boolean;
  stack: NavigationFrame[];
  /** 재생 대기 중인 곡 (목록 순서) */
  queue: Song[];
}

export function createSession(server: Server | null = null, searchTerm?: string): Session {
  const session: Session = { server, temporary: false, stack: [], queue: [] };
  if (server) {
    pushAlbumFrame(session, searchTerm ?? '');
  }
  return session;
}

export function topFrame(session: Session): NavigationFrame | undefined {
  return session.stack[session.stack.length - 1];
}

export function pushAlbumFrame(session: Session, searchTerm: string): AlbumFrame {
  const frame: AlbumFrame = { kind: 'albums', searchTerm: searchTerm.trim(), albums: null, failed: false };
  session.stack.push(frame);
  return frame;
}

export function pushSongFrame(session: Session, album: Album): SongFrame {
  const frame: SongFrame = { kind: 'songs', album, songs: null, failed: false };
  session.stack.push(frame);
  return frame;
}

export function popFrame(session: Session): NavigationFrame | undefined {
  return session.stack.pop();
}

/**
 * 서버 선택: 이전 서버의 탐색 상태는 버린다
 */
export function selectServer(session: Session, server: Server, temporary = false): void {
  session.server = server;
  session.temporary = temporary;
  session.stack = [];
  session.queue = [];
  pushAlbumFrame(session, '');
}

export function clearServer(session: Session): void {
  session.server = null;
  session.temporary = false;
  session.stack = [];
  session.queue = [];
}

/**
 * 검색어가 있는 앨범 프레임을 걷어내고 전체 목록으로 돌아감
 */
export function clearSearch(session: Session): void {
  while (session.stack.length > 0) {
    const frame = topFrame(session);
    if (frame?.kind === 'albums' && frame.searchTerm === '') {
      return;
    }
    session.stack.pop();
  }
  pushAlbumFrame(session, '');
}
