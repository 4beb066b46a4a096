/**
 * Jellyfin 클라이언트 설정 및 상수
 */

import { CLIENT_INFO, DEFAULT_TRANSCODE_BITRATE, REQUEST_TIMEOUT } from '@jellyfzf/shared';
import type { JellyfinClientConfig } from './types.js';

/**
 * 기본 클라이언트 설정
 */
export const DEFAULT_CONFIG: JellyfinClientConfig = {
  requestTimeoutMs: REQUEST_TIMEOUT,
  forceTranscode: false,
  transcodeBitrate: DEFAULT_TRANSCODE_BITRATE,
  deviceIdPrefix: CLIENT_INFO.client,
};

/**
 * 요청 기본 헤더
 */
export const DEFAULT_HEADERS = {
  'Accept': 'application/json',
  'User-Agent': `${CLIENT_INFO.client}/${CLIENT_INFO.version}`,
} as const;

/**
 * 목록 조회 시 요청하는 필드
 */
export const ALBUM_FIELDS = 'AlbumArtist,AlbumArtists,Genres,ProductionYear,ChildCount';
export const SONG_FIELDS = 'AlbumId,AlbumArtist,Artists,ParentIndexNumber,IndexNumber,RunTimeTicks';

/**
 * RunTimeTicks 단위 (100ns)
 */
export const TICKS_PER_SECOND = 10_000_000;
