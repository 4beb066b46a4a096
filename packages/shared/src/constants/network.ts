/**
 * 네트워크 관련 상수
 */

/** 기본 요청 타임아웃 (ms) */
export const REQUEST_TIMEOUT = 15000;

/** Jellyfin 클라이언트 식별 정보 (Authorization 헤더) */
export const CLIENT_INFO = {
  client: 'jellyfzf',
  device: 'terminal',
  version: '0.1.0',
} as const;

/** 기본 트랜스코딩 비트레이트 (bps) */
export const DEFAULT_TRANSCODE_BITRATE = 192000;

/** 직접 재생 가능한 컨테이너 */
export const DIRECT_PLAY_CONTAINERS = [
  'mp3',
  'flac',
  'ogg',
  'opus',
  'm4a',
  'aac',
  'wav',
  'webm',
] as const;

/** HTTP 상태 코드 */
export const HttpStatus = {
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
} as const;
