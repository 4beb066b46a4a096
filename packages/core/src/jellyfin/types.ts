/**
 * Jellyfin 클라이언트 내부 타입 정의
 */

import type { AxiosInstance } from 'axios';

/**
 * 클라이언트 설정
 */
export interface JellyfinClientConfig {
  requestTimeoutMs: number;
  forceTranscode: boolean;
  transcodeBitrate: number;
  /** Authorization 헤더의 DeviceId 접두사 */
  deviceIdPrefix: string;
}

/**
 * HTTP 클라이언트 컨텍스트
 */
export interface HttpContext {
  config: JellyfinClientConfig;
  client: AxiosInstance;
}

/**
 * 요청 대상 (서버 URL + 토큰)
 */
export interface RequestTarget {
  url: string;
  username?: string;
  accessToken?: string;
}
