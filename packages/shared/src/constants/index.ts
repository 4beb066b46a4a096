/**
 * 상수 모듈 재수출
 */

// 네트워크 관련
export * from './network.js';

// 파일 시스템 관련
export * from './files.js';

// Navigation states
export const NavState = {
  SERVER_SELECT: 'serverSelect',
  ALBUM_SELECT: 'albumSelect',
  SONG_SELECT: 'songSelect',
  PLAYING: 'playing',
  EXIT: 'exit',
} as const;

export type NavStateType = typeof NavState[keyof typeof NavState];

// 재생 관련 상수
export const PlaybackConfig = {
  /** 종료 신호 후 강제 종료까지 대기 (ms) */
  KILL_TIMEOUT: 2000,
  /** 인터럽트로 간주하는 종료 코드 (128 + SIGINT, 128 + SIGTERM) */
  INTERRUPT_EXIT_CODES: [130, 143],
} as const;

// 애플리케이션 종료 타임아웃 (ms)
export const SHUTDOWN_TIMEOUT = 5000;

// UI 관련 상수
export const UIConfig = {
  /** 트랙 번호 패딩 자릿수 */
  TRACK_NUMBER_PADDING: 2,
  /** 메뉴 라벨 최대 길이 */
  MAX_LABEL_LENGTH: 120,
} as const;
