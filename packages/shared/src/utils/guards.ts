/**
 * 타입 가드 함수 모음
 *
 * 런타임에서 안전한 타입 체크를 위한 유틸리티
 */

import type { AxiosError as AxiosErrorType } from 'axios';

/**
 * Axios 에러 타입 가드
 */
export function isAxiosError(error: unknown): error is AxiosErrorType {
  if (!isObject(error)) {
    return false;
  }
  return error.isAxiosError === true;
}

/**
 * Node.js 시스템 에러 타입 가드 (ENOENT, EACCES 등)
 */
export interface NodeSystemError extends Error {
  code: string;
  errno?: number;
  syscall?: string;
  path?: string;
}

export function isNodeSystemError(error: unknown): error is NodeSystemError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * 특정 에러 코드를 가진 Node.js 에러 확인
 */
export function isNodeErrorWithCode(error: unknown, code: string): boolean {
  return isNodeSystemError(error) && error.code === code;
}

/**
 * 파일 없음 에러 (ENOENT)
 */
export function isFileNotFoundError(error: unknown): boolean {
  return isNodeErrorWithCode(error, 'ENOENT');
}

const NETWORK_ERROR_CODES = [
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ECONNABORTED',
  'ERR_NETWORK',
];

/**
 * 네트워크 관련 에러인지 확인 (Axios/Node 에러용)
 */
export function isNetworkRelatedError(error: unknown): boolean {
  if (isAxiosError(error)) {
    return (error.code !== undefined && NETWORK_ERROR_CODES.includes(error.code)) || !error.response;
  }

  if (isNodeSystemError(error)) {
    return NETWORK_ERROR_CODES.includes(error.code);
  }

  return false;
}

/**
 * Error 메시지 안전하게 추출
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (isObject(error) && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

/**
 * 객체 타입 가드 (null, 배열 제외)
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
