/**
 * HTTP 클라이언트 및 요청 유틸리티
 */

import axios, { type AxiosInstance, type AxiosResponse, type Method } from 'axios';
import {
  AuthFailedError,
  CLIENT_INFO,
  HttpStatus,
  ServerUnreachableError,
  getErrorMessage,
  isNetworkRelatedError,
} from '@jellyfzf/shared';
import type { HttpContext, JellyfinClientConfig, RequestTarget } from './types.js';
import { DEFAULT_CONFIG, DEFAULT_HEADERS } from './config.js';
import { logger } from '../utils/index.js';

const COMPONENT = 'Jellyfin';

export interface RequestOptions {
  method?: Method;
  path: string;
  params?: Record<string, string>;
  data?: unknown;
}

/**
 * HTTP 컨텍스트 생성
 */
export function createHttpContext(
  config: Partial<JellyfinClientConfig> = {},
  client?: AxiosInstance
): HttpContext {
  const fullConfig: JellyfinClientConfig = { ...DEFAULT_CONFIG, ...config };
  return {
    config: fullConfig,
    client: client ?? axios.create({ timeout: fullConfig.requestTimeoutMs }),
  };
}

/**
 * MediaBrowser 인증 헤더 값 생성
 */
export function buildAuthorizationHeader(deviceId: string, accessToken?: string): string {
  const parts = [
    `Client="${CLIENT_INFO.client}"`,
    `Device="${CLIENT_INFO.device}"`,
    `DeviceId="${deviceId}"`,
    `Version="${CLIENT_INFO.version}"`,
  ];
  if (accessToken) {
    parts.push(`Token="${accessToken}"`);
  }
  return `MediaBrowser ${parts.join(', ')}`;
}

/**
 * 서버 기본 URL과 경로 결합
 */
export function joinUrl(baseUrl: string, requestPath: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${requestPath.replace(/^\/+/, '')}`;
}

/**
 * HTTP 응답 상태 검증
 * 401/403 → AuthFailedError, 그 밖의 4xx/5xx → ServerUnreachableError
 */
export function validateResponse<T>(response: AxiosResponse<T>, url: string): AxiosResponse<T> {
  const { status } = response;

  if (status === HttpStatus.UNAUTHORIZED || status === HttpStatus.FORBIDDEN) {
    throw new AuthFailedError(
      status === HttpStatus.UNAUTHORIZED ? 'Jellyfin rejected the credentials' : 'Access to this Jellyfin resource is forbidden',
      status,
      { url }
    );
  }

  if (status >= HttpStatus.BAD_REQUEST) {
    throw new ServerUnreachableError(`HTTP ${status} error for ${url}`, { statusCode: status, url });
  }

  return response;
}

/**
 * JSON 요청 (단일 시도, 재시도 없음)
 */
export async function requestJson(
  ctx: HttpContext,
  target: RequestTarget,
  options: RequestOptions
): Promise<unknown> {
  const url = joinUrl(target.url, options.path);
  const deviceId = `${ctx.config.deviceIdPrefix}-${target.username ?? 'anonymous'}`;
  const method = options.method ?? 'GET';

  let response: AxiosResponse<unknown>;
  try {
    response = await ctx.client.request<unknown>({
      method,
      url,
      params: options.params,
      data: options.data,
      headers: {
        ...DEFAULT_HEADERS,
        ...(options.data !== undefined ? { 'Content-Type': 'application/json' } : {}),
        'Authorization': buildAuthorizationHeader(deviceId, target.accessToken),
      },
      timeout: ctx.config.requestTimeoutMs,
      validateStatus: () => true,
    });
  } catch (error: unknown) {
    logger.warn(COMPONENT, 'Request failed', {
      method,
      url,
      network: isNetworkRelatedError(error),
      error: getErrorMessage(error),
    });
    throw new ServerUnreachableError(`Cannot reach ${target.url}: ${getErrorMessage(error)}`, {
      cause: error instanceof Error ? error : undefined,
      url,
    });
  }

  logger.debug(COMPONENT, `${method} ${url}`, { status: response.status });
  return validateResponse(response, url).data;
}
