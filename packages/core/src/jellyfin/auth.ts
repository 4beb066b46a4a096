/**
 * 인증 (Users/AuthenticateByName)
 */

import type { AuthResult } from '@jellyfzf/shared';
import { normalizeServerUrl } from '@jellyfzf/shared';
import type { HttpContext } from './types.js';
import { requestJson } from './http.js';
import { authResponseSchema, parseResponse } from './schemas.js';
import { logger } from '../utils/index.js';

/**
 * 사용자 이름/비밀번호로 로그인하고 토큰 발급
 */
export async function authenticate(
  ctx: HttpContext,
  url: string,
  username: string,
  password: string
): Promise<AuthResult> {
  const baseUrl = normalizeServerUrl(url);

  const data = await requestJson(ctx, { url: baseUrl, username }, {
    method: 'POST',
    path: 'Users/AuthenticateByName',
    data: { Username: username, Pw: password },
  });

  const body = parseResponse(authResponseSchema, data, 'Users/AuthenticateByName');
  logger.info('Jellyfin', 'Authenticated', { url: baseUrl, username, userId: body.User.Id });

  return {
    userId: body.User.Id,
    accessToken: body.AccessToken,
  };
}
