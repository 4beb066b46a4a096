/**
 * 서버 URL 정규화
 * 스킴이 없으면 http:// 를 붙이고 끝의 슬래시를 제거
 */
export function normalizeServerUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed) {
    return '';
  }
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  return withScheme.replace(/\/+$/, '');
}

/**
 * URL 쿼리의 토큰 값 가리기 (로그 출력용)
 */
export function redactUrl(url: string): string {
  return url.replace(/(api_key|ApiKey|X-Emby-Token)=[^&\s"]+/g, '$1=REDACTED');
}

/**
 * 사용자 입력 텍스트 새니타이즈
 */
export function sanitizeInput(text: string, maxLength = 1000): string {
  if (!text || typeof text !== 'string') {
    return '';
  }
  // 제어 문자 제거, 길이 제한
  return text
    // eslint-disable-next-line no-control-regex
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .trim()
    .slice(0, maxLength);
}
