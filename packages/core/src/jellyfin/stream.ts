/**
 * 스트림 URL 결정 (직접 재생 또는 mp3 트랜스코딩)
 */

import type { Server, StreamDescriptor } from '@jellyfzf/shared';
import { DIRECT_PLAY_CONTAINERS, InvalidResponseError, redactUrl } from '@jellyfzf/shared';
import type { HttpContext } from './types.js';
import { joinUrl, requestJson } from './http.js';
import { itemsResponseSchema, parseResponse } from './schemas.js';
import { logger } from '../utils/index.js';

const TRANSCODE_CONTAINER = 'mp3';

/**
 * 컨테이너 문자열("mp4,m4a" 형식)에서 직접 재생 가능한 첫 항목
 */
export function pickDirectContainer(container: string | null | undefined): string | null {
  if (!container) {
    return null;
  }
  const supported: readonly string[] = DIRECT_PLAY_CONTAINERS;
  const candidates = container.split(',').map(part => part.trim().toLowerCase());
  return candidates.find(part => supported.includes(part)) ?? null;
}

export function buildDirectStreamUrl(server: Server, songId: string, mediaSourceId: string): string {
  const params = new URLSearchParams({
    static: 'true',
    MediaSourceId: mediaSourceId,
    api_key: server.accessToken,
  });
  return `${joinUrl(server.url, `Audio/${encodeURIComponent(songId)}/stream`)}?${params.toString()}`;
}

export function buildTranscodeUrl(
  server: Server,
  songId: string,
  mediaSourceId: string,
  bitrate: number
): string {
  const params = new URLSearchParams({
    UserId: server.userId,
    api_key: server.accessToken,
    container: TRANSCODE_CONTAINER,
    audioCodec: TRANSCODE_CONTAINER,
    transcodingContainer: TRANSCODE_CONTAINER,
    maxAudioChannels: '2',
    audioBitRate: String(bitrate),
    MediaSourceId: mediaSourceId,
  });
  return `${joinUrl(server.url, `Audio/${encodeURIComponent(songId)}/stream.${TRANSCODE_CONTAINER}`)}?${params.toString()}`;
}

export async function resolveStreamUrl(ctx: HttpContext, server: Server, songId: string): Promise<StreamDescriptor> {
  const path = `Users/${encodeURIComponent(server.userId)}/Items`;
  const data = await requestJson(ctx, server, {
    path,
    params: { Ids: songId, Fields: 'MediaSources' },
  });

  const body = parseResponse(itemsResponseSchema, data, path);
  const item = body.Items.find(candidate => candidate.Id === songId);
  if (!item) {
    throw new InvalidResponseError(`Song ${songId} was not found on ${server.name}`, { source: path });
  }

  const source = item.MediaSources?.[0];
  const mediaSourceId = source?.Id ?? songId;
  const directContainer = ctx.config.forceTranscode ? null : pickDirectContainer(source?.Container);

  const descriptor: StreamDescriptor = directContainer
    ? {
        url: buildDirectStreamUrl(server, songId, mediaSourceId),
        container: directContainer,
        codec: null,
        transcoded: false,
      }
    : {
        url: buildTranscodeUrl(server, songId, mediaSourceId, ctx.config.transcodeBitrate),
        container: TRANSCODE_CONTAINER,
        codec: TRANSCODE_CONTAINER,
        transcoded: true,
      };

  logger.debug('Jellyfin', 'Resolved stream', { songId, url: redactUrl(descriptor.url) });
  return descriptor;
}
