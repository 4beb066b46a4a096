/**
 * 앨범 수록곡 조회 (디스크/트랙 순)
 */

import type { Server, Song } from '@jellyfzf/shared';
import type { HttpContext } from './types.js';
import { requestJson } from './http.js';
import { itemsResponseSchema, parseResponse } from './schemas.js';
import { toSong } from './mappers.js';
import { SONG_FIELDS } from './config.js';

export async function listSongs(ctx: HttpContext, server: Server, albumId: string): Promise<Song[]> {
  const path = `Users/${encodeURIComponent(server.userId)}/Items`;
  const data = await requestJson(ctx, server, {
    path,
    params: {
      ParentId: albumId,
      IncludeItemTypes: 'Audio',
      Recursive: 'true',
      SortBy: 'ParentIndexNumber,IndexNumber,SortName',
      SortOrder: 'Ascending',
      Fields: SONG_FIELDS,
    },
  });

  const body = parseResponse(itemsResponseSchema, data, path);
  return body.Items.map(item => toSong(item, albumId));
}
