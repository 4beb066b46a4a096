/**
 * 앨범 목록 조회
 */

import type { Album, Server } from '@jellyfzf/shared';
import type { HttpContext } from './types.js';
import { requestJson } from './http.js';
import { itemsResponseSchema, parseResponse } from './schemas.js';
import { toAlbum } from './mappers.js';
import { filterAlbums } from './search.js';
import { ALBUM_FIELDS } from './config.js';

export async function listAlbums(ctx: HttpContext, server: Server, searchTerm?: string): Promise<Album[]> {
  const path = `Users/${encodeURIComponent(server.userId)}/Items`;
  const data = await requestJson(ctx, server, {
    path,
    params: {
      IncludeItemTypes: 'MusicAlbum',
      Recursive: 'true',
      SortBy: 'SortName',
      SortOrder: 'Ascending',
      Fields: ALBUM_FIELDS,
    },
  });

  const body = parseResponse(itemsResponseSchema, data, path);
  return filterAlbums(body.Items.map(toAlbum), searchTerm);
}
