/**
 * Jellyfin Client
 *
 * 기능별 모듈을 MediaLibrary 인터페이스로 묶는 파사드
 */

import type { AxiosInstance } from 'axios';
import type { Album, AuthResult, MediaLibrary, Server, Song, StreamDescriptor } from '@jellyfzf/shared';
import type { HttpContext, JellyfinClientConfig } from './types.js';
import { createHttpContext } from './http.js';
import { authenticate } from './auth.js';
import { listAlbums } from './albums.js';
import { listSongs } from './songs.js';
import { resolveStreamUrl } from './stream.js';

export class JellyfinClient implements MediaLibrary {
  private ctx: HttpContext;

  constructor(config?: Partial<JellyfinClientConfig>, client?: AxiosInstance) {
    this.ctx = createHttpContext(config, client);
  }

  get config(): Readonly<JellyfinClientConfig> {
    return this.ctx.config;
  }

  async authenticate(url: string, username: string, password: string): Promise<AuthResult> {
    return authenticate(this.ctx, url, username, password);
  }

  async listAlbums(server: Server, searchTerm?: string): Promise<Album[]> {
    return listAlbums(this.ctx, server, searchTerm);
  }

  async listSongs(server: Server, albumId: string): Promise<Song[]> {
    return listSongs(this.ctx, server, albumId);
  }

  async resolveStreamUrl(server: Server, songId: string): Promise<StreamDescriptor> {
    return resolveStreamUrl(this.ctx, server, songId);
  }
}
