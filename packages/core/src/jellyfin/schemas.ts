/**
 * Jellyfin 응답 스키마 (필수 필드 누락 시 즉시 실패)
 */

import { z } from 'zod';
import { InvalidResponseError } from '@jellyfzf/shared';

export const mediaSourceSchema = z.object({
  Id: z.string().nullish(),
  Container: z.string().nullish(),
});

export const baseItemSchema = z.object({
  Id: z.string().min(1),
  Name: z.string(),
  Type: z.string().nullish(),
  AlbumId: z.string().nullish(),
  AlbumArtist: z.string().nullish(),
  AlbumArtists: z.array(z.object({ Name: z.string().nullish() })).nullish(),
  Artists: z.array(z.string()).nullish(),
  Genres: z.array(z.string()).nullish(),
  ProductionYear: z.number().int().nullish(),
  ChildCount: z.number().int().nullish(),
  IndexNumber: z.number().int().nullish(),
  ParentIndexNumber: z.number().int().nullish(),
  RunTimeTicks: z.number().nonnegative().nullish(),
  ImageTags: z.record(z.string()).nullish(),
  MediaSources: z.array(mediaSourceSchema).nullish(),
});

export const itemsResponseSchema = z.object({
  Items: z.array(baseItemSchema),
  TotalRecordCount: z.number().int().nullish(),
});

export const authResponseSchema = z.object({
  AccessToken: z.string().min(1),
  User: z.object({
    Id: z.string().min(1),
    Name: z.string().nullish(),
  }),
  ServerId: z.string().nullish(),
});

export type BaseItem = z.infer<typeof baseItemSchema>;
export type ItemsResponse = z.infer<typeof itemsResponseSchema>;
export type AuthResponse = z.infer<typeof authResponseSchema>;

/**
 * 응답 본문 검증
 */
export function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, source: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new InvalidResponseError(`Unexpected response from ${source}: ${issues}`, { source });
  }
  return result.data;
}
