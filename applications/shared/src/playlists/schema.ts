/**
 * Zod schema for the persisted playlist record
 */

import { z } from 'zod';

export const PLAYLIST_RECORD_VERSION = 1;

const playlistEntrySchema = z.object({
  name: z.string().trim().min(1, 'Playlist name must not be empty'),
  trackIds: z.array(z.string().uuid('Track ids must be UUIDs')),
});

export const playlistRecordSchema = z
  .object({
    version: z.literal(PLAYLIST_RECORD_VERSION),
    playlists: z.array(playlistEntrySchema),
  })
  .refine(
    (record) => new Set(record.playlists.map((p) => p.name)).size === record.playlists.length,
    { message: 'Playlist names must be unique', path: ['playlists'] }
  );

export type PlaylistRecord = z.infer<typeof playlistRecordSchema>;

export function emptyPlaylistRecord(): PlaylistRecord {
  return { version: PLAYLIST_RECORD_VERSION, playlists: [] };
}

export interface PlaylistRecordResult {
  record: PlaylistRecord;
  errors: string[];
}

/**
 * Validate unknown input, falling back to an empty record when it is invalid
 */
export function parsePlaylistRecord(input: unknown): PlaylistRecordResult {
  const result = playlistRecordSchema.safeParse(input);
  if (result.success) {
    return { record: result.data, errors: [] };
  }
  return {
    record: emptyPlaylistRecord(),
    errors: result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    }),
  };
}
