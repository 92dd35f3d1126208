import type { PlaylistRecord } from './schema';

/**
 * Where the playlist store is kept between sessions.
 * `load` never rejects for bad data: a corrupt record comes back empty.
 */
export interface PlaylistRepository {
  load(): Promise<PlaylistRecord>;
  save(record: PlaylistRecord): Promise<void>;
}
