import { DuplicateNameError, InvalidStateError, NotFoundError } from '../lib/errors';
import type { Playlist } from '../types';
import { PLAYLIST_RECORD_VERSION, parsePlaylistRecord, type PlaylistRecord } from './schema';

export type MoveDirection = 'up' | 'down';

/**
 * Named, user-ordered playlists holding track id references.
 *
 * Ids are references, not ownership: a track may sit in any number of
 * playlists and ids the catalog no longer knows are kept here and dropped
 * when the view resolves them.
 */
export class PlaylistStore {
  private playlists: Playlist[] = [];

  /**
   * Restore from a persisted record; an invalid record yields an empty store
   */
  static fromRecord(input: unknown): PlaylistStore {
    const store = new PlaylistStore();
    const { record } = parsePlaylistRecord(input);
    for (const entry of record.playlists) {
      store.playlists.push({ name: entry.name, trackIds: dedupe(entry.trackIds) });
    }
    return store;
  }

  toRecord(): PlaylistRecord {
    return {
      version: PLAYLIST_RECORD_VERSION,
      playlists: this.playlists.map((p) => ({ name: p.name, trackIds: [...p.trackIds] })),
    };
  }

  list(): readonly Playlist[] {
    return this.playlists.map((p) => ({ name: p.name, trackIds: [...p.trackIds] }));
  }

  names(): string[] {
    return this.playlists.map((p) => p.name);
  }

  get size(): number {
    return this.playlists.length;
  }

  has(name: string): boolean {
    return this.indexOf(name) !== -1;
  }

  get(name: string): Playlist {
    const playlist = this.find(name);
    return { name: playlist.name, trackIds: [...playlist.trackIds] };
  }

  create(name: string): Playlist {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new InvalidStateError('Playlist name must not be empty');
    }
    if (this.has(trimmed)) {
      throw new DuplicateNameError(trimmed);
    }
    const playlist: Playlist = { name: trimmed, trackIds: [] };
    this.playlists.push(playlist);
    return { name: trimmed, trackIds: [] };
  }

  delete(name: string): void {
    const index = this.indexOf(name);
    if (index === -1) {
      throw new NotFoundError('playlist', name);
    }
    this.playlists.splice(index, 1);
  }

  /**
   * Append a track; adding a track that is already present changes nothing.
   * Returns whether the playlist changed.
   */
  addTrack(name: string, trackId: string): boolean {
    const playlist = this.find(name);
    if (playlist.trackIds.includes(trackId)) {
      return false;
    }
    playlist.trackIds.push(trackId);
    return true;
  }

  removeTrack(name: string, trackId: string): boolean {
    const playlist = this.find(name);
    const before = playlist.trackIds.length;
    playlist.trackIds = playlist.trackIds.filter((id) => id !== trackId);
    return playlist.trackIds.length !== before;
  }

  /**
   * Move a playlist one slot up or down in the playlist list.
   * Returns its new index; at either end the playlist stays put.
   */
  moveSelection(name: string, direction: MoveDirection): number {
    const index = this.indexOf(name);
    if (index === -1) {
      throw new NotFoundError('playlist', name);
    }
    const target = direction === 'up' ? index - 1 : index + 1;
    if (target < 0 || target >= this.playlists.length) {
      return index;
    }
    const [moved] = this.playlists.splice(index, 1);
    this.playlists.splice(target, 0, moved);
    return target;
  }

  private indexOf(name: string): number {
    return this.playlists.findIndex((p) => p.name === name);
  }

  private find(name: string): Playlist {
    const playlist = this.playlists.find((p) => p.name === name);
    if (!playlist) {
      throw new NotFoundError('playlist', name);
    }
    return playlist;
  }
}

function dedupe(ids: readonly string[]): string[] {
  return [...new Set(ids)];
}
