import { v5 as uuidv5 } from 'uuid';
import type { Track } from '../types';

// RFC 4122 DNS namespace: ids stay stable across re-scans and match any
// other tool that derives v5 ids from the same absolute paths.
const TRACK_NAMESPACE = '6ba7b810-9dad-11d1-80b4-00c04fd430c8';

export const UNKNOWN_ARTIST = 'Unknown Artist';
export const UNKNOWN_ALBUM = 'Unknown Album';

export interface TrackInput {
  path: string;
  title?: string | null;
  artist?: string | null;
  album?: string | null;
  duration?: number | null;
}

/**
 * Stable track id derived from the file path
 */
export function trackIdFromPath(path: string): string {
  return uuidv5(path, TRACK_NAMESPACE);
}

function fileStem(path: string): string {
  const base = path.split(/[\\/]/).pop() ?? path;
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}

function nonEmpty(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build an immutable Track record from scanner output, filling missing tags
 */
export function createTrack(input: TrackInput): Track {
  const duration = input.duration != null && Number.isFinite(input.duration) && input.duration > 0
    ? input.duration
    : 0;

  return Object.freeze({
    id: trackIdFromPath(input.path),
    path: input.path,
    title: nonEmpty(input.title) ?? fileStem(input.path),
    artist: nonEmpty(input.artist) ?? UNKNOWN_ARTIST,
    album: nonEmpty(input.album) ?? UNKNOWN_ALBUM,
    duration,
  });
}

/**
 * Ordered, read-only collection of the tracks found by the last scan.
 * Replaced wholesale on rescan, never edited in place.
 */
export class Catalog {
  readonly tracks: readonly Track[];
  private readonly byId: ReadonlyMap<string, Track>;

  constructor(tracks: readonly Track[] = []) {
    const seen = new Map<string, Track>();
    const ordered: Track[] = [];
    for (const track of tracks) {
      // The same file listed twice collapses onto its first occurrence
      if (seen.has(track.id)) continue;
      seen.set(track.id, track);
      ordered.push(track);
    }
    this.tracks = Object.freeze(ordered);
    this.byId = seen;
  }

  get size(): number {
    return this.tracks.length;
  }

  get(id: string): Track | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /**
   * Resolve ids in order, dropping ids the catalog no longer knows
   */
  resolve(ids: readonly string[]): Track[] {
    const resolved: Track[] = [];
    for (const id of ids) {
      const track = this.byId.get(id);
      if (track) resolved.push(track);
    }
    return resolved;
  }
}
