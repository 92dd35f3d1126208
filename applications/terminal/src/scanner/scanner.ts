/**
 * Catalog scanner - walks the music folder and reads tags with music-metadata
 */

import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { parseFile } from 'music-metadata';
import { createLogger, createTrack, type Track } from '@riffline/shared';

const log = createLogger('Scanner');

export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set(['.mp3', '.wav', '.flac', '.aac', '.m4a', '.ogg', '.opus']);

export interface TrackTags {
  title?: string;
  artist?: string;
  album?: string;
  duration?: number;
}

export type TagReader = (path: string) => Promise<TrackTags>;

export async function readTags(path: string): Promise<TrackTags> {
  const { common, format } = await parseFile(path, { duration: true, skipCovers: true });
  return {
    title: common.title,
    artist: common.artist,
    album: common.album,
    duration: format.duration,
  };
}

export function isAudioFile(path: string): boolean {
  return AUDIO_EXTENSIONS.has(extname(path).toLowerCase());
}

/**
 * Every audio file under `root`, sorted by path. Unreadable folders are
 * skipped with a warning.
 */
export async function listAudioFiles(root: string): Promise<string[]> {
  const found: string[] = [];
  const pending = [resolve(root)];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      log.warn(`Cannot read ${dir}`, error);
      continue;
    }

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(path);
      } else if (entry.isFile() && isAudioFile(entry.name)) {
        found.push(path);
      }
    }
  }

  return found.sort();
}

export interface ScanResult {
  tracks: Track[];
  skipped: string[];
}

export async function scanLibrary(root: string, reader: TagReader = readTags): Promise<ScanResult> {
  const files = await listAudioFiles(root);
  const tracks: Track[] = [];
  const skipped: string[] = [];

  for (const path of files) {
    try {
      const tags = await reader(path);
      tracks.push(createTrack({ path, ...tags }));
    } catch (error) {
      log.warn(`Skipping ${path}: ${error instanceof Error ? error.message : String(error)}`);
      skipped.push(path);
    }
  }

  log.info(`Scanned ${root}: ${tracks.length} tracks, ${skipped.length} skipped`);
  return { tracks, skipped };
}
