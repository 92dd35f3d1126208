/**
 * Playlist persistence: `<dataDir>/playlists.json` holds the record, and
 * each playlist is mirrored to `<dataDir>/playlists/<name>.m3u` for other
 * players. When there is no JSON yet, M3U files found there (or directly in
 * the data folder) are imported instead.
 */

import { mkdir, readFile, readdir, rename, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import {
  createLogger,
  emptyPlaylistRecord,
  parsePlaylistRecord,
  trackIdFromPath,
  type PlaylistRecord,
  type PlaylistRepository,
  type Track,
} from '@riffline/shared';
import { formatM3u, parseM3u, uniqueFileNames } from './m3u';

const log = createLogger('Playlists');

export interface JsonPlaylistRepositoryOptions {
  dataDir: string;
  exportM3u?: boolean;
  /** Looks up tracks for M3U export; ids it cannot resolve are left out */
  lookupTrack?: (id: string) => Track | undefined;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonPlaylistRepository implements PlaylistRepository {
  readonly recordPath: string;
  readonly m3uDir: string;
  private readonly dataDir: string;
  private readonly exportM3u: boolean;
  private readonly lookupTrack: (id: string) => Track | undefined;

  constructor(options: JsonPlaylistRepositoryOptions) {
    this.dataDir = options.dataDir;
    this.recordPath = join(options.dataDir, 'playlists.json');
    this.m3uDir = join(options.dataDir, 'playlists');
    this.exportM3u = options.exportM3u ?? true;
    this.lookupTrack = options.lookupTrack ?? (() => undefined);
  }

  async load(): Promise<PlaylistRecord> {
    let text: string;
    try {
      text = await readFile(this.recordPath, 'utf8');
    } catch (error) {
      if (isMissing(error)) {
        return this.importM3u();
      }
      log.warn(`Cannot read ${this.recordPath}, starting with no playlists`, error);
      return emptyPlaylistRecord();
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      log.warn(`${this.recordPath} is not valid JSON, starting with no playlists`, error);
      return emptyPlaylistRecord();
    }

    const { record, errors } = parsePlaylistRecord(json);
    if (errors.length > 0) {
      log.warn(`${this.recordPath} is invalid, starting with no playlists: ${errors.join('; ')}`);
    }
    return record;
  }

  async save(record: PlaylistRecord): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    const temp = `${this.recordPath}.tmp`;
    await writeFile(temp, `${JSON.stringify(record, null, 2)}\n`, 'utf8');
    await rename(temp, this.recordPath);

    if (this.exportM3u) {
      await this.writeM3u(record);
    }
    log.debug(`Saved ${record.playlists.length} playlists`);
  }

  private async writeM3u(record: PlaylistRecord): Promise<void> {
    await mkdir(this.m3uDir, { recursive: true });
    const fileNames = uniqueFileNames(record.playlists.map((playlist) => playlist.name));
    const wanted = new Set(fileNames);

    for (const [index, playlist] of record.playlists.entries()) {
      const fileName = fileNames[index];
      const entries = playlist.trackIds
        .map((id) => this.lookupTrack(id))
        .filter((track): track is Track => track !== undefined);
      await writeFile(join(this.m3uDir, fileName), formatM3u(entries), 'utf8');
    }

    // Deleted playlists must not come back on the next import
    for (const file of await readdir(this.m3uDir)) {
      if (file.endsWith('.m3u') && !wanted.has(file)) {
        await unlink(join(this.m3uDir, file));
      }
    }
  }

  private async importM3u(): Promise<PlaylistRecord> {
    const files = [...(await listM3u(this.m3uDir)), ...(await listM3u(this.dataDir))];
    if (files.length === 0) {
      return emptyPlaylistRecord();
    }

    const seen = new Set<string>();
    const playlists: PlaylistRecord['playlists'] = [];
    for (const file of files) {
      const name = basename(file, '.m3u').trim();
      if (!name || seen.has(name)) continue;

      let text: string;
      try {
        text = await readFile(file, 'utf8');
      } catch (error) {
        log.warn(`Skipping unreadable playlist ${file}`, error);
        continue;
      }
      seen.add(name);
      const trackIds = [...new Set(parseM3u(text).map((path) => trackIdFromPath(resolve(dirname(file), path))))];
      playlists.push({ name, trackIds });
    }

    log.info(`Imported ${playlists.length} playlists from M3U files`);
    return parsePlaylistRecord({ version: 1, playlists }).record;
  }
}

async function listM3u(dir: string): Promise<string[]> {
  try {
    const names = await readdir(dir);
    return names
      .filter((name) => name.toLowerCase().endsWith('.m3u'))
      .sort()
      .map((name) => join(dir, name));
  } catch (error) {
    if (!isMissing(error)) {
      log.warn(`Cannot list playlists in ${dir}`, error);
    }
    return [];
  }
}
