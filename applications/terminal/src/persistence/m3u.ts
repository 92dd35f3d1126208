/**
 * Extended M3U read/write for playlist export and import
 */

export interface M3uEntry {
  path: string;
  title: string;
  artist: string;
  duration: number;
}

export function formatM3u(entries: readonly M3uEntry[]): string {
  const lines = ['#EXTM3U'];
  for (const entry of entries) {
    const seconds = entry.duration > 0 ? Math.round(entry.duration) : -1;
    lines.push(`#EXTINF:${seconds},${entry.artist} - ${entry.title}`, entry.path);
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Paths listed in an M3U file, in order. Comments and directives are skipped.
 */
export function parseM3u(text: string): string[] {
  return text
    .replace(/^﻿/, '')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

// Characters no file system accepts become `_`
function safeBaseName(name: string): string {
  return name.replace(/[/\\:*?"<>|\u0000-\u001f]/g, '_').replace(/^\.+/, '_');
}

/**
 * File names for a list of playlists. Names that clean up to the same file
 * (ignoring case) get a ` (2)`, ` (3)`... suffix in list order.
 */
export function uniqueFileNames(names: readonly string[]): string[] {
  const taken = new Set<string>();
  return names.map((name) => {
    const base = safeBaseName(name);
    let fileName = `${base}.m3u`;
    for (let n = 2; taken.has(fileName.toLowerCase()); n++) {
      fileName = `${base} (${n}).m3u`;
    }
    taken.add(fileName.toLowerCase());
    return fileName;
  });
}
