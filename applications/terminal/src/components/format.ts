/**
 * Column layout for the terminal views. Pure so the widths can be tested
 * without rendering.
 */

import { clamp, formatDuration, truncate, type TrackRow } from '@riffline/shared';

const PREFIX_WIDTH = 3;
const DURATION_WIDTH = 7;

export interface ColumnWidths {
  title: number;
  artist: number;
  album: number;
}

export function columnWidths(width: number): ColumnWidths {
  const rest = Math.max(0, width - PREFIX_WIDTH - DURATION_WIDTH);
  const title = Math.floor(rest * 0.45);
  const artist = Math.floor(rest * 0.3);
  return { title, artist, album: rest - title - artist };
}

function cell(text: string, width: number): string {
  return truncate(text, width - 1).padEnd(width);
}

export function formatColumns(
  prefix: string,
  title: string,
  artist: string,
  album: string,
  duration: string,
  width: number
): string {
  const widths = columnWidths(width);
  return (
    prefix.padEnd(PREFIX_WIDTH) +
    cell(title, widths.title) +
    cell(artist, widths.artist) +
    cell(album, widths.album) +
    duration.padStart(DURATION_WIDTH)
  );
}

export function formatTrackRow(row: TrackRow, width: number): string {
  const prefix = `${row.playing ? '▶' : ' '}${row.marked ? '*' : ' '}`;
  return formatColumns(prefix, row.title, row.artist, row.album, formatDuration(row.duration), width);
}

/**
 * First and one-past-last row to draw so the selection stays in view,
 * centred where the list allows
 */
export function visibleWindow(total: number, selection: number | null, height: number): { start: number; end: number } {
  if (total <= height) {
    return { start: 0, end: total };
  }
  const start = clamp((selection ?? 0) - Math.floor(height / 2), 0, total - height);
  return { start, end: start + height };
}

export function renderProgressBar(position: number, duration: number, width: number): string {
  const ratio = duration > 0 ? clamp(position / duration, 0, 1) : 0;
  const filled = Math.round(ratio * width);
  return '━'.repeat(filled) + '─'.repeat(width - filled);
}
