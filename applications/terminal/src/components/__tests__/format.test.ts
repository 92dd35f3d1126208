import { describe, it, expect } from 'vitest';
import type { TrackRow } from '@riffline/shared';
import { columnWidths, formatColumns, formatTrackRow, renderProgressBar, visibleWindow } from '../format';

const row = (overrides: Partial<TrackRow> = {}): TrackRow => ({
  id: 'id-1',
  title: 'Alpha',
  artist: 'Cid',
  album: 'Iron',
  duration: 180,
  playing: false,
  marked: false,
  ...overrides,
});

describe('columnWidths', () => {
  it('should split the space left after prefix and duration', () => {
    expect(columnWidths(40)).toEqual({ title: 13, artist: 9, album: 8 });
  });
});

describe('formatTrackRow', () => {
  it('should lay out a playing row', () => {
    expect(formatTrackRow(row({ playing: true }), 40)).toBe('▶  Alpha        Cid      Iron       3:00');
  });

  it('should truncate long cells and mark tracks', () => {
    const line = formatTrackRow(
      row({ title: 'A very long title name', artist: 'Unknown Artist', duration: 3725, marked: true }),
      40
    );

    expect(line).toBe(' * A very long… Unknown… Iron    1:02:05');
    expect(line).toHaveLength(40);
  });

  it('should align the header with the rows', () => {
    expect(formatColumns('', 'Title', 'Artist', 'Album', 'Time', 40)).toBe('   Title        Artist   Album      Time');
  });
});

describe('visibleWindow', () => {
  it('should show everything when it fits', () => {
    expect(visibleWindow(5, 2, 10)).toEqual({ start: 0, end: 5 });
  });

  it('should keep the selection centred and inside the list', () => {
    expect(visibleWindow(100, null, 10)).toEqual({ start: 0, end: 10 });
    expect(visibleWindow(100, 50, 10)).toEqual({ start: 45, end: 55 });
    expect(visibleWindow(100, 99, 10)).toEqual({ start: 90, end: 100 });
  });
});

describe('renderProgressBar', () => {
  it('should fill in proportion to the position', () => {
    expect(renderProgressBar(30, 120, 8)).toBe('━━──────');
    expect(renderProgressBar(0, 0, 4)).toBe('────');
    expect(renderProgressBar(200, 100, 4)).toBe('━━━━');
  });
});
