import { describe, it, expect } from 'vitest';
import { formatM3u, parseM3u, uniqueFileNames } from './m3u';

describe('m3u', () => {
  it('should write extended M3U', () => {
    const text = formatM3u([
      { path: '/music/a.mp3', title: 'Intro', artist: 'Band', duration: 61.6 },
      { path: '/music/b.mp3', title: 'Outro', artist: 'Unknown Artist', duration: 0 },
    ]);

    expect(text).toBe(
      '#EXTM3U\n#EXTINF:62,Band - Intro\n/music/a.mp3\n#EXTINF:-1,Unknown Artist - Outro\n/music/b.mp3\n'
    );
  });

  it('should read paths and skip comments', () => {
    expect(parseM3u('﻿#EXTM3U\r\n#EXTINF:62,Band - Intro\r\n/music/a.mp3\r\n\r\n  /music/b.mp3  \n')).toEqual([
      '/music/a.mp3',
      '/music/b.mp3',
    ]);
  });

  it('should make safe file names', () => {
    expect(uniqueFileNames(['Road Trip', 'AC/DC: Best?', '..hidden'])).toEqual([
      'Road Trip.m3u',
      'AC_DC_ Best_.m3u',
      '_hidden.m3u',
    ]);
  });

  it('should give colliding playlist names distinct files', () => {
    expect(uniqueFileNames(['a/b', 'a_b', 'A_B', 'Mix', 'a_b (2)'])).toEqual([
      'a_b.m3u',
      'a_b (2).m3u',
      'A_B (3).m3u',
      'Mix.m3u',
      'a_b (2) (2).m3u',
    ]);
  });
});
