// Core types for Riffline
// Shared by the session engine and the terminal front end

export interface Track {
  readonly id: string;
  readonly path: string;
  readonly title: string;
  readonly artist: string;
  readonly album: string;
  readonly duration: number; // seconds
}

export type SortCriterion = 'title' | 'artist' | 'album' | 'duration';

export const SORT_CRITERIA: readonly SortCriterion[] = ['title', 'artist', 'album', 'duration'];

export type SearchScope = 'all' | 'title' | 'artist' | 'album';

export const SEARCH_SCOPES: readonly SearchScope[] = ['all', 'title', 'artist', 'album'];

export enum PlaybackPhase {
  Stopped = 'stopped',
  Playing = 'playing',
  Paused = 'paused',
}

export enum RepeatMode {
  Off = 'off',
  RepeatAll = 'all',
  RepeatOne = 'one',
}

export interface TransportState {
  currentTrackId: string | null;
  phase: PlaybackPhase;
  position: number; // seconds
  volume: number; // 0-100
  muted: boolean;
  shuffle: boolean;
  repeat: RepeatMode;
  seq: number;
}

export interface Playlist {
  name: string;
  trackIds: string[];
}

export type Focus = 'browse' | 'search' | 'playlistName' | 'help';

export type Popup = 'none' | 'help' | 'playlistName';

export type StatusLevel = 'info' | 'error';

export type MessageParams = Record<string, string | number>;

/** Transient status line; `key` is an i18n key rendered with `params` */
export interface StatusMessage {
  key: string;
  params: MessageParams;
  level: StatusLevel;
}
