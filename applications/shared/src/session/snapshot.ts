/**
 * Session snapshot - the one read-only view of the engine handed to the
 * renderer per tick. Built from scratch and frozen, so a render can never
 * see half of one command and half of the next.
 */

import type {
  Focus,
  PlaybackPhase,
  Popup,
  RepeatMode,
  SearchScope,
  SortCriterion,
  StatusMessage,
  Track,
  TransportState,
} from '../types';

export interface TrackRow {
  readonly id: string;
  readonly title: string;
  readonly artist: string;
  readonly album: string;
  readonly duration: number;
  readonly playing: boolean;
  readonly marked: boolean;
}

export interface TransportSnapshot {
  readonly phase: PlaybackPhase;
  readonly track: Track | null;
  readonly position: number;
  readonly duration: number;
  readonly volume: number;
  readonly muted: boolean;
  readonly shuffle: boolean;
  readonly repeat: RepeatMode;
}

export interface PlaylistEntry {
  /** null stands for the whole library */
  readonly name: string | null;
  readonly trackCount: number;
}

export interface PlaylistsSnapshot {
  readonly entries: readonly PlaylistEntry[];
  readonly cursor: number;
  readonly active: string | null;
}

export interface SessionSnapshot {
  readonly tick: number;
  readonly rows: readonly TrackRow[];
  readonly selection: number | null;
  readonly transport: TransportSnapshot;
  readonly playlists: PlaylistsSnapshot;
  readonly activePlaylist: string | null;
  readonly popup: Popup;
  readonly focus: Focus;
  readonly search: string;
  readonly searchScope: SearchScope;
  readonly sort: SortCriterion;
  readonly playlistNameInput: string;
  readonly status: Readonly<StatusMessage> | null;
  readonly catalogSize: number;
  readonly markedCount: number;
}

export interface SnapshotInput {
  tick: number;
  view: readonly Track[];
  selection: number | null;
  transport: TransportState;
  currentTrack: Track | null;
  playlists: readonly PlaylistEntry[];
  playlistCursor: number;
  activePlaylist: string | null;
  focus: Focus;
  search: string;
  searchScope: SearchScope;
  sort: SortCriterion;
  playlistNameInput: string;
  status: StatusMessage | null;
  catalogSize: number;
  marked: ReadonlySet<string>;
}

function popupFor(focus: Focus): Popup {
  switch (focus) {
    case 'help':
      return 'help';
    case 'playlistName':
      return 'playlistName';
    default:
      return 'none';
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function buildSnapshot(input: SnapshotInput): SessionSnapshot {
  const playingId = input.transport.currentTrackId;

  const rows: TrackRow[] = input.view.map((track) => ({
    id: track.id,
    title: track.title,
    artist: track.artist,
    album: track.album,
    duration: track.duration,
    playing: track.id === playingId,
    marked: input.marked.has(track.id),
  }));

  const snapshot: SessionSnapshot = {
    tick: input.tick,
    rows,
    selection: input.selection,
    transport: {
      phase: input.transport.phase,
      track: input.currentTrack,
      position: input.transport.position,
      duration: input.currentTrack?.duration ?? 0,
      volume: input.transport.volume,
      muted: input.transport.muted,
      shuffle: input.transport.shuffle,
      repeat: input.transport.repeat,
    },
    playlists: {
      entries: input.playlists.map((entry) => ({ ...entry })),
      cursor: input.playlistCursor,
      active: input.activePlaylist,
    },
    activePlaylist: input.activePlaylist,
    popup: popupFor(input.focus),
    focus: input.focus,
    search: input.search,
    searchScope: input.searchScope,
    sort: input.sort,
    playlistNameInput: input.playlistNameInput,
    status: input.status ? { ...input.status, params: { ...input.status.params } } : null,
    catalogSize: input.catalogSize,
    markedCount: input.marked.size,
  };

  return deepFreeze(snapshot);
}
