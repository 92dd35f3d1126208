/**
 * Playback session engine.
 *
 * Owns the catalog, the search/sort view, the playlist store, the transport
 * and all UI state, and publishes one frozen snapshot per tick through a
 * zustand store. A tick drains the audio backend without waiting, applies
 * at most one queued key event, then rebuilds the snapshot.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import type { AudioBackend } from '../audio/backend';
import { Catalog } from '../catalog/catalog';
import type { Action } from '../dispatcher/actions';
import { dispatch } from '../dispatcher/dispatcher';
import type { KeyEvent } from '../dispatcher/keymap';
import { ViewIndex } from '../library/viewIndex';
import { isSessionError, type SessionError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { clamp, dropLastCharacter } from '../lib/utils';
import { deliverNotification, type Notifier } from '../notifier/notifier';
import { PlaylistStore } from '../playlists/playlistStore';
import type { PlaylistRecord } from '../playlists/schema';
import { Transport, type TransportEvent } from '../transport/transport';
import {
  SEARCH_SCOPES,
  SORT_CRITERIA,
  RepeatMode,
  type Focus,
  type MessageParams,
  type StatusLevel,
  type StatusMessage,
  type Track,
} from '../types';
import { buildSnapshot, type PlaylistEntry, type SessionSnapshot } from './snapshot';

const log = createLogger('Session');

export interface SessionOptions {
  backend: AudioBackend;
  tracks?: readonly Track[];
  /** Persisted playlist record; anything invalid yields an empty store */
  playlists?: unknown;
  notifier?: Notifier;
  volume?: number;
  muted?: boolean;
  shuffle?: boolean;
  repeat?: RepeatMode;
  shuffleSeed?: number;
  pageSize?: number;
  seekStepSeconds?: number;
  volumeStep?: number;
  statusTtlMs?: number;
  now?: () => number;
}

export interface SessionStoreState {
  snapshot: SessionSnapshot;
}

type Listener = () => void;

function cycle<T>(values: readonly T[], current: T): T {
  return values[(values.indexOf(current) + 1) % values.length];
}

function sameIds(a: readonly Track[], b: readonly Track[]): boolean {
  return a.length === b.length && a.every((track, i) => track.id === b[i].id);
}

export class Session {
  readonly store: StoreApi<SessionStoreState>;

  private catalog: Catalog;
  private playlists: PlaylistStore;
  private readonly index = new ViewIndex();
  private readonly transport: Transport;
  private readonly notifier: Notifier | null;

  private view: readonly Track[] = [];
  private selection: number | null = null;
  private focus: Focus = 'browse';
  private activePlaylist: string | null = null;
  // 0 is the library, i > 0 is playlists.names()[i - 1]
  private playlistCursor = 0;
  private playlistNameInput = '';
  private readonly marked = new Set<string>();

  private status: StatusMessage | null = null;
  private statusExpiresAt = 0;
  private readonly inputQueue: KeyEvent[] = [];
  private tickCount = 0;

  private readonly pageSize: number;
  private readonly seekStep: number;
  private readonly volumeStep: number;
  private readonly statusTtlMs: number;
  private readonly now: () => number;

  private readonly quitListeners = new Set<Listener>();
  private readonly rescanListeners = new Set<Listener>();
  private quitRequested = false;
  private readonly unsubscribeTransport: () => void;

  constructor(options: SessionOptions) {
    this.catalog = new Catalog(options.tracks ?? []);
    this.playlists = PlaylistStore.fromRecord(options.playlists ?? null);
    this.notifier = options.notifier ?? null;
    this.pageSize = Math.max(1, options.pageSize ?? 10);
    this.seekStep = options.seekStepSeconds ?? 5;
    this.volumeStep = options.volumeStep ?? 5;
    this.statusTtlMs = options.statusTtlMs ?? 3000;
    this.now = options.now ?? Date.now;

    this.transport = new Transport({
      backend: options.backend,
      volume: options.volume,
      muted: options.muted,
      shuffle: options.shuffle,
      repeat: options.repeat,
      shuffleSeed: options.shuffleSeed,
      anchor: () => this.selectedTrack()?.id ?? null,
    });
    this.unsubscribeTransport = this.transport.on((event) => this.handleTransportEvent(event));
    this.transport.syncOutput();

    this.refreshView();
    this.store = createStore<SessionStoreState>(() => ({ snapshot: this.buildSnapshot() }));
  }

  // ===== Loop =====

  enqueueInput(event: KeyEvent): void {
    this.inputQueue.push(event);
  }

  get pendingInputs(): number {
    return this.inputQueue.length;
  }

  tick(now: number = this.now()): SessionSnapshot {
    this.transport.reconcile();

    const event = this.inputQueue.shift();
    if (event) {
      const action = dispatch(event, this.focus);
      if (action) {
        this.apply(action);
      }
    }

    if (this.status && now >= this.statusExpiresAt) {
      this.status = null;
    }

    this.tickCount += 1;
    const snapshot = this.buildSnapshot();
    this.store.setState({ snapshot });
    return snapshot;
  }

  getSnapshot(): SessionSnapshot {
    return this.store.getState().snapshot;
  }

  get isQuitRequested(): boolean {
    return this.quitRequested;
  }

  // ===== Catalog & playlists =====

  replaceCatalog(tracks: readonly Track[]): void {
    this.catalog = new Catalog(tracks);
    for (const id of [...this.marked]) {
      if (!this.catalog.has(id)) this.marked.delete(id);
    }
    this.refreshView();
    log.info(`Catalog replaced with ${this.catalog.size} tracks`);
  }

  loadPlaylists(record: unknown): void {
    this.playlists = PlaylistStore.fromRecord(record);
    this.activePlaylist = null;
    this.playlistCursor = 0;
    this.refreshView();
  }

  playlistRecord(): PlaylistRecord {
    return this.playlists.toRecord();
  }

  requestQuit(): void {
    if (this.quitRequested) return;
    this.quitRequested = true;
    this.quitListeners.forEach((listener) => listener());
  }

  onQuit(listener: Listener): () => void {
    this.quitListeners.add(listener);
    return () => {
      this.quitListeners.delete(listener);
    };
  }

  onRescan(listener: Listener): () => void {
    this.rescanListeners.add(listener);
    return () => {
      this.rescanListeners.delete(listener);
    };
  }

  /**
   * Show a transient status line (used by the front end for rescan results)
   */
  setStatus(key: string, params: MessageParams = {}, level: StatusLevel = 'info'): void {
    this.status = { key, params, level };
    this.statusExpiresAt = this.now() + this.statusTtlMs;
  }

  // ===== Actions =====

  apply(action: Action): void {
    try {
      this.applyUnsafe(action);
    } catch (error) {
      if (isSessionError(error)) {
        this.reportError(error);
        return;
      }
      log.error(`Action ${action.type} failed`, error);
      this.setStatus('status.unexpectedError', { action: action.type }, 'error');
    }
  }

  private applyUnsafe(action: Action): void {
    switch (action.type) {
      case 'moveSelection':
        this.moveSelection(action.delta);
        return;
      case 'movePage':
        this.moveSelection(action.direction * this.pageSize);
        return;
      case 'selectEdge':
        if (this.view.length > 0) {
          this.selection = action.edge === 'first' ? 0 : this.view.length - 1;
        }
        return;

      case 'playOrStop':
        this.playOrStop();
        return;
      case 'togglePause':
        this.transport.togglePause();
        return;
      case 'stop':
        this.transport.stop();
        return;
      case 'toggleMute':
        this.transport.toggleMute();
        return;
      case 'seek':
        this.transport.seek(action.direction * this.seekStep);
        return;
      case 'volume':
        this.transport.changeVolume(action.direction * this.volumeStep);
        return;
      case 'next':
        this.transport.next();
        return;
      case 'previous':
        this.transport.previous();
        return;

      case 'toggleShuffle':
        this.transport.toggleShuffle();
        return;
      case 'cycleRepeat':
        this.transport.cycleRepeat();
        return;
      case 'cycleSort':
        this.index.setSort(cycle(SORT_CRITERIA, this.index.getSort()));
        this.refreshView();
        return;
      case 'cycleSearchScope':
        this.index.setScope(cycle(SEARCH_SCOPES, this.index.getScope()));
        this.refreshView();
        return;
      case 'focusSearch':
        this.focus = 'search';
        return;

      case 'searchInput':
        this.index.setSearch(this.index.getSearch() + action.text);
        this.refreshView();
        return;
      case 'searchBackspace':
        this.index.setSearch(dropLastCharacter(this.index.getSearch()));
        this.refreshView();
        return;
      case 'searchClear':
        this.index.setSearch('');
        this.refreshView();
        return;
      case 'blurSearch':
        this.focus = 'browse';
        return;

      case 'openPlaylistName':
        this.focus = 'playlistName';
        this.playlistNameInput = '';
        return;
      case 'playlistNameInput':
        this.playlistNameInput += action.text;
        return;
      case 'playlistNameBackspace':
        this.playlistNameInput = dropLastCharacter(this.playlistNameInput);
        return;
      case 'submitPlaylistName':
        this.createPlaylistFromInput();
        return;
      case 'playlistCursor':
        this.movePlaylistCursor(action.direction);
        return;
      case 'openPlaylist':
        this.activePlaylist = this.highlightedPlaylist();
        this.refreshView();
        return;
      case 'movePlaylist':
        this.movePlaylist(action.direction);
        return;
      case 'deletePlaylist':
        this.deleteHighlightedPlaylist();
        return;
      case 'addSelectedToPlaylist':
        this.addSelectedToPlaylist();
        return;
      case 'removeSelectedFromPlaylist':
        this.removeSelectedFromPlaylist();
        return;
      case 'toggleMark':
        this.toggleMark();
        return;

      case 'toggleHelp':
        this.focus = this.focus === 'help' ? 'browse' : 'help';
        return;
      case 'closePopup':
        this.focus = 'browse';
        this.playlistNameInput = '';
        return;
      case 'rescan':
        this.setStatus('status.rescanning');
        this.rescanListeners.forEach((listener) => listener());
        return;
      case 'quit':
        this.requestQuit();
        return;
    }
  }

  // ===== Selection =====

  private selectedTrack(): Track | null {
    return this.selection === null ? null : this.view[this.selection] ?? null;
  }

  private moveSelection(delta: number): void {
    if (this.view.length === 0) {
      this.selection = null;
      return;
    }
    const current = this.selection ?? 0;
    // Single steps wrap around; pages stop at the ends
    if (Math.abs(delta) === 1) {
      this.selection = (current + delta + this.view.length) % this.view.length;
    } else {
      this.selection = clamp(current + delta, 0, this.view.length - 1);
    }
  }

  private selectTrack(id: string): void {
    const index = this.view.findIndex((track) => track.id === id);
    if (index !== -1) {
      this.selection = index;
    }
  }

  // ===== Transport =====

  private playOrStop(): void {
    const selected = this.selectedTrack();
    if (!selected) return;

    if (this.transport.getState().currentTrackId === selected.id) {
      this.transport.stop();
    } else {
      this.transport.load(selected);
    }
  }

  private handleTransportEvent(event: TransportEvent): void {
    switch (event.type) {
      case 'trackChange':
        this.selectTrack(event.track.id);
        this.notify({ type: 'trackChange', track: event.track });
        return;
      case 'pause':
        this.notify({ type: 'pause', track: event.track });
        return;
      case 'resume':
        this.notify({ type: 'resume', track: event.track });
        return;
      case 'error':
        this.setStatus('status.backendError', { reason: event.reason }, 'error');
        this.notify({ type: 'error', track: event.track, reason: event.reason });
        return;
      case 'stop':
        return;
    }
  }

  private notify(event: Parameters<Notifier['notify']>[0]): void {
    if (this.notifier) {
      deliverNotification(this.notifier, event, log);
    }
  }

  // ===== Playlists =====

  private playlistEntries(): PlaylistEntry[] {
    return [
      { name: null, trackCount: this.catalog.size },
      ...this.playlists.list().map((p) => ({
        name: p.name,
        trackCount: this.catalog.resolve(p.trackIds).length,
      })),
    ];
  }

  private highlightedPlaylist(): string | null {
    if (this.playlistCursor === 0) return null;
    return this.playlists.names()[this.playlistCursor - 1] ?? null;
  }

  private movePlaylistCursor(direction: number): void {
    const count = this.playlists.size + 1;
    this.playlistCursor = (this.playlistCursor + direction + count) % count;
  }

  private movePlaylist(direction: number): void {
    const name = this.highlightedPlaylist();
    if (!name) return;
    const index = this.playlists.moveSelection(name, direction < 0 ? 'up' : 'down');
    this.playlistCursor = index + 1;
  }

  private createPlaylistFromInput(): void {
    const playlist = this.playlists.create(this.playlistNameInput);
    for (const id of this.marked) {
      this.playlists.addTrack(playlist.name, id);
    }
    this.marked.clear();
    this.focus = 'browse';
    this.playlistNameInput = '';
    this.refreshView();
    this.setStatus('status.playlistCreated', { name: playlist.name });
  }

  private deleteHighlightedPlaylist(): void {
    const name = this.highlightedPlaylist();
    if (!name) {
      this.setStatus('status.cannotDeleteLibrary', {}, 'error');
      return;
    }
    this.playlists.delete(name);
    if (this.activePlaylist === name) {
      this.activePlaylist = null;
    }
    this.playlistCursor = clamp(this.playlistCursor, 0, this.playlists.size);
    this.refreshView();
    this.setStatus('status.playlistDeleted', { name });
  }

  private addSelectedToPlaylist(): void {
    const name = this.highlightedPlaylist();
    if (!name) {
      this.setStatus('status.selectPlaylistFirst', {}, 'error');
      return;
    }
    const track = this.selectedTrack();
    if (!track) return;

    if (this.playlists.addTrack(name, track.id)) {
      this.setStatus('status.addedToPlaylist', { title: track.title, name });
    } else {
      this.setStatus('status.alreadyInPlaylist', { title: track.title, name });
    }
    this.refreshView();
  }

  private removeSelectedFromPlaylist(): void {
    const name = this.activePlaylist;
    if (!name) {
      this.setStatus('status.notInPlaylist', {}, 'error');
      return;
    }
    const track = this.selectedTrack();
    if (!track) return;

    if (this.playlists.removeTrack(name, track.id)) {
      this.refreshView();
      this.setStatus('status.removedFromPlaylist', { title: track.title, name });
    }
  }

  private toggleMark(): void {
    const track = this.selectedTrack();
    if (!track) return;
    if (this.marked.has(track.id)) {
      this.marked.delete(track.id);
    } else {
      this.marked.add(track.id);
    }
  }

  // ===== View =====

  /**
   * Recompute the view from its source. Keeps the selected track selected
   * when it survives, otherwise clamps the index into the new view.
   */
  private refreshView(): void {
    const selectedId = this.selectedTrack()?.id ?? null;
    const source =
      this.activePlaylist !== null && this.playlists.has(this.activePlaylist)
        ? this.catalog.resolve(this.playlists.get(this.activePlaylist).trackIds)
        : this.catalog.tracks;

    const next = this.index.rebuild(source);
    const changed = !sameIds(next, this.view);
    this.view = next;
    if (changed) {
      this.transport.setQueue(next);
    }

    if (next.length === 0) {
      this.selection = null;
      return;
    }
    const kept = selectedId === null ? -1 : next.findIndex((track) => track.id === selectedId);
    this.selection = kept !== -1 ? kept : clamp(this.selection ?? 0, 0, next.length - 1);
  }

  private reportError(error: SessionError): void {
    log.warn(error.message);
    switch (error.code) {
      case 'DuplicateName':
        this.setStatus('status.playlistExists', { name: this.playlistNameInput.trim() }, 'error');
        return;
      case 'NotFound':
        this.setStatus('status.playlistNotFound', {}, 'error');
        return;
      case 'InvalidState':
        this.setStatus('status.playlistNameEmpty', {}, 'error');
        return;
    }
  }

  private buildSnapshot(): SessionSnapshot {
    return buildSnapshot({
      tick: this.tickCount,
      view: this.view,
      selection: this.selection,
      transport: this.transport.getState(),
      currentTrack: this.transport.getCurrentTrack(),
      playlists: this.playlistEntries(),
      playlistCursor: this.playlistCursor,
      activePlaylist: this.activePlaylist,
      focus: this.focus,
      search: this.index.getSearch(),
      searchScope: this.index.getScope(),
      sort: this.index.getSort(),
      playlistNameInput: this.playlistNameInput,
      status: this.status,
      catalogSize: this.catalog.size,
      marked: this.marked,
    });
  }

  dispose(): void {
    this.unsubscribeTransport();
    this.quitListeners.clear();
    this.rescanListeners.clear();
  }
}
