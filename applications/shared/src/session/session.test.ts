import { beforeEach, describe, it, expect, vi } from 'vitest';
import type { KeyEvent } from '../dispatcher/keymap';
import type { Notifier } from '../notifier/notifier';
import { FakeAudioBackend, makeTrack } from '../test-utils/fakeAudioBackend';
import { PlaybackPhase } from '../types';
import { Session, type SessionOptions } from './session';

const charlie = makeTrack('Charlie', { artist: 'Ann', album: 'Gold', duration: 240 });
const alpha = makeTrack('Alpha', { artist: 'Cid', album: 'Iron', duration: 180 });
const bravo = makeTrack('Bravo', { artist: 'Bea', album: 'Jade', duration: 200 });

const key = (c: string, extra: Partial<KeyEvent> = {}): KeyEvent => ({ key: 'char', char: c, ...extra });
const ENTER: KeyEvent = { key: 'enter' };

let backend: FakeAudioBackend;
let clock: number;

function createSession(options: Partial<SessionOptions> = {}): Session {
  return new Session({
    backend,
    tracks: [charlie, alpha, bravo],
    shuffleSeed: 42,
    now: () => clock,
    ...options,
  });
}

/** Queue each event and run one tick for it */
function press(session: Session, ...events: KeyEvent[]) {
  for (const event of events) {
    session.enqueueInput(event);
    session.tick(clock);
  }
  return session.getSnapshot();
}

function type(session: Session, text: string) {
  return press(session, ...[...text].map((c) => key(c)));
}

const titles = (session: Session) => session.getSnapshot().rows.map((r) => r.title);

describe('Session', () => {
  beforeEach(() => {
    backend = new FakeAudioBackend();
    clock = 1000;
  });

  it('should start with the catalog sorted by title and the first row selected', () => {
    const session = createSession();
    const snapshot = session.getSnapshot();

    expect(snapshot.rows.map((r) => r.title)).toEqual(['Alpha', 'Bravo', 'Charlie']);
    expect(snapshot.selection).toBe(0);
    expect(snapshot.focus).toBe('browse');
    expect(snapshot.playlists.entries).toEqual([{ name: null, trackCount: 3 }]);
    expect(backend.commandTypes()).toEqual(['setVolume', 'setMuted']);
  });

  it('should apply at most one input per tick', () => {
    const session = createSession();
    session.enqueueInput({ key: 'down' });
    session.enqueueInput({ key: 'down' });

    expect(session.tick(clock).selection).toBe(1);
    expect(session.pendingInputs).toBe(1);
    expect(session.tick(clock).selection).toBe(2);
    expect(session.tick(clock).tick).toBe(3);
  });

  it('should publish every snapshot to the store', () => {
    const session = createSession();
    const listener = vi.fn();
    session.store.subscribe(listener);

    const snapshot = session.tick(clock);

    expect(session.store.getState().snapshot).toBe(snapshot);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  describe('selection', () => {
    it('should wrap single steps and clamp pages', () => {
      const session = createSession({ pageSize: 2 });

      expect(press(session, { key: 'up' }).selection).toBe(2);
      expect(press(session, { key: 'down' }).selection).toBe(0);
      expect(press(session, { key: 'pageDown' }).selection).toBe(2);
      expect(press(session, { key: 'pageDown' }).selection).toBe(2);
      expect(press(session, { key: 'home' }).selection).toBe(0);
      expect(press(session, { key: 'end' }).selection).toBe(2);
    });

    it('should clamp when the view shrinks and clear when it empties', () => {
      const session = createSession();
      press(session, { key: 'end' }, key('/'));

      let snapshot = type(session, 'alp');
      expect(snapshot.rows.map((r) => r.title)).toEqual(['Alpha']);
      expect(snapshot.selection).toBe(0);

      snapshot = type(session, 'zzz');
      expect(snapshot.rows).toEqual([]);
      expect(snapshot.selection).toBeNull();

      snapshot = press(session, key('u', { ctrl: true }));
      expect(snapshot.rows).toHaveLength(3);
      expect(snapshot.selection).toBe(0);
    });

    it('should keep the selected track selected when the order changes', () => {
      const session = createSession();
      press(session, { key: 'down' });

      const snapshot = press(session, key('o'));

      expect(snapshot.sort).toBe('artist');
      expect(snapshot.rows.map((r) => r.title)).toEqual(['Charlie', 'Bravo', 'Alpha']);
      expect(snapshot.rows[snapshot.selection ?? -1].title).toBe('Bravo');
    });
  });

  describe('search', () => {
    it('should type into the search field and return to browse', () => {
      const session = createSession();
      press(session, key('/'));

      let snapshot = type(session, 'Bq');
      expect(snapshot.search).toBe('Bq');
      expect(snapshot.focus).toBe('search');

      snapshot = press(session, { key: 'backspace' }, ENTER);
      expect(snapshot.search).toBe('B');
      expect(snapshot.focus).toBe('browse');
      expect(snapshot.rows.map((r) => r.title)).toEqual(['Bravo']);
    });

    it('should delete a whole emoji on backspace', () => {
      const session = createSession();
      press(session, key('/'));
      type(session, 'B🎸');

      const snapshot = press(session, { key: 'backspace' });
      expect(snapshot.search).toBe('B');
    });

    it('should cycle the search scope', () => {
      const session = createSession();
      press(session, key('f'));
      press(session, key('/'));

      const snapshot = type(session, 'b');
      expect(snapshot.searchScope).toBe('title');
      expect(snapshot.rows.map((r) => r.title)).toEqual(['Bravo']);
    });
  });

  describe('playback', () => {
    it('should play the selected track and stop it on a second Enter', () => {
      const session = createSession();

      let snapshot = press(session, ENTER);
      expect(snapshot.transport.phase).toBe(PlaybackPhase.Playing);
      expect(snapshot.transport.track?.title).toBe('Alpha');
      expect(snapshot.rows[0].playing).toBe(true);

      snapshot = press(session, ENTER);
      expect(snapshot.transport.phase).toBe(PlaybackPhase.Stopped);
      expect(snapshot.transport.track).toBeNull();
    });

    it('should keep the progress bar from jumping back after a seek', () => {
      const session = createSession();
      press(session, ENTER);
      const playSeq = backend.lastSeq;

      backend.emit({ type: 'position', seq: playSeq, position: 13 });
      expect(press(session, { key: 'right' }).transport.position).toBe(18);

      backend.emit({ type: 'position', seq: playSeq, position: 14 });
      expect(session.tick(clock).transport.position).toBe(18);

      backend.emit({ type: 'position', seq: backend.lastSeq, position: 19 });
      expect(session.tick(clock).transport.position).toBe(19);
    });

    it('should move the selection to the track that starts playing', () => {
      const session = createSession();

      const snapshot = press(session, key('n'));

      expect(snapshot.transport.track?.title).toBe('Bravo');
      expect(snapshot.selection).toBe(1);
    });

    it('should change volume by the configured step', () => {
      const session = createSession({ volume: 50, volumeStep: 10 });

      expect(press(session, key('+')).transport.volume).toBe(60);
      expect(press(session, key('-'), key('-')).transport.volume).toBe(40);
      expect(press(session, key('m')).transport.muted).toBe(true);
    });

    it('should surface backend errors in the status line', () => {
      const notifier: Notifier = { notify: vi.fn() };
      const session = createSession({ notifier });
      press(session, ENTER);
      const loadSeq = backend.commands.filter((c) => c.type === 'load')[0].seq;

      backend.emit({ type: 'error', seq: loadSeq, reason: 'file vanished' });
      const snapshot = session.tick(clock);

      expect(snapshot.transport.phase).toBe(PlaybackPhase.Stopped);
      expect(snapshot.status).toEqual({
        key: 'status.backendError',
        params: { reason: 'file vanished' },
        level: 'error',
      });
      expect(notifier.notify).toHaveBeenLastCalledWith({ type: 'error', track: alpha, reason: 'file vanished' });
    });
  });

  describe('notifier', () => {
    it('should announce track changes', () => {
      const notifier: Notifier = { notify: vi.fn() };
      const session = createSession({ notifier });

      press(session, ENTER, { key: 'space' });

      expect(notifier.notify).toHaveBeenNthCalledWith(1, { type: 'trackChange', track: alpha });
      expect(notifier.notify).toHaveBeenNthCalledWith(2, { type: 'pause', track: alpha });
    });

    it('should keep playing when the notifier fails', () => {
      const throwing: Notifier = {
        notify: () => {
          throw new Error('display gone');
        },
      };
      const rejecting: Notifier = { notify: () => Promise.reject(new Error('display gone')) };

      for (const notifier of [throwing, rejecting]) {
        const session = createSession({ notifier });
        expect(press(session, ENTER).transport.phase).toBe(PlaybackPhase.Playing);
      }
    });
  });

  describe('playlists', () => {
    it('should create a playlist from the marked tracks', () => {
      const session = createSession();
      press(session, key('t'), { key: 'down' }, { key: 'down' }, key('t'));
      expect(session.getSnapshot().markedCount).toBe(2);

      press(session, key('c'));
      expect(session.getSnapshot().popup).toBe('playlistName');
      type(session, 'Favorites');
      const snapshot = press(session, ENTER);

      expect(snapshot.popup).toBe('none');
      expect(snapshot.markedCount).toBe(0);
      expect(snapshot.status).toEqual({ key: 'status.playlistCreated', params: { name: 'Favorites' }, level: 'info' });
      expect(session.playlistRecord().playlists).toEqual([{ name: 'Favorites', trackIds: [alpha.id, charlie.id] }]);
      expect(snapshot.playlists.entries[1]).toEqual({ name: 'Favorites', trackCount: 2 });
    });

    it('should keep the popup open for duplicate and empty names', () => {
      const session = createSession();
      session.loadPlaylists({ version: 1, playlists: [{ name: 'Mix', trackIds: [] }] });

      press(session, key('c'));
      type(session, 'Mix');
      let snapshot = press(session, ENTER);
      expect(snapshot.focus).toBe('playlistName');
      expect(snapshot.status).toEqual({ key: 'status.playlistExists', params: { name: 'Mix' }, level: 'error' });

      snapshot = press(session, { key: 'backspace' }, { key: 'backspace' }, { key: 'backspace' }, ENTER);
      expect(snapshot.status?.key).toBe('status.playlistNameEmpty');

      snapshot = press(session, { key: 'escape' });
      expect(snapshot.focus).toBe('browse');
      expect(snapshot.playlistNameInput).toBe('');
    });

    it('should delete a whole emoji from the playlist name', () => {
      const session = createSession();
      press(session, key('c'));
      type(session, 'Mix🎸');

      expect(press(session, { key: 'backspace' }).playlistNameInput).toBe('Mix');
    });

    it('should add to the highlighted playlist only once', () => {
      const session = createSession();
      session.loadPlaylists({ version: 1, playlists: [{ name: 'Favorites', trackIds: [] }] });

      expect(press(session, key('a')).status?.key).toBe('status.selectPlaylistFirst');

      press(session, key(']'));
      let snapshot = press(session, key('a'));
      expect(snapshot.status).toEqual({
        key: 'status.addedToPlaylist',
        params: { title: 'Alpha', name: 'Favorites' },
        level: 'info',
      });

      snapshot = press(session, key('a'));
      expect(snapshot.status?.key).toBe('status.alreadyInPlaylist');
      expect(session.playlistRecord().playlists[0].trackIds).toEqual([alpha.id]);
    });

    it('should open a playlist and remove tracks from it', () => {
      const session = createSession();
      session.loadPlaylists({ version: 1, playlists: [{ name: 'Road', trackIds: [bravo.id, charlie.id] }] });

      let snapshot = press(session, key(']'), { key: 'tab' });
      expect(snapshot.activePlaylist).toBe('Road');
      expect(titles(session)).toEqual(['Bravo', 'Charlie']);

      snapshot = press(session, key('d'));
      expect(titles(session)).toEqual(['Charlie']);
      expect(snapshot.selection).toBe(0);
      expect(snapshot.playlists.entries[1]).toEqual({ name: 'Road', trackCount: 1 });

      snapshot = press(session, key('['), { key: 'tab' });
      expect(snapshot.activePlaylist).toBeNull();
      expect(titles(session)).toHaveLength(3);
      expect(press(session, key('d')).status?.key).toBe('status.notInPlaylist');
    });

    it('should reorder and delete playlists', () => {
      const session = createSession();
      session.loadPlaylists({
        version: 1,
        playlists: [
          { name: 'One', trackIds: [] },
          { name: 'Two', trackIds: [] },
        ],
      });

      let snapshot = press(session, key('['));
      expect(snapshot.playlists.cursor).toBe(2);

      snapshot = press(session, key('{'));
      expect(snapshot.playlists.entries.map((e) => e.name)).toEqual([null, 'Two', 'One']);
      expect(snapshot.playlists.cursor).toBe(1);

      press(session, { key: 'tab' });
      snapshot = press(session, key('x'));
      expect(snapshot.playlists.entries.map((e) => e.name)).toEqual([null, 'One']);
      expect(snapshot.activePlaylist).toBeNull();
      expect(snapshot.status?.key).toBe('status.playlistDeleted');

      press(session, key('['));
      expect(press(session, key('x')).status?.key).toBe('status.cannotDeleteLibrary');
    });
  });

  describe('status', () => {
    it('should expire after three seconds', () => {
      const session = createSession();
      session.setStatus('status.rescanned', { count: 3 });

      expect(session.tick(3999).status?.key).toBe('status.rescanned');
      expect(session.tick(4000).status).toBeNull();
    });
  });

  describe('popups and hooks', () => {
    it('should stop hearing transport events once disposed', () => {
      const notifier: Notifier = { notify: vi.fn() };
      const session = createSession({ notifier });
      press(session, ENTER);

      session.dispose();
      backend.emit({ type: 'endOfTrack', seq: backend.lastSeq });
      session.tick(clock);

      expect(backend.commands.filter((c) => c.type === 'load')).toHaveLength(2);
      expect(notifier.notify).toHaveBeenCalledTimes(1);
    });

    it('should swallow shortcuts while help is open', () => {
      const session = createSession();

      expect(press(session, key('?')).popup).toBe('help');
      expect(press(session, key('q')).popup).toBe('help');
      expect(session.isQuitRequested).toBe(false);
      expect(press(session, { key: 'escape' }).popup).toBe('none');
    });

    it('should call quit listeners once', () => {
      const session = createSession();
      const onQuit = vi.fn();
      session.onQuit(onQuit);

      press(session, key('q'));
      session.requestQuit();

      expect(session.isQuitRequested).toBe(true);
      expect(onQuit).toHaveBeenCalledTimes(1);
    });

    it('should quit on Ctrl+C from the search field', () => {
      const session = createSession();
      press(session, key('/'), key('c', { ctrl: true }));
      expect(session.isQuitRequested).toBe(true);
    });

    it('should ask for a rescan', () => {
      const session = createSession();
      const onRescan = vi.fn();
      session.onRescan(onRescan);

      const snapshot = press(session, { key: 'f5' });

      expect(onRescan).toHaveBeenCalledTimes(1);
      expect(snapshot.status?.key).toBe('status.rescanning');
    });
  });

  describe('replaceCatalog', () => {
    it('should rebuild the view and drop marks for missing tracks', () => {
      const session = createSession();
      press(session, key('t'));
      const delta = makeTrack('Delta');

      session.replaceCatalog([bravo, delta]);
      const snapshot = session.tick(clock);

      expect(snapshot.rows.map((r) => r.title)).toEqual(['Bravo', 'Delta']);
      expect(snapshot.markedCount).toBe(0);
      expect(snapshot.catalogSize).toBe(2);
      expect(snapshot.selection).toBe(0);
    });
  });
});
