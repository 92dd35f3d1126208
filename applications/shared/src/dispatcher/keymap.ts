/**
 * Key bindings for the browse context.
 *
 * The table drives both dispatch and the help popup, so the help text can
 * never drift from what the keys actually do.
 */

import type { Action } from './actions';

export type KeyName =
  | 'char'
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'pageUp'
  | 'pageDown'
  | 'home'
  | 'end'
  | 'enter'
  | 'escape'
  | 'backspace'
  | 'delete'
  | 'tab'
  | 'space'
  | 'f1'
  | 'f5';

export interface KeyEvent {
  key: KeyName;
  /** The typed character when `key` is 'char' */
  char?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export interface KeySpec {
  key: KeyName;
  char?: string;
  ctrl?: boolean;
}

export interface KeyBinding {
  keys: KeySpec[];
  /** What the help popup shows for the keys */
  label: string;
  action: Action;
  /** i18n key of the help line */
  help: string;
}

const char = (c: string, ctrl = false): KeySpec => ({ key: 'char', char: c, ctrl });

export const BROWSE_BINDINGS: readonly KeyBinding[] = [
  { keys: [{ key: 'up' }], label: '↑', action: { type: 'moveSelection', delta: -1 }, help: 'help.selectUp' },
  { keys: [{ key: 'down' }], label: '↓', action: { type: 'moveSelection', delta: 1 }, help: 'help.selectDown' },
  { keys: [{ key: 'pageUp' }], label: 'PgUp', action: { type: 'movePage', direction: -1 }, help: 'help.pageUp' },
  { keys: [{ key: 'pageDown' }], label: 'PgDn', action: { type: 'movePage', direction: 1 }, help: 'help.pageDown' },
  { keys: [{ key: 'home' }], label: 'Home', action: { type: 'selectEdge', edge: 'first' }, help: 'help.first' },
  { keys: [{ key: 'end' }], label: 'End', action: { type: 'selectEdge', edge: 'last' }, help: 'help.last' },
  { keys: [{ key: 'enter' }], label: 'Enter', action: { type: 'playOrStop' }, help: 'help.playOrStop' },
  { keys: [{ key: 'space' }], label: 'Space', action: { type: 'togglePause' }, help: 'help.togglePause' },
  { keys: [char('s')], label: 's', action: { type: 'stop' }, help: 'help.stop' },
  { keys: [char('n')], label: 'n', action: { type: 'next' }, help: 'help.next' },
  { keys: [char('p')], label: 'p', action: { type: 'previous' }, help: 'help.previous' },
  { keys: [{ key: 'left' }], label: '←', action: { type: 'seek', direction: -1 }, help: 'help.seekBack' },
  { keys: [{ key: 'right' }], label: '→', action: { type: 'seek', direction: 1 }, help: 'help.seekForward' },
  { keys: [char('+'), char('=')], label: '+', action: { type: 'volume', direction: 1 }, help: 'help.volumeUp' },
  { keys: [char('-')], label: '-', action: { type: 'volume', direction: -1 }, help: 'help.volumeDown' },
  { keys: [char('m')], label: 'm', action: { type: 'toggleMute' }, help: 'help.mute' },
  { keys: [char('z')], label: 'z', action: { type: 'toggleShuffle' }, help: 'help.shuffle' },
  { keys: [char('r')], label: 'r', action: { type: 'cycleRepeat' }, help: 'help.repeat' },
  { keys: [char('o')], label: 'o', action: { type: 'cycleSort' }, help: 'help.sort' },
  { keys: [char('f')], label: 'f', action: { type: 'cycleSearchScope' }, help: 'help.searchScope' },
  { keys: [char('/')], label: '/', action: { type: 'focusSearch' }, help: 'help.search' },
  { keys: [char('[')], label: '[', action: { type: 'playlistCursor', direction: -1 }, help: 'help.playlistUp' },
  { keys: [char(']')], label: ']', action: { type: 'playlistCursor', direction: 1 }, help: 'help.playlistDown' },
  { keys: [{ key: 'tab' }], label: 'Tab', action: { type: 'openPlaylist' }, help: 'help.openPlaylist' },
  { keys: [char('{')], label: '{', action: { type: 'movePlaylist', direction: -1 }, help: 'help.movePlaylistUp' },
  { keys: [char('}')], label: '}', action: { type: 'movePlaylist', direction: 1 }, help: 'help.movePlaylistDown' },
  { keys: [char('c')], label: 'c', action: { type: 'openPlaylistName' }, help: 'help.createPlaylist' },
  { keys: [char('x')], label: 'x', action: { type: 'deletePlaylist' }, help: 'help.deletePlaylist' },
  { keys: [char('a')], label: 'a', action: { type: 'addSelectedToPlaylist' }, help: 'help.addToPlaylist' },
  { keys: [char('d')], label: 'd', action: { type: 'removeSelectedFromPlaylist' }, help: 'help.removeFromPlaylist' },
  { keys: [char('t')], label: 't', action: { type: 'toggleMark' }, help: 'help.mark' },
  { keys: [{ key: 'f5' }, char('R')], label: 'F5 / R', action: { type: 'rescan' }, help: 'help.rescan' },
  { keys: [{ key: 'f1' }, char('?')], label: 'F1 / ?', action: { type: 'toggleHelp' }, help: 'help.toggleHelp' },
  { keys: [{ key: 'escape' }], label: 'Esc', action: { type: 'closePopup' }, help: 'help.closePopup' },
  { keys: [char('q'), char('c', true)], label: 'q / Ctrl+C', action: { type: 'quit' }, help: 'help.quit' },
];

export function matchesKey(spec: KeySpec, event: KeyEvent): boolean {
  if (spec.key !== event.key) return false;
  if (Boolean(spec.ctrl) !== Boolean(event.ctrl)) return false;
  if (spec.key === 'char') {
    if (event.meta) return false;
    return spec.char === event.char;
  }
  return true;
}

export function findBinding(bindings: readonly KeyBinding[], event: KeyEvent): KeyBinding | undefined {
  return bindings.find((binding) => binding.keys.some((spec) => matchesKey(spec, event)));
}
