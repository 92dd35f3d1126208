/**
 * Command dispatcher - maps a key event in a focus context to one action.
 *
 * Pure lookup: it never reads or changes session state. Whether the action
 * is legal right now is the session's business.
 */

import type { Focus } from '../types';
import type { Action } from './actions';
import { BROWSE_BINDINGS, findBinding, type KeyEvent } from './keymap';

const QUIT: Action = { type: 'quit' };

function isCtrlC(event: KeyEvent): boolean {
  return event.key === 'char' && event.char === 'c' && Boolean(event.ctrl);
}

/**
 * Printable text carried by the event, if any
 */
function typedText(event: KeyEvent): string | null {
  if (event.ctrl || event.meta) return null;
  if (event.key === 'space') return ' ';
  if (event.key === 'char' && event.char && !/[\u0000-\u001f\u007f]/.test(event.char)) {
    return event.char;
  }
  return null;
}

function dispatchSearch(event: KeyEvent): Action | null {
  if (event.key === 'char' && event.char === 'u' && event.ctrl) {
    return { type: 'searchClear' };
  }
  switch (event.key) {
    case 'backspace':
    case 'delete':
      return { type: 'searchBackspace' };
    case 'enter':
    case 'escape':
    case 'down':
    case 'tab':
      return { type: 'blurSearch' };
  }
  const text = typedText(event);
  return text === null ? null : { type: 'searchInput', text };
}

function dispatchPlaylistName(event: KeyEvent): Action | null {
  switch (event.key) {
    case 'backspace':
    case 'delete':
      return { type: 'playlistNameBackspace' };
    case 'enter':
      return { type: 'submitPlaylistName' };
    case 'escape':
      return { type: 'closePopup' };
  }
  const text = typedText(event);
  return text === null ? null : { type: 'playlistNameInput', text };
}

function dispatchHelp(event: KeyEvent): Action | null {
  if (event.key === 'escape') return { type: 'closePopup' };
  if (event.key === 'f1' || (event.key === 'char' && event.char === '?')) {
    return { type: 'toggleHelp' };
  }
  return null;
}

export function dispatch(event: KeyEvent, focus: Focus): Action | null {
  if (isCtrlC(event)) return QUIT;

  switch (focus) {
    case 'search':
      return dispatchSearch(event);
    case 'playlistName':
      return dispatchPlaylistName(event);
    case 'help':
      return dispatchHelp(event);
    case 'browse':
      return findBinding(BROWSE_BINDINGS, event)?.action ?? null;
  }
}
