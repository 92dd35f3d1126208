/**
 * Raw terminal input to key events.
 *
 * Ink's useInput folds Home, End and the function keys into empty input,
 * so the terminal front end reads stdin itself and decodes the common
 * xterm/VT escape sequences here.
 */

import type { KeyEvent, KeyName } from '@riffline/shared';

const ESC = '\x1b';

const SEQUENCES: ReadonlyArray<readonly [string, KeyName]> = [
  ['[A', 'up'],
  ['[B', 'down'],
  ['[C', 'right'],
  ['[D', 'left'],
  ['OA', 'up'],
  ['OB', 'down'],
  ['OC', 'right'],
  ['OD', 'left'],
  ['[5~', 'pageUp'],
  ['[6~', 'pageDown'],
  ['[H', 'home'],
  ['[1~', 'home'],
  ['[7~', 'home'],
  ['OH', 'home'],
  ['[F', 'end'],
  ['[4~', 'end'],
  ['[8~', 'end'],
  ['OF', 'end'],
  ['[3~', 'delete'],
  ['OP', 'f1'],
  ['[11~', 'f1'],
  ['[[A', 'f1'],
  ['[15~', 'f5'],
  ['[[E', 'f5'],
  ['[Z', 'tab'],
];

// CSI: parameters and intermediates, then one final byte
const CSI = /^\[[0-?]*[ -/]*[@-~]/;

function single(ch: string): KeyEvent {
  switch (ch) {
    case '\r':
    case '\n':
      return { key: 'enter' };
    case '\t':
      return { key: 'tab' };
    case '\x7f':
    case '\b':
      return { key: 'backspace' };
    case ' ':
      return { key: 'space' };
    case ESC:
      return { key: 'escape' };
  }

  const code = ch.charCodeAt(0);
  if (code >= 1 && code <= 26) {
    return { key: 'char', char: String.fromCharCode(code + 96), ctrl: true };
  }
  return { key: 'char', char: ch };
}

/**
 * Decode one chunk of stdin. A chunk may hold several keys (pasted text,
 * fast typing); sequences this decoder does not know are dropped.
 */
export function parseKeys(data: string): KeyEvent[] {
  const events: KeyEvent[] = [];
  const chars = Array.from(data);
  let i = 0;

  while (i < chars.length) {
    const ch = chars[i];

    if (ch === ESC && i + 1 < chars.length) {
      const rest = chars.slice(i + 1).join('');
      const known = SEQUENCES.find(([sequence]) => rest.startsWith(sequence));
      if (known) {
        const [sequence, key] = known;
        events.push(sequence === '[Z' ? { key, shift: true } : { key });
        i += 1 + sequence.length;
        continue;
      }

      const csi = CSI.exec(rest);
      if (csi) {
        i += 1 + csi[0].length;
        continue;
      }

      if (rest.startsWith(ESC)) {
        events.push({ key: 'escape' });
        i += 1;
        continue;
      }

      // Alt+key arrives as ESC followed by the key
      events.push({ ...single(chars[i + 1]), meta: true });
      i += 2;
      continue;
    }

    events.push(single(ch));
    i += 1;
  }

  return events;
}
