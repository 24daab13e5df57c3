/**
 * Decode a string containing ANSI escape sequences into a styled Text.
 *
 * SGR sequences and OSC-8 hyperlinks become spans; every other escape
 * sequence (cursor movement, screen clearing, window titles) is dropped.
 */

import { Color } from '../color/Color.js';
import { Attribute } from '../style/attributes.js';
import { Style } from '../style/Style.js';
import { ANSI_PATTERN } from '../utils/ansi.js';
import { Text, type TextOptions } from './Text.js';

interface SgrState {
  color?: Color;
  bgcolor?: Color;
  attributes: number;
  link?: string;
}

// SGR code → attribute switched on
const ATTRIBUTE_ON: Record<number, number> = {
  1: Attribute.Bold,
  2: Attribute.Dim,
  3: Attribute.Italic,
  4: Attribute.Underline,
  5: Attribute.Blink,
  6: Attribute.Blink2,
  7: Attribute.Reverse,
  8: Attribute.Conceal,
  9: Attribute.Strike,
  21: Attribute.Underline2,
  51: Attribute.Frame,
  52: Attribute.Encircle,
  53: Attribute.Overline,
};

// SGR code → attributes switched off
const ATTRIBUTE_OFF: Record<number, number> = {
  22: Attribute.Bold | Attribute.Dim,
  23: Attribute.Italic,
  24: Attribute.Underline | Attribute.Underline2,
  25: Attribute.Blink | Attribute.Blink2,
  27: Attribute.Reverse,
  28: Attribute.Conceal,
  29: Attribute.Strike,
  54: Attribute.Frame | Attribute.Encircle,
  55: Attribute.Overline,
};

function stateStyle(state: SgrState): Style | undefined {
  if (!state.color && !state.bgcolor && state.attributes === 0 && state.link === undefined) {
    return undefined;
  }
  const style = Style.create({ color: state.color, bgcolor: state.bgcolor, link: state.link });
  return state.attributes ? style.on(state.attributes) : style;
}

/**
 * Read an extended color (`5;n` or `2;r;g;b`) starting at `codes[index]`.
 * Returns the color, if valid, and how many codes were consumed.
 */
function extendedColor(codes: readonly number[], index: number): [Color | undefined, number] {
  const mode = codes[index];
  if (mode === 5) {
    const number = codes[index + 1];
    const valid = Number.isInteger(number) && number >= 0 && number <= 255;
    return [valid ? Color.fromAnsi(number) : undefined, 2];
  }
  if (mode === 2) {
    const channels = codes.slice(index + 1, index + 4);
    const valid = channels.length === 3 && channels.every((c) => Number.isInteger(c) && c >= 0 && c <= 255);
    return [valid ? Color.fromRgb(channels[0], channels[1], channels[2]) : undefined, 4];
  }
  return [undefined, 1];
}

function applySgr(state: SgrState, params: string): void {
  const codes = params === '' ? [0] : params.split(';').map((p) => (p === '' ? 0 : Number(p)));

  for (let i = 0; i < codes.length; i++) {
    const code = codes[i];

    if (code === 0) {
      state.color = undefined;
      state.bgcolor = undefined;
      state.attributes = 0;
    } else if (code in ATTRIBUTE_ON) {
      state.attributes |= ATTRIBUTE_ON[code];
    } else if (code in ATTRIBUTE_OFF) {
      state.attributes &= ~ATTRIBUTE_OFF[code];
    } else if (code >= 30 && code <= 37) {
      state.color = Color.fromAnsi(code - 30);
    } else if (code >= 90 && code <= 97) {
      state.color = Color.fromAnsi(code - 90 + 8);
    } else if (code >= 40 && code <= 47) {
      state.bgcolor = Color.fromAnsi(code - 40);
    } else if (code >= 100 && code <= 107) {
      state.bgcolor = Color.fromAnsi(code - 100 + 8);
    } else if (code === 38 || code === 48) {
      const [color, consumed] = extendedColor(codes, i + 1);
      if (color) {
        if (code === 38) state.color = color;
        else state.bgcolor = color;
      }
      i += consumed;
    } else if (code === 39) {
      state.color = undefined;
    } else if (code === 49) {
      state.bgcolor = undefined;
    }
  }
}

function applySequence(state: SgrState, sequence: string): void {
  if (sequence.startsWith('\x1b]8;')) {
    const body = sequence.replace(/^\x1b\]/, '').replace(/(\x07|\x1b\\)$/, '');
    const url = body.split(';').slice(2).join(';');
    state.link = url === '' ? undefined : url;
    return;
  }
  if (sequence.startsWith('\x1b[') && sequence.endsWith('m')) {
    applySgr(state, sequence.slice(2, -1));
  }
}

function appendRun(text: Text, run: string, state: SgrState): void {
  if (run === '') return;
  const style = stateStyle(state);
  if (style) {
    text.appendStyled(run, style);
  } else {
    text.append(run);
  }
}

/**
 * Convert ANSI-encoded output back into a Text.
 *
 * @param input - String containing escape sequences
 * @param options - Options for the resulting Text
 */
export function fromAnsi(input: string, options: TextOptions = {}): Text {
  const text = new Text('', options);
  const state: SgrState = { attributes: 0 };
  let last = 0;

  for (const match of input.matchAll(ANSI_PATTERN)) {
    const index = match.index ?? 0;
    appendRun(text, input.slice(last, index), state);
    applySequence(state, match[0]);
    last = index + match[0].length;
  }
  appendRun(text, input.slice(last), state);

  return text;
}
