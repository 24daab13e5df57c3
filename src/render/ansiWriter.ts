/**
 * Turn a segment stream into the escape-sequence text written to a terminal.
 */

import { ColorSystem } from '../color/Color.js';
import type { Style } from '../style/Style.js';
import { ControlType, type ControlCode, type Segment } from '../text/Segment.js';
import {
  BELL,
  CARRIAGE_RETURN,
  CLEAR_SCREEN,
  CURSOR_HOME,
  DISABLE_ALT_SCREEN,
  ENABLE_ALT_SCREEN,
  HIDE_CURSOR,
  SHOW_CURSOR,
  cursorBackward,
  cursorDown,
  cursorForward,
  cursorTo,
  cursorToColumn,
  cursorUp,
  eraseInLine,
  windowTitle,
} from '../utils/ansi.js';

export interface AnsiWriterOptions {
  /** Target color system; `null` writes plain text without any styling. */
  colorSystem: ColorSystem | null;
}

function param(code: ControlCode, index: number, fallback: number): number {
  return code.params[index] ?? fallback;
}

/** The escape sequence for one control code. */
export function renderControl(code: ControlCode, payload: string = ''): string {
  switch (code.type) {
    case ControlType.Bell:
      return BELL;
    case ControlType.CarriageReturn:
      return CARRIAGE_RETURN;
    case ControlType.Home:
      return CURSOR_HOME;
    case ControlType.Clear:
      return CLEAR_SCREEN;
    case ControlType.ShowCursor:
      return SHOW_CURSOR;
    case ControlType.HideCursor:
      return HIDE_CURSOR;
    case ControlType.EnableAltScreen:
      return ENABLE_ALT_SCREEN;
    case ControlType.DisableAltScreen:
      return DISABLE_ALT_SCREEN;
    case ControlType.CursorUp:
      return cursorUp(param(code, 0, 1));
    case ControlType.CursorDown:
      return cursorDown(param(code, 0, 1));
    case ControlType.CursorForward:
      return cursorForward(param(code, 0, 1));
    case ControlType.CursorBackward:
      return cursorBackward(param(code, 0, 1));
    case ControlType.CursorMoveToColumn:
      return cursorToColumn(param(code, 0, 0));
    case ControlType.CursorMoveTo:
      return cursorTo(param(code, 0, 0), param(code, 1, 0));
    case ControlType.EraseInLine:
      return eraseInLine(param(code, 0, 2));
    case ControlType.SetWindowTitle:
      return windowTitle(payload);
  }
}

/**
 * Render segments to a string. Styled text is wrapped in its style's
 * prefix and suffix; control segments become their escape sequences.
 */
export function renderSegments(segments: Iterable<Segment>, options: AnsiWriterOptions): string {
  const { colorSystem } = options;
  const prefixes = new Map<Style, [string, string]>();
  const parts: string[] = [];

  for (const segment of segments) {
    if (segment.isControl) {
      for (const code of segment.control ?? []) {
        parts.push(renderControl(code, segment.text));
      }
      continue;
    }

    const { text, style } = segment;
    if (text === '') continue;
    if (colorSystem === null || !style) {
      parts.push(text);
      continue;
    }

    let framing = prefixes.get(style);
    if (!framing) {
      framing = style.renderAnsi(colorSystem);
      prefixes.set(style, framing);
    }
    parts.push(framing[0], text, framing[1]);
  }

  return parts.join('');
}
