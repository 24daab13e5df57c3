/**
 * Segment: a run of text with one style, the atomic unit of rendered output.
 *
 * A control segment carries terminal control codes instead of visible text;
 * its `text` holds an auxiliary payload such as a window title.
 */

import { Style } from '../style/Style.js';
import { cellWidth, characterCellSize } from './cells.js';

export enum ControlType {
  Bell = 1,
  CarriageReturn = 2,
  Home = 3,
  Clear = 4,
  ShowCursor = 5,
  HideCursor = 6,
  EnableAltScreen = 7,
  DisableAltScreen = 8,
  CursorUp = 9,
  CursorDown = 10,
  CursorForward = 11,
  CursorBackward = 12,
  CursorMoveToColumn = 13,
  CursorMoveTo = 14,
  EraseInLine = 15,
  SetWindowTitle = 16,
}

export interface ControlCode {
  type: ControlType;
  params: number[];
}

export class Segment {
  readonly text: string;
  readonly style: Style | undefined;
  readonly control: readonly ControlCode[] | undefined;

  constructor(text: string, style?: Style, control?: readonly ControlCode[]) {
    this.text = text;
    this.style = style;
    this.control = control;
  }

  static plain(text: string): Segment {
    return new Segment(text);
  }

  static styled(text: string, style: Style): Segment {
    return new Segment(text, style);
  }

  static line(): Segment {
    return new Segment('\n');
  }

  static control(codes: readonly ControlCode[], payload: string = ''): Segment {
    return new Segment(payload, undefined, codes);
  }

  /** True when the segment carries at least one control code. */
  get isControl(): boolean {
    return this.control !== undefined && this.control.length > 0;
  }

  /** Cells this segment occupies; zero for control segments. */
  get cellLength(): number {
    return this.isControl ? 0 : cellWidth(this.text);
  }

  get isEmpty(): boolean {
    return this.text === '' && !this.isControl;
  }

  withStyle(style: Style | undefined): Segment {
    return new Segment(this.text, style, this.control);
  }

  withText(text: string): Segment {
    return new Segment(text, this.style, this.control);
  }

  /** Split after `cell` cells, never dividing a wide character. */
  splitAtCell(cell: number): [Segment, Segment] {
    return splitAtCell(this, cell);
  }

  toString(): string {
    return this.text;
  }
}

/**
 * Split a segment after `cell` cells. A wide character that straddles the
 * cut goes to the right half. Control segments are never split.
 */
export function splitAtCell(segment: Segment, cell: number): [Segment, Segment] {
  if (segment.isControl) {
    return [segment, new Segment('')];
  }

  let width = 0;
  let offset = 0;
  for (const char of segment.text) {
    const size = characterCellSize(char);
    if (width + size > cell) break;
    width += size;
    offset += char.length;
  }

  return [segment.withText(segment.text.slice(0, offset)), segment.withText(segment.text.slice(offset))];
}

function code(type: ControlType, ...params: number[]): ControlCode {
  return { type, params };
}

function verticalMove(y: number): ControlCode[] {
  if (y === 0) return [];
  return [code(y > 0 ? ControlType.CursorDown : ControlType.CursorUp, Math.abs(y))];
}

/** Factories for control segments. */
export const Control = {
  bell(): Segment {
    return Segment.control([code(ControlType.Bell)]);
  },

  carriageReturn(): Segment {
    return Segment.control([code(ControlType.CarriageReturn)]);
  },

  home(): Segment {
    return Segment.control([code(ControlType.Home)]);
  },

  clear(): Segment {
    return Segment.control([code(ControlType.Clear)]);
  },

  /** Move the cursor relative to its current position. */
  moveCursor(x: number, y: number): Segment {
    const codes: ControlCode[] = [];
    if (x !== 0) {
      codes.push(code(x > 0 ? ControlType.CursorForward : ControlType.CursorBackward, Math.abs(x)));
    }
    codes.push(...verticalMove(y));
    return Segment.control(codes);
  },

  /** Move to zero-based column `x`, then `y` rows up or down. */
  moveToColumn(x: number, y: number = 0): Segment {
    return Segment.control([code(ControlType.CursorMoveToColumn, x), ...verticalMove(y)]);
  },

  /** Move to a zero-based absolute position. */
  moveTo(x: number, y: number): Segment {
    return Segment.control([code(ControlType.CursorMoveTo, x, y)]);
  },

  showCursor(show: boolean): Segment {
    return Segment.control([code(show ? ControlType.ShowCursor : ControlType.HideCursor)]);
  },

  altScreen(enable: boolean): Segment {
    return enable
      ? Segment.control([code(ControlType.EnableAltScreen), code(ControlType.Home)])
      : Segment.control([code(ControlType.DisableAltScreen)]);
  },

  /** 0 erases to the end of the line, 1 to the start, 2 the whole line. */
  eraseInLine(mode: number = 2): Segment {
    return Segment.control([code(ControlType.EraseInLine, mode)]);
  },

  title(title: string): Segment {
    return Segment.control([code(ControlType.SetWindowTitle)], title);
  },
};
