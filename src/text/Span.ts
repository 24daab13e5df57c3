import type { Style } from '../style/Style.js';

/**
 * A styled region of a Text, in code point offsets: `start` inclusive,
 * `end` exclusive. The constructor orders the offsets so `start <= end`.
 */
export class Span {
  readonly start: number;
  readonly end: number;
  readonly style: Style;

  constructor(start: number, end: number, style: Style) {
    this.start = Math.min(start, end);
    this.end = Math.max(start, end);
    this.style = style;
  }

  get isEmpty(): boolean {
    return this.start >= this.end;
  }

  get length(): number {
    return this.end - this.start;
  }

  /** Shift right by `offset`, clamping both ends to `max`. */
  moveRight(offset: number, max: number): Span {
    return new Span(Math.min(this.start + offset, max), Math.min(this.end + offset, max), this.style);
  }

  /** Split at `offset` characters from the start. */
  split(offset: number): [Span, Span] {
    const at = Math.min(this.start + offset, this.end);
    return [new Span(this.start, at, this.style), new Span(at, this.end, this.style)];
  }

  /** Shift left by `offset`, never below zero. */
  adjust(offset: number): Span {
    return new Span(Math.max(0, this.start - offset), Math.max(0, this.end - offset), this.style);
  }

  /** The part of this span inside [start, end), rebased to `start`; undefined if none. */
  clip(start: number, end: number): Span | undefined {
    const clippedStart = Math.max(this.start, start);
    const clippedEnd = Math.min(this.end, end);
    if (clippedStart >= clippedEnd) return undefined;
    return new Span(clippedStart - start, clippedEnd - start, this.style);
  }
}
