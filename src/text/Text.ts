/**
 * Rich text: a plain string plus styled spans.
 *
 * Offsets are code point indices into `plain`. Spans may overlap; when they do,
 * spans added later are combined on top of earlier ones. `wrap` and `render`
 * work in terminal cells, so wide characters count double.
 */

import { Style } from '../style/Style.js';
import { cellWidth, characterCellSize } from './cells.js';
import { Segment } from './Segment.js';
import { Span } from './Span.js';

export type JustifyMethod = 'default' | 'left' | 'center' | 'right' | 'full';
export type OverflowMethod = 'fold' | 'crop' | 'ellipsis' | 'ignore';

export const JUSTIFY_METHODS: readonly JustifyMethod[] = ['default', 'left', 'center', 'right', 'full'];
export const OVERFLOW_METHODS: readonly OverflowMethod[] = ['fold', 'crop', 'ellipsis', 'ignore'];

export interface TextOptions {
  /** Base style under every span. */
  style?: Style;
  justify?: JustifyMethod;
  overflow?: OverflowMethod;
  noWrap?: boolean;
  /** Appended after the text when printed. */
  end?: string;
  tabSize?: number;
}

const ELLIPSIS = '…';
const WHITESPACE = /\s/u;

function isWhitespace(char: string): boolean {
  return WHITESPACE.test(char);
}

function codePointLength(text: string): number {
  return Array.from(text).length;
}

/** Number of leading characters whose cells fit in `maxWidth`, and their width. */
function fitChars(chars: readonly string[], maxWidth: number): [number, number] {
  let width = 0;
  let count = 0;
  for (const char of chars) {
    const size = characterCellSize(char);
    if (width + size > maxWidth) break;
    width += size;
    count += 1;
  }
  return [count, width];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function addToBucket(buckets: Map<number, number[]>, key: number, value: number): void {
  const bucket = buckets.get(key);
  if (bucket) bucket.push(value);
  else buckets.set(key, [value]);
}

/** Position of `value` in the ascending array `sorted`, or where it would be inserted. */
function sortedIndex(sorted: readonly number[], value: number): number {
  let low = 0;
  let high = sorted.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (sorted[mid] < value) low = mid + 1;
    else high = mid;
  }
  return low;
}

interface Word {
  start: number;
  /** End of the word without its trailing whitespace. */
  visibleEnd: number;
  end: number;
}

/** Split a line into words that carry their trailing whitespace. */
function splitWords(chars: readonly string[]): Word[] {
  const words: Word[] = [];
  let i = 0;

  // Leading whitespace forms its own word
  while (i < chars.length && isWhitespace(chars[i])) i += 1;
  if (i > 0) words.push({ start: 0, visibleEnd: 0, end: i });

  while (i < chars.length) {
    const start = i;
    while (i < chars.length && !isWhitespace(chars[i])) i += 1;
    const visibleEnd = i;
    while (i < chars.length && isWhitespace(chars[i])) i += 1;
    words.push({ start, visibleEnd, end: i });
  }

  return words;
}

export class Text {
  private plainText: string;
  private spanList: Span[];
  private charLength: number;

  style: Style;
  justify: JustifyMethod;
  overflow: OverflowMethod;
  noWrap: boolean;
  end: string;
  tabSize: number;

  constructor(plain: string = '', options: TextOptions = {}, spans: readonly Span[] = []) {
    this.plainText = plain;
    this.charLength = codePointLength(plain);
    this.spanList = [...spans];
    this.style = options.style ?? Style.null();
    this.justify = options.justify ?? 'default';
    this.overflow = options.overflow ?? 'fold';
    this.noWrap = options.noWrap ?? false;
    this.end = options.end ?? '\n';
    this.tabSize = options.tabSize ?? 8;
  }

  /** Text whose whole content carries `style` as a span. */
  static styled(plain: string, style: Style, options: TextOptions = {}): Text {
    const text = new Text('', options);
    return text.appendStyled(plain, style);
  }

  /** Concatenate plain strings, `[text, style]` pairs and Text pieces. */
  static assemble(
    pieces: ReadonlyArray<string | Text | readonly [string, Style | undefined]>,
    options: TextOptions = {}
  ): Text {
    const text = new Text('', options);
    for (const piece of pieces) {
      if (typeof piece === 'string') {
        text.append(piece);
      } else if (piece instanceof Text) {
        text.appendText(piece);
      } else {
        const [content, style] = piece;
        if (style) text.appendStyled(content, style);
        else text.append(content);
      }
    }
    return text;
  }

  get plain(): string {
    return this.plainText;
  }

  get spans(): readonly Span[] {
    return this.spanList;
  }

  /** Length in code points. */
  get length(): number {
    return this.charLength;
  }

  get isEmpty(): boolean {
    return this.charLength === 0;
  }

  get cellLength(): number {
    return cellWidth(this.plainText);
  }

  get options(): Required<TextOptions> {
    return {
      style: this.style,
      justify: this.justify,
      overflow: this.overflow,
      noWrap: this.noWrap,
      end: this.end,
      tabSize: this.tabSize,
    };
  }

  /** A new Text with these options and the given content. */
  private derive(plain: string, spans: readonly Span[]): Text {
    return new Text(plain, this.options, spans);
  }

  copy(): Text {
    return this.derive(this.plainText, this.spanList);
  }

  // --- Building ---

  append(text: string): this {
    this.plainText += text;
    this.charLength += codePointLength(text);
    return this;
  }

  appendStyled(text: string, style: Style): this {
    const start = this.charLength;
    this.append(text);
    if (this.charLength > start) {
      this.spanList.push(new Span(start, this.charLength, style));
    }
    return this;
  }

  /** Append another Text; its base style becomes a span over the appended range. */
  appendText(other: Text): this {
    if (!other.style.isNull && other.length > 0) {
      this.spanList.push(new Span(this.charLength, this.charLength + other.length, other.style));
    }
    return this.appendContent(other);
  }

  /** Append the plain text and spans of `other`, ignoring its base style. */
  private appendContent(other: Text): this {
    const offset = this.charLength;
    this.append(other.plain);
    for (const span of other.spans) {
      this.spanList.push(span.moveRight(offset, this.charLength));
    }
    return this;
  }

  /** Apply a style to [start, end), clamped to the text. Empty ranges are ignored. */
  stylize(start: number, end: number, style: Style): this {
    const clampedStart = Math.max(0, Math.min(start, this.charLength));
    const clampedEnd = Math.max(0, Math.min(end, this.charLength));
    if (clampedStart < clampedEnd) {
      this.spanList.push(new Span(clampedStart, clampedEnd, style));
    }
    return this;
  }

  stylizeAll(style: Style): this {
    return this.stylize(0, this.charLength, style);
  }

  /** Style every match of `pattern`. Returns the number of matches styled. */
  highlightRegex(pattern: RegExp | string, style: Style): number {
    let flags = typeof pattern === 'string' ? 'gu' : pattern.flags;
    if (!flags.includes('g')) flags += 'g';
    const regex = new RegExp(pattern, flags);
    const toChar = this.codeUnitToCharIndex();
    let count = 0;

    for (const match of this.plainText.matchAll(regex)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (end > start) {
        this.spanList.push(new Span(toChar[start], toChar[end], style));
        count += 1;
      }
    }

    return count;
  }

  /** Style every occurrence of each word. Returns the number of matches styled. */
  highlightWords(words: readonly string[], style: Style, caseSensitive: boolean = true): number {
    const nonEmpty = words.filter((word) => word !== '');
    if (nonEmpty.length === 0) return 0;
    const pattern = new RegExp(nonEmpty.map(escapeRegExp).join('|'), caseSensitive ? 'gu' : 'giu');
    return this.highlightRegex(pattern, style);
  }

  /** Maps each UTF-16 offset (and the end offset) to a code point index. */
  private codeUnitToCharIndex(): number[] {
    const map: number[] = [];
    let index = 0;
    for (const char of this.plainText) {
      for (let i = 0; i < char.length; i++) map.push(index);
      index += 1;
    }
    map.push(index);
    return map;
  }

  // --- Slicing ---

  /** Characters [start, end) as a new Text; spans are clipped and rebased. */
  slice(start: number, end: number = this.charLength): Text {
    const clampedStart = Math.max(0, Math.min(start, this.charLength));
    const clampedEnd = Math.max(clampedStart, Math.min(end, this.charLength));
    const plain = Array.from(this.plainText).slice(clampedStart, clampedEnd).join('');
    const spans: Span[] = [];
    for (const span of this.spanList) {
      const clipped = span.clip(clampedStart, clampedEnd);
      if (clipped) spans.push(clipped);
    }
    return this.derive(plain, spans);
  }

  /** Cut at ascending character offsets into `offsets.length + 1` pieces. */
  divide(offsets: readonly number[]): Text[] {
    if (offsets.length === 0) return [this.copy()];

    const result: Text[] = [];
    let previous = 0;
    for (const offset of offsets) {
      const clamped = Math.max(previous, Math.min(offset, this.charLength));
      result.push(this.slice(previous, clamped));
      previous = clamped;
    }
    result.push(this.slice(previous, this.charLength));
    return result;
  }

  /** One Text per line; the newlines themselves are dropped. */
  splitLines(): Text[] {
    const chars = Array.from(this.plainText);
    const lines: Text[] = [];
    let lineStart = 0;

    chars.forEach((char, index) => {
      if (char === '\n') {
        lines.push(this.slice(lineStart, index));
        lineStart = index + 1;
      }
    });
    lines.push(this.slice(lineStart, chars.length));

    return lines;
  }

  /** Concatenate `items` with this text between each pair. */
  join(items: Iterable<Text>): Text {
    const result = new Text('', { ...this.options, style: Style.null() });
    let first = true;
    for (const item of items) {
      if (!first) result.appendText(this);
      result.appendText(item);
      first = false;
    }
    return result;
  }

  /** Remove leading and trailing whitespace. */
  strip(): Text {
    const chars = Array.from(this.plainText);
    let start = 0;
    while (start < chars.length && isWhitespace(chars[start])) start += 1;
    let end = chars.length;
    while (end > start && isWhitespace(chars[end - 1])) end -= 1;
    return this.slice(start, end);
  }

  /** Remove trailing whitespace. */
  rstrip(): Text {
    const chars = Array.from(this.plainText);
    let end = chars.length;
    while (end > 0 && isWhitespace(chars[end - 1])) end -= 1;
    return end === chars.length ? this.copy() : this.slice(0, end);
  }

  /** Replace tabs with spaces up to the next multiple of `tabSize` cells. */
  expandTabs(tabSize: number = this.tabSize): Text {
    if (tabSize <= 0 || !this.plainText.includes('\t')) return this.copy();

    let plain = '';
    // Start index of each old character in the new text, plus the end
    const positions: number[] = [];
    let newLength = 0;
    let column = 0;

    for (const char of this.plainText) {
      positions.push(newLength);
      if (char === '\t') {
        const spaces = tabSize - (column % tabSize);
        plain += ' '.repeat(spaces);
        newLength += spaces;
        column += spaces;
      } else {
        plain += char;
        newLength += 1;
        column = char === '\n' ? 0 : column + characterCellSize(char);
      }
    }
    positions.push(newLength);

    const spans = this.spanList
      .map((span) => new Span(positions[span.start], positions[span.end], span.style))
      .filter((span) => !span.isEmpty);
    return this.derive(plain, spans);
  }

  toLowerCase(): Text {
    return this.mapCase((char) => char.toLowerCase());
  }

  toUpperCase(): Text {
    return this.mapCase((char) => char.toUpperCase());
  }

  private mapCase(mapper: (char: string) => string): Text {
    let plain = '';
    const positions: number[] = [0];
    let newLength = 0;

    for (const char of this.plainText) {
      const mapped = mapper(char);
      plain += mapped;
      newLength += codePointLength(mapped);
      positions.push(newLength);
    }

    const spans = this.spanList
      .map((span) => new Span(positions[span.start], positions[span.end], span.style))
      .filter((span) => !span.isEmpty);
    return this.derive(plain, spans);
  }

  // --- Sizing ---

  /**
   * Fit into `width` cells using `overflow`; with `pad`, fill short text with
   * spaces up to the width.
   */
  truncate(width: number, overflow: OverflowMethod = this.overflow, pad: boolean = false): this {
    const maxWidth = Math.max(0, width);
    const current = this.cellLength;

    if (current > maxWidth && overflow !== 'ignore') {
      const chars = Array.from(this.plainText);
      if (overflow === 'ellipsis' && maxWidth > 0) {
        const [count] = fitChars(chars, maxWidth - 1);
        this.replaceWith(this.slice(0, count).append(ELLIPSIS));
      } else {
        const [count] = fitChars(chars, maxWidth);
        this.replaceWith(this.slice(0, count));
      }
    }

    if (pad) {
      const padded = this.cellLength;
      if (padded < maxWidth) this.append(' '.repeat(maxWidth - padded));
    }
    return this;
  }

  /** Pad with spaces up to `width` cells, placing the text per `justify`. */
  pad(width: number, justify: JustifyMethod = 'left'): this {
    const deficit = width - this.cellLength;
    if (deficit <= 0) return this;

    switch (justify) {
      case 'right':
        return this.padLeft(deficit);
      case 'center': {
        const left = Math.floor(deficit / 2);
        return this.padLeft(left).append(' '.repeat(deficit - left));
      }
      default:
        return this.append(' '.repeat(deficit));
    }
  }

  /** Insert `count` spaces at the start, shifting spans. */
  padLeft(count: number): this {
    if (count <= 0) return this;
    this.plainText = ' '.repeat(count) + this.plainText;
    this.charLength += count;
    this.spanList = this.spanList.map((span) => new Span(span.start + count, span.end + count, span.style));
    return this;
  }

  /** Truncate to `width`, then pad to exactly `width` per `justify`. */
  align(justify: JustifyMethod, width: number): this {
    this.truncate(width, this.overflow, false);
    return this.pad(width, justify);
  }

  private replaceWith(other: Text): void {
    this.plainText = other.plainText;
    this.charLength = other.charLength;
    this.spanList = [...other.spanList];
  }

  // --- Wrapping ---

  /**
   * Word-wrap into lines of at most `width` cells.
   *
   * Tabs are expanded and explicit newlines always break. Each line keeps the
   * trailing whitespace of its last word unless justification strips it.
   */
  wrap(width: number): Text[] {
    if (width <= 0) return [this.derive('', [])];

    const lines: Text[] = [];
    for (const line of this.expandTabs().splitLines()) {
      if (this.noWrap) {
        lines.push(line.overflow === 'ignore' ? line : line.truncate(width, line.overflow));
      } else if (line.cellLength <= width) {
        lines.push(line);
      } else {
        lines.push(...Text.wrapLine(line, width));
      }
    }

    return this.justifyLines(lines, width);
  }

  private static wrapLine(line: Text, width: number): Text[] {
    const chars = Array.from(line.plain);
    const sizes = chars.map(characterCellSize);
    const cellsBetween = (start: number, end: number): number => {
      let total = 0;
      for (let i = start; i < end; i++) total += sizes[i];
      return total;
    };

    const result: Text[] = [];
    let lineStart = 0;
    let lineWidth = 0;

    for (const word of splitWords(chars)) {
      const visibleWidth = cellsBetween(word.start, word.visibleEnd);

      if (lineStart < word.start && lineWidth + visibleWidth > width) {
        result.push(line.slice(lineStart, word.start));
        lineStart = word.start;
        lineWidth = 0;
      }

      if (visibleWidth <= width) {
        lineWidth += cellsBetween(word.start, word.end);
        continue;
      }

      // The word alone is wider than a line
      if (line.overflow === 'fold') {
        let chunkStart = word.start;
        while (cellsBetween(chunkStart, word.visibleEnd) > width) {
          const [count] = fitChars(chars.slice(chunkStart, word.visibleEnd), width);
          const chunkEnd = chunkStart + Math.max(1, count);
          result.push(line.slice(chunkStart, chunkEnd));
          chunkStart = chunkEnd;
        }
        lineStart = chunkStart;
        lineWidth = cellsBetween(chunkStart, word.end);
      } else {
        const piece = line.slice(word.start, word.end);
        result.push(line.overflow === 'ignore' ? piece : piece.rstrip().truncate(width, line.overflow));
        lineStart = word.end;
        lineWidth = 0;
      }
    }

    if (lineStart < chars.length || result.length === 0) {
      result.push(line.slice(lineStart, chars.length));
    }

    return result;
  }

  private justifyLines(lines: Text[], width: number): Text[] {
    switch (this.justify) {
      case 'default':
        return lines;
      case 'left':
      case 'right':
      case 'center':
        return lines.map((line) => line.rstrip().pad(width, this.justify));
      case 'full':
        return lines.map((line, index) =>
          index === lines.length - 1 ? line.rstrip().pad(width, 'left') : Text.justifyFull(line.rstrip(), width)
        );
    }
  }

  /** Widen the gaps between words so the line fills `width`; rightmost gaps grow first. */
  private static justifyFull(line: Text, width: number): Text {
    const chars = Array.from(line.plain);
    const gaps: number[] = [];
    chars.forEach((char, index) => {
      if (char === ' ') gaps.push(index);
    });
    if (gaps.length === 0) return line.pad(width, 'left');

    const spaces = gaps.map(() => 1);
    let used = line.cellLength;
    let index = 0;
    while (used < width) {
      spaces[spaces.length - index - 1] += 1;
      used += 1;
      index = (index + 1) % spaces.length;
    }

    const result = new Text('', line.options);
    let previous = 0;
    gaps.forEach((gap, i) => {
      result.appendContent(line.slice(previous, gap));
      const space = line.slice(gap, gap + 1);
      const widened = new Text(' '.repeat(spaces[i]));
      for (const span of space.spans) widened.stylizeAll(span.style);
      result.appendContent(widened);
      previous = gap + 1;
    });
    result.appendContent(line.slice(previous, chars.length));
    return result;
  }

  // --- Rendering ---

  /**
   * Project into segments. Each run gets the base style combined with every
   * span covering it, in the order the spans were added.
   */
  render(end: string = ''): Segment[] {
    const segments: Segment[] = [];

    if (this.charLength > 0) {
      // Span indices opening and closing at each offset
      const opening = new Map<number, number[]>();
      const closing = new Map<number, number[]>();
      this.spanList.forEach((span, index) => {
        const start = Math.min(span.start, this.charLength);
        const stop = Math.min(span.end, this.charLength);
        if (start >= stop) return;
        addToBucket(opening, start, index);
        addToBucket(closing, stop, index);
      });

      const cuts = [...new Set([0, this.charLength, ...opening.keys(), ...closing.keys()])].sort((a, b) => a - b);
      const chars = Array.from(this.plainText);
      const styleCache = new Map<string, Style>();
      // Active span indices in ascending order, so styles combine in the order spans were added
      const active: number[] = [];

      for (let i = 0; i < cuts.length - 1; i++) {
        const start = cuts[i];
        const stop = cuts[i + 1];
        for (const index of closing.get(start) ?? []) {
          active.splice(sortedIndex(active, index), 1);
        }
        for (const index of opening.get(start) ?? []) {
          active.splice(sortedIndex(active, index), 0, index);
        }

        const key = active.join(',');
        let style = styleCache.get(key);
        if (!style) {
          style = active.reduce((acc, index) => acc.combine(this.spanList[index].style), this.style);
          styleCache.set(key, style);
        }

        const text = chars.slice(start, stop).join('');
        segments.push(new Segment(text, style.isNull ? undefined : style));
      }
    }

    if (end !== '') {
      segments.push(new Segment(end));
    }
    return segments;
  }

  equals(other: Text): boolean {
    return (
      this.plainText === other.plainText &&
      this.spanList.length === other.spanList.length &&
      this.spanList.every((span, i) => {
        const theirs = other.spanList[i];
        return span.start === theirs.start && span.end === theirs.end && span.style.equals(theirs.style);
      })
    );
  }

  toString(): string {
    return this.plainText;
  }
}
