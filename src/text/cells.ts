/**
 * Terminal cell width of strings.
 *
 * Widths are measured per code point: most characters take one cell, East
 * Asian wide characters and emoji take two, control and combining characters
 * take none.
 */

import stringWidth from 'string-width';
import { SharedCache, CELL_WIDTH_CACHE_SIZE, type ParseCache } from '../cache/ParseCache.js';

/** Strings shorter than this (in UTF-16 code units) are measured without the cache. */
const CACHE_MIN_LENGTH = 8;

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

const sharedCache = new SharedCache<number>(CELL_WIDTH_CACHE_SIZE);

/** Cells taken by a single character (0, 1 or 2). */
export function characterCellSize(char: string): number {
  const code = char.codePointAt(0);
  if (code === undefined) return 0;
  if (code >= 0x20 && code < 0x7f) return 1;
  if (code < 0x20 || (code >= 0x7f && code < 0xa0)) return 0;
  return Math.min(stringWidth(char), 2);
}

function computeCellWidth(text: string): number {
  if (PRINTABLE_ASCII.test(text)) return text.length;
  let width = 0;
  for (const char of text) {
    width += characterCellSize(char);
  }
  return width;
}

/** Total cell width of `text`. */
export function cellWidth(text: string, cache: ParseCache<number> = sharedCache.current): number {
  if (text.length < CACHE_MIN_LENGTH) {
    return computeCellWidth(text);
  }

  const cached = cache.get(text);
  if (cached !== undefined) return cached;

  const width = computeCellWidth(text);
  cache.set(text, width);
  return width;
}

/**
 * Split `text` after the last character that fits in `maxWidth` cells.
 * A wide character that would straddle the boundary goes to the right part.
 */
export function chopCells(text: string, maxWidth: number): [string, string] {
  let width = 0;
  let offset = 0;

  for (const char of text) {
    const size = characterCellSize(char);
    if (width + size > maxWidth) break;
    width += size;
    offset += char.length;
  }

  return [text.slice(0, offset), text.slice(offset)];
}

/**
 * Pad or truncate `text` to exactly `width` cells. A wide character cut by
 * the edge is replaced with a space.
 */
export function fitToWidth(text: string, width: number): string {
  const target = Math.max(0, width);
  const current = cellWidth(text);

  if (current === target) return text;
  if (current < target) return text + ' '.repeat(target - current);

  const [kept] = chopCells(text, target);
  const keptWidth = cellWidth(kept);
  return keptWidth < target ? kept + ' '.repeat(target - keptWidth) : kept;
}

/**
 * Code point index of the character that starts at cell `cells`.
 * Returns undefined when `cells` lies beyond the end of the string.
 */
export function cellToCharIndex(text: string, cells: number): number | undefined {
  let current = 0;
  let index = 0;

  for (const char of text) {
    if (current >= cells) return index;
    current += characterCellSize(char);
    index += 1;
  }

  return current >= cells ? index : undefined;
}

/** Starting cell of every code point in `text`. */
export function cellPositions(text: string): number[] {
  const positions: number[] = [];
  let current = 0;
  for (const char of text) {
    positions.push(current);
    current += characterCellSize(char);
  }
  return positions;
}

/** True when any character takes two cells. */
export function hasWideChars(text: string): boolean {
  for (const char of text) {
    if (characterCellSize(char) > 1) return true;
  }
  return false;
}
