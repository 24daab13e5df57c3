/**
 * Operations over segment streams and lines of segments.
 */

import { Style } from '../style/Style.js';
import { Segment } from './Segment.js';

export type SegmentLine = Segment[];

/** Total cells of a line. */
export function lineLength(line: readonly Segment[]): number {
  return line.reduce((sum, segment) => sum + segment.cellLength, 0);
}

/**
 * Put `style` underneath each segment's style and `postStyle` on top of it.
 * Control segments pass through.
 */
export function applyStyle(segments: readonly Segment[], style?: Style, postStyle?: Style): Segment[] {
  return segments.map((segment) => {
    if (segment.isControl) return segment;

    let result = segment.style;
    if (style) {
      result = result ? style.combine(result) : style;
    }
    if (postStyle) {
      result = result ? result.combine(postStyle) : postStyle;
    }
    return segment.withStyle(result);
  });
}

/** Break a stream into lines at `\n`. Newlines are removed; empty pieces dropped. */
export function splitLines(segments: readonly Segment[]): SegmentLine[] {
  const lines: SegmentLine[] = [[]];
  let current = lines[0];

  for (const segment of segments) {
    if (segment.isControl) {
      current.push(segment);
      continue;
    }

    segment.text.split('\n').forEach((part, i) => {
      if (i > 0) {
        current = [];
        lines.push(current);
      }
      if (part !== '') {
        current.push(segment.withText(part));
      }
    });
  }

  return lines;
}

function truncateLine(line: readonly Segment[], maxWidth: number): SegmentLine {
  const result: SegmentLine = [];
  let remaining = maxWidth;

  for (const segment of line) {
    if (segment.isControl) {
      result.push(segment);
      continue;
    }

    const width = segment.cellLength;
    if (width <= remaining) {
      result.push(segment);
      remaining -= width;
    } else {
      if (remaining > 0) {
        result.push(segment.splitAtCell(remaining)[0]);
      }
      break;
    }
  }

  return result;
}

/** Pad (when `pad` is set) or truncate a line to `length` cells. */
export function adjustLineLength(
  line: readonly Segment[],
  length: number,
  style?: Style,
  pad: boolean = true
): SegmentLine {
  const current = lineLength(line);

  if (current < length && pad) {
    return [...line, new Segment(' '.repeat(length - current), style)];
  }
  if (current > length) {
    return truncateLine(line, length);
  }
  return [...line];
}

function sameStyle(a: Style | undefined, b: Style | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return a.equals(b);
}

/** Merge adjacent segments with equal styles and drop empty text segments. */
export function simplify(segments: readonly Segment[]): Segment[] {
  const result: Segment[] = [];

  for (const segment of segments) {
    if (segment.isControl) {
      result.push(segment);
      continue;
    }
    if (segment.text === '') continue;

    const last = result[result.length - 1];
    if (last && !last.isControl && sameStyle(last.style, segment.style)) {
      result[result.length - 1] = last.withText(last.text + segment.text);
      continue;
    }

    result.push(segment);
  }

  return result;
}

/**
 * Cut a line at ascending cell positions into `cuts.length + 1` parts.
 * Segments that straddle a cut are split.
 */
export function divide(segments: readonly Segment[], cuts: readonly number[]): SegmentLine[] {
  if (cuts.length === 0) return [[...segments]];

  const result: SegmentLine[] = Array.from({ length: cuts.length + 1 }, () => []);
  const last = result.length - 1;
  let position = 0;
  let cutIndex = 0;

  for (const segment of segments) {
    if (segment.isControl) {
      result[Math.min(cutIndex, last)].push(segment);
      continue;
    }

    const width = segment.cellLength;
    const end = position + width;

    while (cutIndex < cuts.length && cuts[cutIndex] <= position) {
      cutIndex += 1;
    }

    if (cutIndex >= cuts.length || end <= cuts[cutIndex]) {
      result[Math.min(cutIndex, last)].push(segment);
    } else {
      let remaining = segment;
      let at = position;

      while (cutIndex < cuts.length && at + remaining.cellLength > cuts[cutIndex]) {
        const [left, right] = remaining.splitAtCell(cuts[cutIndex] - at);
        if (left.text !== '') result[cutIndex].push(left);
        at = cuts[cutIndex];
        cutIndex += 1;
        remaining = right;
      }

      if (remaining.text !== '') {
        result[Math.min(cutIndex, last)].push(remaining);
      }
    }

    position = end;
  }

  return result;
}

function padLine(line: readonly Segment[], width: number, style: Style): SegmentLine {
  const current = lineLength(line);
  return current < width ? [...line, new Segment(' '.repeat(width - current), style)] : [...line];
}

function blankLine(width: number, style: Style): SegmentLine {
  return [new Segment(' '.repeat(width), style)];
}

/** Pad lines to `width` and add blank lines below up to `height`. */
export function alignTop(
  lines: readonly SegmentLine[],
  width: number,
  height: number,
  style: Style
): SegmentLine[] {
  const result = lines.map((line) => padLine(line, width, style));
  while (result.length < height) {
    result.push(blankLine(width, style));
  }
  return result;
}

/** Pad lines to `width` and add blank lines above up to `height`. */
export function alignBottom(
  lines: readonly SegmentLine[],
  width: number,
  height: number,
  style: Style
): SegmentLine[] {
  const padding = Math.max(0, height - lines.length);
  return [
    ...Array.from({ length: padding }, () => blankLine(width, style)),
    ...lines.map((line) => padLine(line, width, style)),
  ];
}

/** Center lines vertically; the odd blank line goes below. */
export function alignMiddle(
  lines: readonly SegmentLine[],
  width: number,
  height: number,
  style: Style
): SegmentLine[] {
  if (lines.length >= height) {
    return alignTop(lines, width, height, style);
  }

  const total = height - lines.length;
  const top = Math.floor(total / 2);
  const bottom = total - top;
  return [
    ...Array.from({ length: top }, () => blankLine(width, style)),
    ...lines.map((line) => padLine(line, width, style)),
    ...Array.from({ length: bottom }, () => blankLine(width, style)),
  ];
}
