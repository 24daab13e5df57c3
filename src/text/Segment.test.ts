import { describe, it, expect } from 'vitest';
import { Control, ControlType, Segment, splitAtCell } from './Segment.js';
import {
  adjustLineLength,
  alignBottom,
  alignMiddle,
  alignTop,
  applyStyle,
  divide,
  lineLength,
  simplify,
  splitLines,
} from './segments.js';
import { Style } from '../style/Style.js';
import { renderSegments } from '../render/ansiWriter.js';

const bold = Style.create().bold();
const italic = Style.create().italic();

function texts(line: readonly Segment[]): string[] {
  return line.map((segment) => segment.text);
}

describe('Segment', () => {
  it('measures cells', () => {
    expect(Segment.plain('hello').cellLength).toBe(5);
    expect(Segment.plain('日本').cellLength).toBe(4);
    expect(Control.title('a title').cellLength).toBe(0);
  });

  it('reports emptiness', () => {
    expect(Segment.plain('').isEmpty).toBe(true);
    expect(Control.bell().isEmpty).toBe(false);
    expect(Segment.line().text).toBe('\n');
  });

  it('replaces the style', () => {
    const segment = Segment.plain('x').withStyle(bold);
    expect(segment.style).toBe(bold);
  });

  it('splits at a cell and keeps the style on both halves', () => {
    const [left, right] = Segment.styled('hello', bold).splitAtCell(2);
    expect(left.text).toBe('he');
    expect(right.text).toBe('llo');
    expect(left.style).toBe(bold);
    expect(right.style).toBe(bold);
  });

  it('never divides a wide character', () => {
    const [left, right] = splitAtCell(Segment.plain('a日b'), 2);
    expect(left.text).toBe('a');
    expect(right.text).toBe('日b');
  });

  it('measures text with an empty control list as visible', () => {
    const segment = new Segment('ab', undefined, []);
    expect(segment.isControl).toBe(false);
    expect(segment.cellLength).toBe(2);
    expect(texts(segment.splitAtCell(1))).toEqual(['a', 'b']);
    const line = adjustLineLength([segment], 4);
    expect(texts(line)).toEqual(['ab', '  ']);
    expect(lineLength(line)).toBe(4);
    expect(renderSegments(line, { colorSystem: null })).toBe('ab  ');
  });

  it('does not split control segments', () => {
    const bell = Control.bell();
    const [left, right] = bell.splitAtCell(0);
    expect(left).toBe(bell);
    expect(right.text).toBe('');
    expect(right.isControl).toBe(false);
  });
});

describe('Control', () => {
  it('builds relative cursor moves', () => {
    expect(Control.moveCursor(3, -2).control).toEqual([
      { type: ControlType.CursorForward, params: [3] },
      { type: ControlType.CursorUp, params: [2] },
    ]);
    const still = Control.moveCursor(0, 0);
    expect(still.control).toEqual([]);
    expect(still.isControl).toBe(false);
  });

  it('builds column and absolute moves', () => {
    expect(Control.moveToColumn(4, 1).control).toEqual([
      { type: ControlType.CursorMoveToColumn, params: [4] },
      { type: ControlType.CursorDown, params: [1] },
    ]);
    expect(Control.moveTo(1, 2).control).toEqual([{ type: ControlType.CursorMoveTo, params: [1, 2] }]);
  });

  it('enters the alternate screen and homes the cursor', () => {
    expect(Control.altScreen(true).control?.map((c) => c.type)).toEqual([
      ControlType.EnableAltScreen,
      ControlType.Home,
    ]);
    expect(Control.altScreen(false).control?.map((c) => c.type)).toEqual([ControlType.DisableAltScreen]);
  });

  it('carries the window title as payload', () => {
    const segment = Control.title('build');
    expect(segment.text).toBe('build');
    expect(segment.control).toEqual([{ type: ControlType.SetWindowTitle, params: [] }]);
  });
});

describe('applyStyle', () => {
  it('puts the base style under and the post style over', () => {
    const red = Style.create({ color: 'red' });
    const [segment] = applyStyle([Segment.styled('x', Style.create({ color: 'green' }))], red, bold);
    expect(segment.style?.toString()).toBe('bold green');
  });

  it('styles unstyled segments and skips controls', () => {
    const bell = Control.bell();
    const result = applyStyle([Segment.plain('x'), bell], bold);
    expect(result[0].style).toBe(bold);
    expect(result[1]).toBe(bell);
  });
});

describe('splitLines', () => {
  it('splits on newlines and drops empty pieces', () => {
    const lines = splitLines([Segment.styled('ab\ncd', bold), Segment.plain('e\n')]);
    expect(lines.map(texts)).toEqual([['ab'], ['cd', 'e'], []]);
    expect(lines[1][0].style).toBe(bold);
  });
});

describe('adjustLineLength', () => {
  it('pads short lines', () => {
    const line = adjustLineLength([Segment.plain('ab')], 4, italic);
    expect(texts(line)).toEqual(['ab', '  ']);
    expect(line[1].style).toBe(italic);
  });

  it('truncates long lines', () => {
    expect(texts(adjustLineLength([Segment.plain('abc'), Segment.plain('def')], 4))).toEqual(['abc', 'd']);
  });

  it('leaves short lines alone without pad', () => {
    expect(texts(adjustLineLength([Segment.plain('ab')], 4, undefined, false))).toEqual(['ab']);
  });
});

describe('simplify', () => {
  it('merges equal styles and drops empty text', () => {
    const result = simplify([
      Segment.styled('a', bold),
      Segment.styled('b', Style.create().bold()),
      Segment.plain(''),
      Segment.styled('c', italic),
    ]);
    expect(texts(result)).toEqual(['ab', 'c']);
  });
});

describe('divide', () => {
  it('cuts a line at cell positions', () => {
    const parts = divide([Segment.plain('abcdef'), Segment.plain('gh')], [2, 7]);
    expect(parts.map(texts)).toEqual([['ab'], ['cdef', 'g'], ['h']]);
  });

  it('returns the whole line without cuts', () => {
    expect(divide([Segment.plain('abc')], []).map(texts)).toEqual([['abc']]);
  });
});

describe('vertical alignment', () => {
  const lines = [[Segment.plain('ab')]];
  const style = Style.null();

  it('aligns to the top', () => {
    expect(alignTop(lines, 3, 3, style).map(texts)).toEqual([['ab', ' '], ['   '], ['   ']]);
  });

  it('aligns to the bottom', () => {
    expect(alignBottom(lines, 3, 3, style).map(texts)).toEqual([['   '], ['   '], ['ab', ' ']]);
  });

  it('aligns to the middle with the odd line below', () => {
    const result = alignMiddle(lines, 2, 4, style);
    expect(result.map(texts)).toEqual([['  '], ['ab'], ['  '], ['  ']]);
  });

  it('measures line length', () => {
    expect(lineLength([Segment.plain('ab'), Control.bell(), Segment.plain('日')])).toBe(4);
  });
});
