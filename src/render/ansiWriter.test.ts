import { describe, it, expect } from 'vitest';
import { renderControl, renderSegments } from './ansiWriter.js';
import { ColorSystem } from '../color/Color.js';
import { Style } from '../style/Style.js';
import { Control, ControlType, Segment } from '../text/Segment.js';

const boldRed = Style.parse('bold red');

describe('renderSegments', () => {
  it('wraps styled text in its escape sequences', () => {
    const output = renderSegments([Segment.styled('hi', boldRed), Segment.plain(' there')], {
      colorSystem: ColorSystem.TrueColor,
    });
    expect(output).toBe('\x1b[1;31mhi\x1b[0m there');
  });

  it('downgrades colors to the target system', () => {
    const style = Style.parse('#ff0000');
    expect(renderSegments([Segment.styled('x', style)], { colorSystem: ColorSystem.TrueColor })).toBe(
      '\x1b[38;2;255;0;0mx\x1b[0m'
    );
    expect(renderSegments([Segment.styled('x', style)], { colorSystem: ColorSystem.EightBit })).toBe(
      '\x1b[38;5;196mx\x1b[0m'
    );
    expect(renderSegments([Segment.styled('x', style)], { colorSystem: ColorSystem.Standard })).toBe(
      '\x1b[31mx\x1b[0m'
    );
  });

  it('wraps hyperlinks', () => {
    const style = Style.create({ link: 'https://a.test' });
    expect(renderSegments([Segment.styled('go', style)], { colorSystem: ColorSystem.TrueColor })).toBe(
      '\x1b]8;;https://a.test\x1b\\go\x1b]8;;\x1b\\'
    );
  });

  it('writes plain text without a color system', () => {
    const segments = [Segment.styled('hi', boldRed), Segment.line(), Control.bell()];
    expect(renderSegments(segments, { colorSystem: null })).toBe('hi\n\x07');
  });

  it('emits control sequences', () => {
    const segments = [
      Control.home(),
      Control.clear(),
      Control.moveTo(4, 2),
      Control.moveCursor(-3, 1),
      Control.moveToColumn(0),
      Control.eraseInLine(),
      Control.showCursor(false),
      Control.title('build'),
    ];
    expect(renderSegments(segments, { colorSystem: ColorSystem.TrueColor })).toBe(
      '\x1b[H\x1b[2J\x1b[3;5H\x1b[3D\x1b[1B\x1b[1G\x1b[2K\x1b[?25l\x1b]0;build\x07'
    );
  });

  it('enables the alternate screen then homes the cursor', () => {
    expect(renderSegments([Control.altScreen(true)], { colorSystem: null })).toBe('\x1b[?1049h\x1b[H');
    expect(renderSegments([Control.altScreen(false)], { colorSystem: null })).toBe('\x1b[?1049l');
  });

  it('skips empty text', () => {
    expect(renderSegments([Segment.styled('', boldRed)], { colorSystem: ColorSystem.TrueColor })).toBe('');
  });
});

describe('renderControl', () => {
  it('falls back to default parameters', () => {
    expect(renderControl({ type: ControlType.CursorUp, params: [] })).toBe('\x1b[1A');
    expect(renderControl({ type: ControlType.CarriageReturn, params: [] })).toBe('\r');
  });
});
