import { describe, it, expect } from 'vitest';
import { Text } from './Text.js';
import { Span } from './Span.js';
import { Style } from '../style/Style.js';

const bold = Style.create().bold();
const red = Style.create({ color: 'red' });
const green = Style.create({ color: 'green' });

function plains(lines: readonly Text[]): string[] {
  return lines.map((line) => line.plain);
}

function spanRanges(text: Text): Array<[number, number]> {
  return text.spans.map((span) => [span.start, span.end]);
}

describe('Span', () => {
  it('orders its offsets', () => {
    const span = new Span(5, 2, bold);
    expect([span.start, span.end]).toEqual([2, 5]);
    expect(span.length).toBe(3);
  });

  it('moves, splits and adjusts', () => {
    const span = new Span(2, 6, bold);
    const moved = span.moveRight(3, 7);
    expect([moved.start, moved.end]).toEqual([5, 7]);
    const [left, right] = span.split(1);
    expect([left.start, left.end, right.start, right.end]).toEqual([2, 3, 3, 6]);
    const adjusted = span.adjust(4);
    expect([adjusted.start, adjusted.end]).toEqual([0, 2]);
    expect(new Span(3, 3, bold).isEmpty).toBe(true);
  });
});

describe('Text construction', () => {
  it('counts code points and cells', () => {
    const text = new Text('日本語');
    expect(text.length).toBe(3);
    expect(text.cellLength).toBe(6);
    expect(text.end).toBe('\n');
    expect(text.tabSize).toBe(8);
  });

  it('assembles styled pieces', () => {
    const text = Text.assemble(['Hello ', ['World', bold], '!']);
    expect(text.plain).toBe('Hello World!');
    expect(spanRanges(text)).toEqual([[6, 11]]);
  });

  it('creates styled text as one span', () => {
    const text = Text.styled('abc', bold);
    expect(spanRanges(text)).toEqual([[0, 3]]);
    expect(Text.styled('', bold).spans).toHaveLength(0);
  });

  it('appends text with its base style as a span', () => {
    const text = new Text('ab').appendText(new Text('cd', { style: red }));
    expect(text.plain).toBe('abcd');
    expect(spanRanges(text)).toEqual([[2, 4]]);
    expect(text.spans[0].style).toBe(red);
  });
});

describe('Text.stylize', () => {
  it('clamps the range and ignores empty ones', () => {
    const text = new Text('hello');
    text.stylize(3, 99, bold);
    text.stylize(4, 4, bold);
    text.stylize(9, 12, bold);
    expect(spanRanges(text)).toEqual([[3, 5]]);
  });

  it('highlights regex matches in code point offsets', () => {
    const text = new Text('日 bar boo');
    expect(text.highlightRegex(/b\w+/, bold)).toBe(2);
    expect(spanRanges(text)).toEqual([
      [2, 5],
      [6, 9],
    ]);
  });

  it('highlights words case-insensitively', () => {
    const text = new Text('Foo foo fOO');
    expect(text.highlightWords(['foo'], bold, false)).toBe(3);
    expect(new Text('Foo foo').highlightWords(['foo'], bold)).toBe(1);
    expect(new Text('a+b').highlightWords(['+'], bold)).toBe(1);
  });
});

describe('Text slicing', () => {
  it('clips spans to the slice', () => {
    const text = Text.assemble(['Hello ', ['World', bold]]).slice(3, 8);
    expect(text.plain).toBe('lo Wo');
    expect(spanRanges(text)).toEqual([[3, 5]]);
  });

  it('slices by code point', () => {
    expect(new Text('日本語').slice(1, 2).plain).toBe('本');
  });

  it('divides at offsets', () => {
    expect(plains(new Text('abcdef').divide([2, 4]))).toEqual(['ab', 'cd', 'ef']);
    expect(plains(new Text('abc').divide([]))).toEqual(['abc']);
  });

  it('splits lines', () => {
    expect(plains(new Text('a\nb\n').splitLines())).toEqual(['a', 'b', '']);
  });

  it('joins with a separator', () => {
    const joined = new Text(', ').join([new Text('a'), new Text('b'), new Text('c')]);
    expect(joined.plain).toBe('a, b, c');
  });

  it('strips whitespace', () => {
    const text = new Text('  hi  ').stylize(2, 4, bold);
    const stripped = text.strip();
    expect(stripped.plain).toBe('hi');
    expect(spanRanges(stripped)).toEqual([[0, 2]]);
    expect(new Text('hi  ').rstrip().plain).toBe('hi');
  });

  it('expands tabs and remaps spans', () => {
    const text = new Text('a\tb', { tabSize: 4 }).stylize(2, 3, bold);
    const expanded = text.expandTabs();
    expect(expanded.plain).toBe('a   b');
    expect(spanRanges(expanded)).toEqual([[4, 5]]);
  });

  it('changes case and remaps spans', () => {
    const upper = new Text('ßa').stylize(1, 2, bold).toUpperCase();
    expect(upper.plain).toBe('SSA');
    expect(spanRanges(upper)).toEqual([[2, 3]]);
    expect(new Text('ABC').toLowerCase().plain).toBe('abc');
  });
});

describe('Text sizing', () => {
  it('truncates with an ellipsis cell', () => {
    expect(new Text('hello world').truncate(5, 'ellipsis').plain).toBe('hell…');
    expect(new Text('hello').truncate(1, 'ellipsis').plain).toBe('…');
    expect(new Text('hello').truncate(0, 'ellipsis').plain).toBe('');
  });

  it('crops and pads', () => {
    expect(new Text('hello world').truncate(5, 'crop').plain).toBe('hello');
    expect(new Text('hi').truncate(5, 'crop', true).plain).toBe('hi   ');
    expect(new Text('hello').truncate(3, 'ignore').plain).toBe('hello');
  });

  it('never splits a wide character', () => {
    expect(new Text('日本語').truncate(3, 'crop').plain).toBe('日');
    expect(new Text('日本語').truncate(3, 'crop', true).plain).toBe('日 ');
  });

  it('pads per justification', () => {
    expect(new Text('ab').pad(5, 'center').plain).toBe(' ab  ');
    expect(new Text('ab').pad(4, 'right').plain).toBe('  ab');
    expect(new Text('ab').pad(4).plain).toBe('ab  ');
    expect(new Text('abcdef').pad(4).plain).toBe('abcdef');
  });

  it('shifts spans when padding left', () => {
    const text = new Text('ab').stylize(0, 1, bold).pad(4, 'right');
    expect(spanRanges(text)).toEqual([[2, 3]]);
  });

  it('aligns by truncating then padding', () => {
    expect(new Text('abcdef').align('right', 4).plain).toBe('abcd');
    expect(new Text('ab').align('right', 4).plain).toBe('  ab');
  });
});

describe('Text.wrap', () => {
  const sentence = 'The quick brown fox jumps';

  it('wraps greedily and keeps trailing whitespace', () => {
    const lines = new Text(sentence).wrap(12);
    expect(plains(lines)).toEqual(['The quick ', 'brown fox ', 'jumps']);
    expect(plains(lines).join('')).toBe(sentence);
  });

  it('returns one empty line for a zero width', () => {
    expect(plains(new Text('abc').wrap(0))).toEqual(['']);
  });

  it('breaks on newlines', () => {
    expect(plains(new Text('ab\ncd').wrap(10))).toEqual(['ab', 'cd']);
  });

  it('folds over-long words', () => {
    expect(plains(new Text('abcdefghij').wrap(4))).toEqual(['abcd', 'efgh', 'ij']);
    expect(plains(new Text('hi abcdefghij').wrap(4))).toEqual(['hi ', 'abcd', 'efgh', 'ij']);
  });

  it('folds wide characters by cells', () => {
    expect(plains(new Text('日本語日本').wrap(4))).toEqual(['日本', '語日', '本']);
  });

  it('truncates over-long words with ellipsis or crop', () => {
    const text = 'hello wonderful world';
    expect(plains(new Text(text, { overflow: 'ellipsis' }).wrap(6))).toEqual(['hello ', 'wonde…', 'world']);
    expect(plains(new Text(text, { overflow: 'crop' }).wrap(6))).toEqual(['hello ', 'wonder', 'world']);
  });

  it('keeps lines whole with noWrap', () => {
    expect(plains(new Text('abcdef', { noWrap: true, overflow: 'crop' }).wrap(3))).toEqual(['abc']);
    expect(plains(new Text('abcdef', { noWrap: true, overflow: 'ellipsis' }).wrap(3))).toEqual(['ab…']);
    expect(plains(new Text('abcdef', { noWrap: true, overflow: 'ignore' }).wrap(3))).toEqual(['abcdef']);
  });

  it('carries spans across line breaks', () => {
    const lines = new Text('aaa bbb').stylize(2, 5, bold).wrap(4);
    expect(plains(lines)).toEqual(['aaa ', 'bbb']);
    expect(spanRanges(lines[0])).toEqual([[2, 4]]);
    expect(spanRanges(lines[1])).toEqual([[0, 1]]);
  });

  it('justifies left, right and center', () => {
    expect(plains(new Text('hi', { justify: 'left' }).wrap(6))).toEqual(['hi    ']);
    expect(plains(new Text('hi', { justify: 'right' }).wrap(6))).toEqual(['    hi']);
    expect(plains(new Text('hi', { justify: 'center' }).wrap(5))).toEqual([' hi  ']);
  });

  it('justifies full, widening rightmost gaps first', () => {
    expect(plains(new Text(sentence, { justify: 'full' }).wrap(12))).toEqual([
      'The    quick',
      'brown    fox',
      'jumps       ',
    ]);
    expect(plains(new Text('a b c d e', { justify: 'full' }).wrap(6))).toEqual(['a b  c', 'd e   ']);
  });
});

describe('Text.render', () => {
  it('splits at span boundaries', () => {
    const segments = new Text('Hello World').stylize(0, 5, bold).render();
    expect(segments.map((s) => s.text)).toEqual(['Hello', ' World']);
    expect(segments[0].style).toBe(bold);
    expect(segments[1].style).toBeUndefined();
  });

  it('combines overlapping spans in the order they were added', () => {
    const segments = new Text('abcdefgh').stylize(0, 4, red).stylize(2, 6, green).render();
    expect(segments.map((s) => [s.text, s.style?.color?.name])).toEqual([
      ['ab', 'red'],
      ['cd', 'green'],
      ['ef', 'green'],
      ['gh', undefined],
    ]);

    const reversed = new Text('abcdefgh').stylize(2, 6, green).stylize(0, 4, red).render();
    expect(reversed[1].style?.color?.name).toBe('red');
  });

  it('styles every run of a text with many spans', () => {
    const spans: Span[] = [];
    for (let i = 0; i < 2000; i++) {
      spans.push(new Span(i, i + 1, i % 2 === 0 ? red : bold));
    }
    spans.push(new Span(0, 2000, green));
    const segments = new Text('x'.repeat(2000), {}, spans).render();
    expect(segments).toHaveLength(2000);
    expect(segments[0].style?.toString()).toBe('green');
    expect(segments[1].style?.toString()).toBe('bold green');
    expect(segments[1999].style?.toString()).toBe('bold green');
  });

  it('clamps spans that run past the end', () => {
    const segments = new Text('abcd', {}, [new Span(2, 50, bold), new Span(9, 12, red)]).render();
    expect(segments.map((s) => s.text)).toEqual(['ab', 'cd']);
    expect(segments[1].style).toBe(bold);
  });

  it('puts the base style underneath', () => {
    const segments = new Text('ab', { style: bold }).stylize(1, 2, red).render();
    expect(segments.map((s) => s.style?.toString())).toEqual(['bold', 'bold red']);
  });

  it('appends the end string unstyled', () => {
    const segments = new Text('ab').render('\n');
    expect(segments.map((s) => s.text)).toEqual(['ab', '\n']);
    expect(new Text('').render()).toEqual([]);
    expect(new Text('').render('\n').map((s) => s.text)).toEqual(['\n']);
  });

  it('does not modify the text', () => {
    const text = new Text('abc').stylize(0, 2, bold);
    text.render();
    expect(text.plain).toBe('abc');
    expect(spanRanges(text)).toEqual([[0, 2]]);
  });
});
