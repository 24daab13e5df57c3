/**
 * Text attribute bit flags and their SGR codes.
 */

export const Attribute = {
  Bold: 1 << 0,
  Dim: 1 << 1,
  Italic: 1 << 2,
  Underline: 1 << 3,
  Blink: 1 << 4,
  Blink2: 1 << 5,
  Reverse: 1 << 6,
  Conceal: 1 << 7,
  Strike: 1 << 8,
  Underline2: 1 << 9,
  Frame: 1 << 10,
  Encircle: 1 << 11,
  Overline: 1 << 12,
} as const;

export type AttributeName = keyof typeof Attribute;

/** A single attribute flag. */
export type AttributeFlag = (typeof Attribute)[AttributeName];

/** Attribute flags in SGR order with their codes. */
const SGR_CODES: ReadonlyArray<readonly [number, number]> = [
  [Attribute.Bold, 1],
  [Attribute.Dim, 2],
  [Attribute.Italic, 3],
  [Attribute.Underline, 4],
  [Attribute.Blink, 5],
  [Attribute.Blink2, 6],
  [Attribute.Reverse, 7],
  [Attribute.Conceal, 8],
  [Attribute.Strike, 9],
  [Attribute.Underline2, 21],
  [Attribute.Frame, 51],
  [Attribute.Encircle, 52],
  [Attribute.Overline, 53],
];

/** SGR codes for every flag set in `bits`, in ascending flag order. */
export function attributeSgrCodes(bits: number): number[] {
  const codes: number[] = [];
  for (const [flag, code] of SGR_CODES) {
    if (bits & flag) codes.push(code);
  }
  return codes;
}

const ATTRIBUTE_ALIASES: ReadonlyMap<string, number> = new Map([
  ['bold', Attribute.Bold],
  ['b', Attribute.Bold],
  ['dim', Attribute.Dim],
  ['d', Attribute.Dim],
  ['italic', Attribute.Italic],
  ['i', Attribute.Italic],
  ['underline', Attribute.Underline],
  ['u', Attribute.Underline],
  ['blink', Attribute.Blink],
  ['blink2', Attribute.Blink2],
  ['reverse', Attribute.Reverse],
  ['r', Attribute.Reverse],
  ['conceal', Attribute.Conceal],
  ['c', Attribute.Conceal],
  ['strike', Attribute.Strike],
  ['s', Attribute.Strike],
  ['underline2', Attribute.Underline2],
  ['uu', Attribute.Underline2],
  ['frame', Attribute.Frame],
  ['encircle', Attribute.Encircle],
  ['overline', Attribute.Overline],
  ['o', Attribute.Overline],
]);

/** Look up an attribute by name or alias (lower case). */
export function parseAttribute(name: string): number | undefined {
  return ATTRIBUTE_ALIASES.get(name);
}

/** Names used when printing a style, in display order. */
export const DISPLAY_NAMES: ReadonlyArray<readonly [number, string]> = [
  [Attribute.Bold, 'bold'],
  [Attribute.Dim, 'dim'],
  [Attribute.Italic, 'italic'],
  [Attribute.Underline, 'underline'],
  [Attribute.Blink, 'blink'],
  [Attribute.Reverse, 'reverse'],
  [Attribute.Conceal, 'conceal'],
  [Attribute.Strike, 'strike'],
  [Attribute.Overline, 'overline'],
];
