/**
 * Terminal colors: parsing, palette resolution, downgrading and SGR codes.
 *
 * Supports the terminal default color, the 16 ANSI colors, the 256-color
 * palette and 24-bit true color. Colors are immutable values; `downgrade`
 * returns a new color for terminals with fewer colors.
 */

import { SharedCache, COLOR_CACHE_SIZE, type ParseCache } from '../cache/ParseCache.js';
import { ColorParseError } from '../errors.js';
import {
  ColorTriplet,
  EIGHT_BIT_PALETTE,
  NAMED_COLORS,
  STANDARD_PALETTE,
  WINDOWS_PALETTE,
  rgbToEightBit,
  rgbToStandard,
} from './palettes.js';

/** Terminal color capability, ordered by how many colors it can show. */
export enum ColorSystem {
  Standard = 1,
  EightBit = 2,
  TrueColor = 3,
  Windows = 4,
}

/** Names for each color system, as written in config files and on the command line. */
export const COLOR_SYSTEM_NAMES = {
  [ColorSystem.Standard]: 'standard',
  [ColorSystem.EightBit]: '256',
  [ColorSystem.TrueColor]: 'truecolor',
  [ColorSystem.Windows]: 'windows',
} as const satisfies Record<ColorSystem, string>;

export type ColorType = 'default' | 'standard' | 'eightBit' | 'trueColor' | 'windows';

const sharedCache = new SharedCache<Color>(COLOR_CACHE_SIZE);

const HEX_DIGITS = /^[0-9a-f]+$/;
const COLOR_NUMBER_PATTERN = /^color\((\d{1,3})\)$/;
const RGB_PATTERN = /^rgb\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*\)$/;

function isChannel(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 255;
}

function standardCode(number: number, foreground: boolean): string {
  if (number < 8) {
    return String(foreground ? 30 + number : 40 + number);
  }
  return String(foreground ? 82 + number : 92 + number);
}

export class Color {
  /** The text this color was parsed from (or a canonical form). */
  readonly name: string;
  readonly type: ColorType;
  /** Palette number, for standard, eightBit and windows colors. */
  readonly number: number | undefined;
  /** RGB components, for trueColor colors. */
  readonly triplet: ColorTriplet | undefined;

  private constructor(
    name: string,
    type: ColorType,
    number: number | undefined,
    triplet: ColorTriplet | undefined
  ) {
    this.name = name;
    this.type = type;
    this.number = number;
    this.triplet = triplet;
  }

  /** The terminal's own foreground/background color. */
  static defaultColor(): Color {
    return new Color('default', 'default', undefined, undefined);
  }

  /** Color from a palette number: 0-15 are standard colors, 16-255 the 256-color palette. */
  static fromAnsi(number: number): Color {
    if (!isChannel(number)) {
      throw new RangeError(`Color number must be an integer 0-255, got ${number}`);
    }
    return new Color(`color(${number})`, number < 16 ? 'standard' : 'eightBit', number, undefined);
  }

  /** Alias of `fromAnsi`. */
  static fromIndexed(number: number): Color {
    return Color.fromAnsi(number);
  }

  /** Color from the Windows console palette (0-15). */
  static fromWindows(number: number): Color {
    if (!Number.isInteger(number) || number < 0 || number > 15) {
      throw new RangeError(`Windows color number must be an integer 0-15, got ${number}`);
    }
    return new Color(`color(${number})`, 'windows', number, undefined);
  }

  static fromTriplet(triplet: ColorTriplet): Color {
    return new Color(triplet.hex, 'trueColor', undefined, triplet);
  }

  static fromRgb(red: number, green: number, blue: number): Color {
    if (!isChannel(red) || !isChannel(green) || !isChannel(blue)) {
      throw new RangeError(`RGB channels must be integers 0-255, got (${red}, ${green}, ${blue})`);
    }
    return Color.fromTriplet(new ColorTriplet(red, green, blue));
  }

  /**
   * Parse a color (cached).
   *
   * Supported formats: `default`, `#rrggbb`, `#rgb`, `color(N)`, `rgb(r,g,b)`
   * and named colors such as `red` or `bright_blue`. Input is case-insensitive.
   *
   * @throws ColorParseError
   */
  static parse(input: string, cache: ParseCache<Color> = sharedCache.current): Color {
    const normalized = input.trim().toLowerCase();

    const cached = cache.get(normalized);
    if (cached) return cached;

    const color = Color.parseUncached(normalized);
    cache.set(normalized, color);
    return color;
  }

  private static parseUncached(color: string): Color {
    if (color === '') {
      throw new ColorParseError('empty', color);
    }
    if (color === 'default') {
      return Color.defaultColor();
    }

    if (color.startsWith('#')) {
      const hex = color.slice(1);
      if (!HEX_DIGITS.test(hex) || (hex.length !== 6 && hex.length !== 3)) {
        throw new ColorParseError('invalidHex', color);
      }
      const full = hex.length === 3 ? [...hex].map((digit) => digit + digit).join('') : hex;
      return new Color(
        color,
        'trueColor',
        undefined,
        new ColorTriplet(
          parseInt(full.slice(0, 2), 16),
          parseInt(full.slice(2, 4), 16),
          parseInt(full.slice(4, 6), 16)
        )
      );
    }

    if (color.startsWith('color(')) {
      const match = COLOR_NUMBER_PATTERN.exec(color);
      const number = match ? Number(match[1]) : NaN;
      if (!isChannel(number)) {
        throw new ColorParseError('invalidColorNumber', color);
      }
      return new Color(color, number < 16 ? 'standard' : 'eightBit', number, undefined);
    }

    if (color.startsWith('rgb(')) {
      const match = RGB_PATTERN.exec(color);
      const channels = match ? [Number(match[1]), Number(match[2]), Number(match[3])] : [];
      if (channels.length !== 3 || !channels.every(isChannel)) {
        throw new ColorParseError('invalidRgb', color);
      }
      const [red, green, blue] = channels;
      return new Color(color, 'trueColor', undefined, new ColorTriplet(red, green, blue));
    }

    const named = NAMED_COLORS.get(color);
    if (named !== undefined) {
      return new Color(color, named < 16 ? 'standard' : 'eightBit', named, undefined);
    }

    throw new ColorParseError('unknownColor', color);
  }

  /** The color system this color natively needs. */
  get system(): ColorSystem {
    switch (this.type) {
      case 'default':
      case 'standard':
        return ColorSystem.Standard;
      case 'eightBit':
        return ColorSystem.EightBit;
      case 'trueColor':
        return ColorSystem.TrueColor;
      case 'windows':
        return ColorSystem.Windows;
    }
  }

  get isDefault(): boolean {
    return this.type === 'default';
  }

  /** True for colors whose RGB value is decided by the terminal theme. */
  get isSystemDefined(): boolean {
    return this.type === 'standard' || this.type === 'windows';
  }

  /** Resolve to an RGB triplet through the fixed palettes. */
  getTruecolor(): ColorTriplet {
    switch (this.type) {
      case 'default':
        return new ColorTriplet(0, 0, 0);
      case 'trueColor':
        return this.triplet ?? new ColorTriplet(0, 0, 0);
      case 'standard':
        return STANDARD_PALETTE[this.number ?? 0];
      case 'windows':
        return WINDOWS_PALETTE[this.number ?? 0];
      case 'eightBit':
        return EIGHT_BIT_PALETTE[this.number ?? 0];
    }
  }

  /** Alias of `getTruecolor`. */
  toRgb(): ColorTriplet {
    return this.getTruecolor();
  }

  /** SGR parameters for this color, e.g. `['38', '5', '196']`. */
  getAnsiCodes(foreground: boolean = true): string[] {
    switch (this.type) {
      case 'default':
        return [foreground ? '39' : '49'];
      case 'standard':
      case 'windows':
        return [standardCode(this.number ?? 0, foreground)];
      case 'eightBit':
        return [foreground ? '38' : '48', '5', String(this.number ?? 0)];
      case 'trueColor': {
        const { red, green, blue } = this.triplet ?? new ColorTriplet(0, 0, 0);
        return [foreground ? '38' : '48', '2', String(red), String(green), String(blue)];
      }
    }
  }

  /**
   * Convert to a lower-capability color system. Colors already at or below
   * the target, and the default color, are returned unchanged.
   */
  downgrade(system: ColorSystem): Color {
    if (this.type === 'default' || this.type === 'standard' || this.type === 'windows') {
      return this;
    }

    if (this.type === 'eightBit') {
      if (system === ColorSystem.EightBit || system === ColorSystem.TrueColor) {
        return this;
      }
      return Color.fromAnsi(rgbToStandard(this.getTruecolor()));
    }

    // trueColor
    const triplet = this.getTruecolor();
    switch (system) {
      case ColorSystem.TrueColor:
        return this;
      case ColorSystem.EightBit:
        return Color.fromAnsi(rgbToEightBit(triplet));
      case ColorSystem.Standard:
      case ColorSystem.Windows:
        return Color.fromAnsi(rgbToStandard(triplet));
    }
  }

  /** Structural equality. */
  equals(other: Color | undefined): boolean {
    if (!other) return false;
    if (this === other) return true;
    if (this.type !== other.type || this.number !== other.number) return false;
    if (this.triplet && other.triplet) return this.triplet.equals(other.triplet);
    return this.triplet === other.triplet;
  }

  toString(): string {
    return this.name;
  }
}

export { ColorTriplet };
