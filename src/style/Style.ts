/**
 * Visual styles: colors, attributes and hyperlinks.
 *
 * A style tracks two bit-sets: `attributes` (which attributes are on) and
 * `setAttributes` (which attributes were stated at all). The second set is
 * what lets `not bold` in an overlay switch off a bold inherited from the base.
 */

import { SharedCache, STYLE_CACHE_SIZE, type ParseCache } from '../cache/ParseCache.js';
import { Color, ColorSystem } from '../color/Color.js';
import { ColorParseError, StyleParseError } from '../errors.js';
import { ANSI_RESET, LINK_END, linkStart, sgr } from '../utils/ansi.js';
import { Attribute, DISPLAY_NAMES, attributeSgrCodes, parseAttribute } from './attributes.js';

export interface StyleOptions {
  color?: Color | string;
  bgcolor?: Color | string;
  bold?: boolean;
  dim?: boolean;
  italic?: boolean;
  underline?: boolean;
  blink?: boolean;
  reverse?: boolean;
  conceal?: boolean;
  strike?: boolean;
  overline?: boolean;
  link?: string;
}

interface StyleFields {
  color: Color | undefined;
  bgcolor: Color | undefined;
  attributes: number;
  setAttributes: number;
  link: string | undefined;
  isNull: boolean;
}

const sharedCache = new SharedCache<Style>(STYLE_CACHE_SIZE);

const OPTION_FLAGS = [
  ['bold', Attribute.Bold],
  ['dim', Attribute.Dim],
  ['italic', Attribute.Italic],
  ['underline', Attribute.Underline],
  ['blink', Attribute.Blink],
  ['reverse', Attribute.Reverse],
  ['conceal', Attribute.Conceal],
  ['strike', Attribute.Strike],
  ['overline', Attribute.Overline],
] as const;

function toColor(color: Color | string): Color {
  if (typeof color !== 'string') return color;
  try {
    return Color.parse(color);
  } catch (err) {
    if (err instanceof ColorParseError) {
      throw new StyleParseError('color', color, err);
    }
    throw err;
  }
}

export class Style {
  readonly color: Color | undefined;
  readonly bgcolor: Color | undefined;
  /** Attributes that are on. */
  readonly attributes: number;
  /** Attributes that were explicitly stated, on or off. */
  readonly setAttributes: number;
  readonly link: string | undefined;
  /** A null style sets nothing and is the identity for `combine`. */
  readonly isNull: boolean;

  private constructor(fields: StyleFields) {
    this.color = fields.color;
    this.bgcolor = fields.bgcolor;
    this.attributes = fields.attributes;
    this.setAttributes = fields.setAttributes;
    this.link = fields.link;
    this.isNull = fields.isNull;
  }

  /**
   * Build a style from options. With no options the result is empty but not
   * null; use `Style.null()` for the identity style.
   *
   * @throws StyleParseError when a color string does not parse
   */
  static create(options: StyleOptions = {}): Style {
    let attributes = 0;
    let setAttributes = 0;
    for (const [key, flag] of OPTION_FLAGS) {
      const value = options[key];
      if (value === undefined) continue;
      setAttributes |= flag;
      if (value) attributes |= flag;
    }
    return new Style({
      color: options.color === undefined ? undefined : toColor(options.color),
      bgcolor: options.bgcolor === undefined ? undefined : toColor(options.bgcolor),
      attributes,
      setAttributes,
      link: options.link,
      isNull: false,
    });
  }

  private static readonly NULL = new Style({
    color: undefined,
    bgcolor: undefined,
    attributes: 0,
    setAttributes: 0,
    link: undefined,
    isNull: true,
  });

  /** The identity style. */
  static null(): Style {
    return Style.NULL;
  }

  private with(fields: Partial<StyleFields>): Style {
    return new Style({
      color: this.color,
      bgcolor: this.bgcolor,
      attributes: this.attributes,
      setAttributes: this.setAttributes,
      link: this.link,
      ...fields,
      isNull: false,
    });
  }

  // --- Builders ---

  /** Turn an attribute on. */
  on(flag: number): Style {
    return this.with({
      attributes: this.attributes | flag,
      setAttributes: this.setAttributes | flag,
    });
  }

  /** Explicitly turn an attribute off. */
  not(flag: number): Style {
    return this.with({
      attributes: this.attributes & ~flag,
      setAttributes: this.setAttributes | flag,
    });
  }

  bold(): Style {
    return this.on(Attribute.Bold);
  }

  dim(): Style {
    return this.on(Attribute.Dim);
  }

  italic(): Style {
    return this.on(Attribute.Italic);
  }

  underline(): Style {
    return this.on(Attribute.Underline);
  }

  blink(): Style {
    return this.on(Attribute.Blink);
  }

  blink2(): Style {
    return this.on(Attribute.Blink2);
  }

  reverse(): Style {
    return this.on(Attribute.Reverse);
  }

  conceal(): Style {
    return this.on(Attribute.Conceal);
  }

  strike(): Style {
    return this.on(Attribute.Strike);
  }

  underline2(): Style {
    return this.on(Attribute.Underline2);
  }

  frame(): Style {
    return this.on(Attribute.Frame);
  }

  encircle(): Style {
    return this.on(Attribute.Encircle);
  }

  overline(): Style {
    return this.on(Attribute.Overline);
  }

  /** @throws StyleParseError when a color string does not parse */
  withColor(color: Color | string): Style {
    return this.with({ color: toColor(color) });
  }

  /** @throws StyleParseError when a color string does not parse */
  withBgcolor(color: Color | string): Style {
    return this.with({ bgcolor: toColor(color) });
  }

  withLink(url: string): Style {
    return this.with({ link: url });
  }

  /** True when the attribute is on. */
  has(flag: number): boolean {
    return (this.attributes & flag) !== 0;
  }

  // --- Combination ---

  /** Overlay `other` onto this style; `other` wins wherever it states something. */
  combine(other: Style): Style {
    if (other.isNull) return this;
    if (this.isNull) return other;

    return new Style({
      color: other.color ?? this.color,
      bgcolor: other.bgcolor ?? this.bgcolor,
      attributes: (this.attributes & ~other.setAttributes) | (other.attributes & other.setAttributes),
      setAttributes: this.setAttributes | other.setAttributes,
      link: other.link ?? this.link,
      isNull: false,
    });
  }

  /** Combine a list of styles left to right. */
  static chain(...styles: Style[]): Style {
    return styles.reduce((acc, style) => acc.combine(style), Style.null());
  }

  // --- Output ---

  /** SGR parameters: attributes, then foreground, then background. */
  makeAnsiCodes(system: ColorSystem): string {
    const codes: string[] = attributeSgrCodes(this.attributes).map(String);
    if (this.color) {
      codes.push(...this.color.downgrade(system).getAnsiCodes(true));
    }
    if (this.bgcolor) {
      codes.push(...this.bgcolor.downgrade(system).getAnsiCodes(false));
    }
    return codes.join(';');
  }

  /** Escape sequences that open and close this style. */
  renderAnsi(system: ColorSystem): [string, string] {
    if (this.isNull) return ['', ''];

    const codes = this.makeAnsiCodes(system);
    if (this.link === undefined) {
      return codes ? [sgr(codes), ANSI_RESET] : ['', ''];
    }
    if (!codes) {
      return [linkStart(this.link), LINK_END];
    }
    return [linkStart(this.link) + sgr(codes), ANSI_RESET + LINK_END];
  }

  /** Wrap `text` in this style's escape sequences. */
  render(text: string, system: ColorSystem): string {
    const [prefix, suffix] = this.renderAnsi(system);
    return prefix + text + suffix;
  }

  // --- Parsing ---

  /**
   * Parse a style definition such as `bold red on white` (cached).
   *
   * Keywords and colors are case-insensitive; a link URL keeps its case.
   *
   * @throws StyleParseError
   */
  static parse(input: string, cache: ParseCache<Style> = sharedCache.current): Style {
    const trimmed = input.trim();
    const lowered = trimmed.toLowerCase();
    const key = /(^|\s)link(\s|$)/.test(lowered) ? trimmed : lowered;

    const cached = cache.get(key);
    if (cached) return cached;

    const style = Style.parseUncached(trimmed);
    cache.set(key, style);
    return style;
  }

  private static parseUncached(input: string): Style {
    const lowered = input.toLowerCase();
    if (lowered === '' || lowered === 'none') {
      return Style.null();
    }

    const words = input.split(/\s+/);
    let result = Style.create();
    let i = 0;

    while (i < words.length) {
      const word = words[i].toLowerCase();
      const next = words[i + 1];

      if (word === 'not') {
        if (next === undefined) {
          throw new StyleParseError('invalidFormat', "'not' requires an attribute");
        }
        const flag = parseAttribute(next.toLowerCase());
        if (flag === undefined) {
          throw new StyleParseError('unknownAttribute', next.toLowerCase());
        }
        result = result.not(flag);
        i += 2;
        continue;
      }

      if (word === 'on') {
        if (next === undefined) {
          throw new StyleParseError('invalidFormat', "'on' requires a color");
        }
        result = result.withBgcolor(next);
        i += 2;
        continue;
      }

      if (word === 'link') {
        if (next === undefined) {
          throw new StyleParseError('invalidFormat', "'link' requires a URL");
        }
        result = result.withLink(next);
        i += 2;
        continue;
      }

      const flag = parseAttribute(word);
      if (flag !== undefined) {
        result = result.on(flag);
        i += 1;
        continue;
      }

      result = result.withColor(Style.parseForeground(word));
      i += 1;
    }

    return result;
  }

  private static parseForeground(word: string): Color {
    try {
      return Color.parse(word);
    } catch (err) {
      if (err instanceof ColorParseError) {
        if (err.kind === 'unknownColor') {
          throw new StyleParseError('unknownToken', word);
        }
        throw new StyleParseError('color', word, err);
      }
      throw err;
    }
  }

  // --- Comparison and display ---

  equals(other: Style): boolean {
    if (this === other) return true;
    const sameColor = (a: Color | undefined, b: Color | undefined): boolean =>
      a === undefined ? b === undefined : a.equals(b);
    return (
      this.isNull === other.isNull &&
      this.attributes === other.attributes &&
      this.setAttributes === other.setAttributes &&
      this.link === other.link &&
      sameColor(this.color, other.color) &&
      sameColor(this.bgcolor, other.bgcolor)
    );
  }

  toString(): string {
    if (this.isNull) return 'none';

    const parts: string[] = [];
    for (const [flag, name] of DISPLAY_NAMES) {
      if (this.attributes & flag) parts.push(name);
    }
    if (this.color) parts.push(this.color.toString());
    if (this.bgcolor) parts.push(`on ${this.bgcolor.toString()}`);
    if (this.link !== undefined) parts.push(`link ${this.link}`);
    return parts.join(' ');
  }
}
