/**
 * Error types for the parsers.
 *
 * Each error carries a `kind` so callers can branch on what went wrong without
 * matching on message text. None of them are fatal: they describe bad input.
 */

export type ColorParseErrorKind =
  | 'empty'
  | 'invalidHex'
  | 'invalidColorNumber'
  | 'invalidRgb'
  | 'unknownColor';

const COLOR_MESSAGES: Record<ColorParseErrorKind, string> = {
  empty: 'Empty color',
  invalidHex: 'Invalid hex color',
  invalidColorNumber: 'Invalid color number',
  invalidRgb: 'Invalid RGB color',
  unknownColor: 'Unknown color',
};

export class ColorParseError extends Error {
  readonly kind: ColorParseErrorKind;
  readonly input: string;

  constructor(kind: ColorParseErrorKind, input: string) {
    super(kind === 'empty' ? COLOR_MESSAGES.empty : `${COLOR_MESSAGES[kind]}: ${input}`);
    this.name = 'ColorParseError';
    this.kind = kind;
    this.input = input;
  }
}

export type StyleParseErrorKind = 'invalidFormat' | 'unknownAttribute' | 'unknownToken' | 'color';

export class StyleParseError extends Error {
  readonly kind: StyleParseErrorKind;
  readonly detail: string;

  constructor(kind: 'invalidFormat' | 'unknownAttribute' | 'unknownToken', detail: string);
  constructor(kind: 'color', detail: string, cause: ColorParseError);
  constructor(kind: StyleParseErrorKind, detail: string, cause?: ColorParseError) {
    super(StyleParseError.describe(kind, detail, cause), cause ? { cause } : undefined);
    this.name = 'StyleParseError';
    this.kind = kind;
    this.detail = detail;
  }

  /** The wrapped color error, for kind `color`. */
  get colorError(): ColorParseError | undefined {
    return this.cause instanceof ColorParseError ? this.cause : undefined;
  }

  private static describe(
    kind: StyleParseErrorKind,
    detail: string,
    cause: ColorParseError | undefined
  ): string {
    switch (kind) {
      case 'invalidFormat':
        return `Invalid style format: ${detail}`;
      case 'unknownAttribute':
        return `Unknown attribute: ${detail}`;
      case 'unknownToken':
        return `Unknown token: ${detail}`;
      case 'color':
        return `Color error: ${cause ? cause.message : detail}`;
    }
  }
}

export type MarkupErrorKind = 'unmatchedClosingTag' | 'invalidTag';

export class MarkupError extends Error {
  readonly kind: MarkupErrorKind;
  /** Tag name for `unmatchedClosingTag` (null for an implicit `[/]`). */
  readonly tag: string | null;

  private constructor(kind: MarkupErrorKind, message: string, tag: string | null) {
    super(message);
    this.name = 'MarkupError';
    this.kind = kind;
    this.tag = tag;
  }

  static unmatchedClosingTag(tag: string | null): MarkupError {
    const message =
      tag === null
        ? "closing tag '[/]' has nothing to close"
        : `closing tag '[/${tag}]' doesn't match any open tag`;
    return new MarkupError('unmatchedClosingTag', message, tag);
  }

  static invalidTag(reason: string): MarkupError {
    return new MarkupError('invalidTag', `invalid tag: ${reason}`, null);
  }
}

export class ThemeError extends Error {
  readonly styleName: string;

  constructor(styleName: string, cause: StyleParseError) {
    super(`Invalid style definition for '${styleName}': ${cause.message}`, { cause });
    this.name = 'ThemeError';
    this.styleName = styleName;
  }
}
