/**
 * Tokenizer for console markup: splits a string into literal text runs and
 * bracketed tags, honoring backslash escapes.
 */

import { MarkupError } from '../errors.js';

export interface Tag {
  /** Tag name, e.g. `bold red`, `/bold`, `/`, `link`, `@click`. */
  name: string;
  /** Value after `=`, or the arguments of `@handler(args)`. */
  parameters?: string;
}

export type MarkupElement =
  | { type: 'text'; text: string }
  | { type: 'tag'; tag: Tag };

const TAG_PATTERN = /(\\*)\[([a-z#/@][^[\]]*?)\]/g;

export function isClosingTag(tag: Tag): boolean {
  return tag.name.startsWith('/');
}

/** The name without the leading slash of a closing tag. */
export function baseName(tag: Tag): string {
  return isClosingTag(tag) ? tag.name.slice(1) : tag.name;
}

/**
 * Parse the content between the brackets of a tag.
 *
 * @throws MarkupError for an unterminated handler call or an empty link
 */
export function parseTag(content: string): Tag {
  const trimmed = content.trim();

  const equals = trimmed.indexOf('=');
  if (equals >= 0) {
    const name = trimmed.slice(0, equals).trim();
    const parameters = trimmed.slice(equals + 1).trim();
    if (name.toLowerCase() === 'link' && parameters === '') {
      throw MarkupError.invalidTag(`'${trimmed}' has an empty link`);
    }
    return { name, parameters };
  }

  if (trimmed.startsWith('@') || trimmed.startsWith('/@')) {
    const open = trimmed.indexOf('(');
    if (open >= 0) {
      const close = trimmed.lastIndexOf(')');
      if (close < open) {
        throw MarkupError.invalidTag(`'${trimmed}' is missing a closing parenthesis`);
      }
      return { name: trimmed.slice(0, open), parameters: trimmed.slice(open + 1, close) };
    }
  }

  return { name: trimmed };
}

/**
 * Split markup into text and tag elements.
 *
 * An odd number of backslashes before a bracket escapes it; each pair of
 * backslashes stands for one literal backslash.
 *
 * @throws MarkupError when a tag is malformed
 */
export function parseElements(markup: string): MarkupElement[] {
  const elements: MarkupElement[] = [];
  let last = 0;

  for (const match of markup.matchAll(TAG_PATTERN)) {
    const start = match.index ?? 0;
    const backslashes = match[1];
    const content = match[2];

    if (start > last) {
      elements.push({ type: 'text', text: markup.slice(last, start) });
    }

    const literal = '\\'.repeat(Math.floor(backslashes.length / 2));
    if (literal) {
      elements.push({ type: 'text', text: literal });
    }

    if (backslashes.length % 2 === 1) {
      elements.push({ type: 'text', text: `[${content}]` });
    } else {
      elements.push({ type: 'tag', tag: parseTag(content) });
    }

    last = start + match[0].length;
  }

  if (last < markup.length) {
    elements.push({ type: 'text', text: markup.slice(last) });
  }
  return elements;
}
