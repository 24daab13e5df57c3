/**
 * Console markup: `[bold red]Hello[/]` → styled Text.
 *
 * Tags open styles on a stack and closing tags turn the range since the
 * opening tag into a span. Tags still open at the end are closed implicitly;
 * a closing tag with nothing to close is an error.
 */

import { MarkupError, StyleParseError } from '../errors.js';
import { Style } from '../style/Style.js';
import { Text, type TextOptions } from '../text/Text.js';
import { Theme } from '../themes.js';
import * as logger from '../utils/logger.js';
import { baseName, isClosingTag, parseElements, type Tag } from './tags.js';

export interface MarkupOptions extends TextOptions {
  /** Theme consulted for tag names such as `repr.number` (default: built-in). */
  theme?: Theme;
}

interface OpenTag {
  start: number;
  tag: Tag;
}

function splitOptions(options: MarkupOptions): [Theme, TextOptions] {
  const { theme, ...textOptions } = options;
  return [theme ?? Theme.default(), textOptions];
}

/**
 * Resolve a tag to a style: `link` tags set the hyperlink, theme names come
 * next, then the tag is parsed as a style definition. Anything unparsable
 * becomes an empty style.
 */
export function tagToStyle(tag: Tag, theme: Theme = Theme.default()): Style {
  if (tag.name.toLowerCase() === 'link' && tag.parameters !== undefined) {
    return Style.create({ link: tag.parameters });
  }

  const themed = theme.get(tag.name);
  if (themed) return themed;

  const definition = tag.parameters === undefined ? tag.name : `${tag.name} ${tag.parameters}`;
  try {
    return Style.parse(definition);
  } catch (err) {
    if (err instanceof StyleParseError) {
      logger.debug(`Unknown markup style '${definition}': ${err.message}`);
      return Style.create();
    }
    throw err;
  }
}

/** Remove the topmost open tag whose name, or its first word, matches. */
function popMatching(stack: OpenTag[], name: string): OpenTag | undefined {
  const wanted = name.toLowerCase();
  for (let i = stack.length - 1; i >= 0; i--) {
    const tagName = stack[i].tag.name.toLowerCase();
    const firstWord = tagName.split(/\s+/)[0];
    if (firstWord === wanted || tagName === wanted) {
      return stack.splice(i, 1)[0];
    }
  }
  return undefined;
}

function closeTag(text: Text, open: OpenTag, theme: Theme): void {
  const end = text.length;
  if (open.start < end) {
    text.stylize(open.start, end, tagToStyle(open.tag, theme));
  }
}

/**
 * Render markup to a Text.
 *
 * @throws MarkupError on a closing tag with nothing to close or a malformed tag
 */
export function render(markup: string, options: MarkupOptions = {}): Text {
  const [theme, textOptions] = splitOptions(options);
  if (!markup.includes('[')) {
    return new Text(markup, textOptions);
  }

  const text = new Text('', textOptions);
  const stack: OpenTag[] = [];

  for (const element of parseElements(markup)) {
    if (element.type === 'text') {
      text.append(element.text.replaceAll('\\[', '['));
      continue;
    }

    const { tag } = element;
    if (!isClosingTag(tag)) {
      stack.push({ start: text.length, tag });
      continue;
    }

    const name = baseName(tag).trim();
    if (name === '') {
      const open = stack.pop();
      if (!open) throw MarkupError.unmatchedClosingTag(null);
      closeTag(text, open, theme);
    } else {
      const open = popMatching(stack, name);
      if (!open) throw MarkupError.unmatchedClosingTag(name);
      closeTag(text, open, theme);
    }
  }

  for (let open = stack.pop(); open; open = stack.pop()) {
    closeTag(text, open, theme);
  }

  return text;
}

/**
 * Render markup, falling back to the literal markup as plain text when it
 * does not parse.
 */
export function renderOrPlain(markup: string, options: MarkupOptions = {}): Text {
  try {
    return render(markup, options);
  } catch (err) {
    if (err instanceof MarkupError) {
      logger.debug(`Markup fell back to plain text: ${err.message}`);
      return new Text(markup, splitOptions(options)[1]);
    }
    throw err;
  }
}

/**
 * Escape text so that it renders literally inside markup.
 */
export function escape(text: string): string {
  const escaped = text.replace(/(\\*)(\[[a-z#/@][^[\]]*?\])/g, (_match, backslashes: string, tag: string) => {
    return `${backslashes}${backslashes}\\${tag}`;
  });
  if (escaped.endsWith('\\') && !escaped.endsWith('\\\\')) {
    return `${escaped}\\`;
  }
  return escaped;
}
