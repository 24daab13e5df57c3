// Named style tables used to resolve markup tags such as [repr.number]

import * as fs from 'node:fs';
import { StyleParseError, ThemeError } from './errors.js';
import { Style } from './style/Style.js';

export interface ThemeOptions {
  /** Start from the built-in table and overlay the given styles (default true). */
  inherit?: boolean;
}

function loadDefinitions(): Record<string, string> {
  const raw: unknown = JSON.parse(
    fs.readFileSync(new URL('./themes.json', import.meta.url), 'utf-8')
  );
  const definitions: Record<string, string> = {};
  if (typeof raw === 'object' && raw !== null) {
    for (const [name, value] of Object.entries(raw)) {
      if (typeof value === 'string') definitions[name] = value;
    }
  }
  return definitions;
}

function parseDefinitions(definitions: Record<string, string>): Map<string, Style> {
  const styles = new Map<string, Style>();
  for (const [name, definition] of Object.entries(definitions)) {
    try {
      styles.set(name, Style.parse(definition));
    } catch (err) {
      if (err instanceof StyleParseError) {
        throw new ThemeError(name, err);
      }
      throw err;
    }
  }
  return styles;
}

let defaultStyles: Map<string, Style> | undefined;
let defaultTheme: Theme | undefined;

function builtinStyles(): Map<string, Style> {
  if (!defaultStyles) {
    defaultStyles = parseDefinitions(loadDefinitions());
  }
  return defaultStyles;
}

/**
 * A mapping of style names to styles.
 */
export class Theme {
  private readonly styles: Map<string, Style>;

  constructor(styles: Record<string, Style> = {}, options: ThemeOptions = {}) {
    const inherit = options.inherit ?? true;
    this.styles = new Map(inherit ? builtinStyles() : []);
    for (const [name, style] of Object.entries(styles)) {
      this.styles.set(name, style);
    }
  }

  /** The built-in theme. */
  static default(): Theme {
    if (!defaultTheme) {
      defaultTheme = new Theme();
    }
    return defaultTheme;
  }

  /**
   * Build a theme from style definition strings.
   *
   * @throws ThemeError naming the first definition that fails to parse
   */
  static fromDefinitions(definitions: Record<string, string>, options: ThemeOptions = {}): Theme {
    return new Theme(Object.fromEntries(parseDefinitions(definitions)), options);
  }

  get(name: string): Style | undefined {
    return this.styles.get(name);
  }

  has(name: string): boolean {
    return this.styles.has(name);
  }

  names(): string[] {
    return [...this.styles.keys()].sort();
  }

  get size(): number {
    return this.styles.size;
  }
}
