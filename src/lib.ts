/**
 * cellmark public API.
 *
 * @example
 * ```ts
 * import { markup, renderSegments, ColorSystem } from 'cellmark';
 *
 * const text = markup.render('[bold red]Hello[/] world');
 * const lines = text.wrap(40).flatMap((line) => line.render('\n'));
 * process.stdout.write(renderSegments(lines, { colorSystem: ColorSystem.TrueColor }));
 * ```
 */

// Caches
export {
  LruCache,
  NoCache,
  setCachingEnabled,
  isCachingEnabled,
  clearCaches,
  type ParseCache,
} from './cache/ParseCache.js';

// Errors
export {
  ColorParseError,
  StyleParseError,
  MarkupError,
  ThemeError,
  type ColorParseErrorKind,
  type StyleParseErrorKind,
  type MarkupErrorKind,
} from './errors.js';

// Color and style
export { Color, ColorSystem, COLOR_SYSTEM_NAMES, type ColorType } from './color/Color.js';
export { ColorTriplet } from './color/palettes.js';
export { Style, type StyleOptions } from './style/Style.js';
export { StyleStack } from './style/StyleStack.js';
export { Attribute, type AttributeName, type AttributeFlag } from './style/attributes.js';

// Cells, segments and text
export { cellWidth, characterCellSize, chopCells, fitToWidth, cellToCharIndex, cellPositions, hasWideChars } from './text/cells.js';
export { Segment, Control, ControlType, splitAtCell, type ControlCode } from './text/Segment.js';
export * as segments from './text/segments.js';
export type { SegmentLine } from './text/segments.js';
export { Span } from './text/Span.js';
export {
  Text,
  JUSTIFY_METHODS,
  OVERFLOW_METHODS,
  type JustifyMethod,
  type OverflowMethod,
  type TextOptions,
} from './text/Text.js';
export { fromAnsi } from './text/fromAnsi.js';

// Markup and themes
export * as markup from './markup/markup.js';
export { render as renderMarkup, renderOrPlain, escape, type MarkupOptions } from './markup/markup.js';
export { Theme, type ThemeOptions } from './themes.js';

// Sizing
export { ratioResolve, shrinkSizes, type SizeSpec } from './layout/ratio.js';
export { Layout, type LayoutOptions, type Region, type SplitDirection } from './layout/Layout.js';
export { resolveColumnWidths, type ColumnSpec, type ColumnWidthOptions } from './layout/columns.js';

// Output
export { renderSegments, renderControl, type AnsiWriterOptions } from './render/ansiWriter.js';
export { stripAnsi, ANSI_PATTERN } from './utils/ansi.js';

// Configuration
export {
  loadConfig,
  saveConfig,
  parseColorSystem,
  colorSystemName,
  type Config,
  type ConfigFile,
  type ColorSystemName,
} from './config.js';
