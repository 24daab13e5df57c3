import type { ColorSystem } from './color/Color.js';
import { colorSystemName, loadConfig, isJustifyMethod, isOverflowMethod, parseColorSystem, VALID_COLOR_SYSTEMS } from './config.js';
import { MarkupError, ThemeError } from './errors.js';
import { render, renderOrPlain } from './markup/markup.js';
import { renderSegments } from './render/ansiWriter.js';
import { JUSTIFY_METHODS, OVERFLOW_METHODS, type JustifyMethod, type OverflowMethod, type Text } from './text/Text.js';
import { Theme } from './themes.js';
import * as logger from './utils/logger.js';

export interface ParsedArgs {
  markup: string[];
  /** `null` means plain output; undefined means use the config. */
  colorSystem?: ColorSystem | null;
  width?: number;
  justify?: JustifyMethod;
  overflow?: OverflowMethod;
  noWrap?: boolean;
  strict?: boolean;
  debug?: boolean;
  help?: boolean;
}

export interface CliIO {
  stdout: { write(chunk: string): unknown };
  env?: NodeJS.ProcessEnv;
  /** Config file location, for tests. */
  configPath?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const HELP = `
cellmark - Render console markup as ANSI text

Usage: cellmark [options] <markup...>

Options:
  -c, --color-system SYSTEM  ${VALID_COLOR_SYSTEMS.join(', ')}
  -w, --width N              Wrap width in cells (default: 80)
  -j, --justify METHOD       ${JUSTIFY_METHODS.join(', ')}
  -o, --overflow METHOD      ${OVERFLOW_METHODS.join(', ')}
  --no-wrap                  Do not wrap; apply the overflow method per line
  --strict                   Fail on invalid markup instead of printing it as-is
  -d, --debug                Log debug information to stderr
  -h, --help                 Show this help message

Arguments:
  <markup...>                Joined with spaces, e.g. "[bold red]Hello[/] world"

Environment:
  CELLMARK_COLOR_SYSTEM      Default color system
  CELLMARK_WIDTH             Default width
  NO_COLOR                   Disable color when set

Config file: ~/.config/cellmark/config.json
`;

export function parseArgs(args: readonly string[]): ParsedArgs {
  const result: ParsedArgs = { markup: [] };

  const valueFor = (option: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined) {
      throw new UsageError(`${option} requires a value`);
    }
    return value;
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === '--') {
      result.markup.push(...args.slice(i + 1));
      break;
    } else if (arg === '--color-system' || arg === '-c') {
      const value = valueFor(arg, i);
      const colorSystem = parseColorSystem(value);
      if (colorSystem === undefined) {
        throw new UsageError(`Unknown color system '${value}'`);
      }
      result.colorSystem = colorSystem;
      i++;
    } else if (arg === '--width' || arg === '-w') {
      const value = valueFor(arg, i);
      const width = Number(value);
      if (!Number.isInteger(width) || width < 1) {
        throw new UsageError(`Invalid width '${value}'`);
      }
      result.width = width;
      i++;
    } else if (arg === '--justify' || arg === '-j') {
      const value = valueFor(arg, i);
      if (!isJustifyMethod(value)) {
        throw new UsageError(`Unknown justify method '${value}'`);
      }
      result.justify = value;
      i++;
    } else if (arg === '--overflow' || arg === '-o') {
      const value = valueFor(arg, i);
      if (!isOverflowMethod(value)) {
        throw new UsageError(`Unknown overflow method '${value}'`);
      }
      result.overflow = value;
      i++;
    } else if (arg === '--no-wrap') {
      result.noWrap = true;
    } else if (arg === '--strict') {
      result.strict = true;
    } else if (arg === '--debug' || arg === '-d') {
      result.debug = true;
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new UsageError(`Unknown option '${arg}'`);
    } else {
      result.markup.push(arg);
    }
    i++;
  }

  return result;
}

function loadTheme(styles: Record<string, string> | undefined): Theme {
  if (!styles) return Theme.default();
  try {
    return Theme.fromDefinitions(styles);
  } catch (err) {
    if (err instanceof ThemeError) {
      logger.warn(`Ignoring configured styles: ${err.message}`);
      return Theme.default();
    }
    throw err;
  }
}

/**
 * Run the CLI and return the process exit code.
 */
export function run(argv: readonly string[], io: CliIO): number {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }

  if (args.help) {
    io.stdout.write(HELP);
    return 0;
  }
  if (args.markup.length === 0) {
    logger.error('No markup given (see --help)');
    return 1;
  }

  const config = loadConfig({ path: io.configPath, env: io.env });
  logger.setDebug(config.debug || args.debug === true);

  const colorSystem = args.colorSystem !== undefined ? args.colorSystem : config.colorSystem;
  const width = args.width ?? config.width;
  const options = {
    theme: loadTheme(config.styles),
    justify: args.justify ?? config.justify,
    overflow: args.overflow ?? config.overflow,
    noWrap: args.noWrap ?? false,
    tabSize: config.tabSize,
  };
  const markup = args.markup.join(' ');
  logger.debug(`Rendering ${markup.length} characters at width ${width} (${colorSystemName(colorSystem)} color)`);

  let text: Text;
  if (args.strict) {
    try {
      text = render(markup, options);
    } catch (err) {
      if (err instanceof MarkupError) {
        logger.error('Invalid markup', err);
        return 1;
      }
      throw err;
    }
  } else {
    text = renderOrPlain(markup, options);
  }

  const segments = text.wrap(width).flatMap((line) => line.render('\n'));
  io.stdout.write(renderSegments(segments, { colorSystem }));
  return 0;
}
