import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { COLOR_SYSTEM_NAMES, ColorSystem } from './color/Color.js';
import {
  JUSTIFY_METHODS,
  OVERFLOW_METHODS,
  type JustifyMethod,
  type OverflowMethod,
} from './text/Text.js';
import * as logger from './utils/logger.js';

export type ColorSystemName = (typeof COLOR_SYSTEM_NAMES)[ColorSystem] | 'none';

export interface Config {
  /** `null` disables color entirely. */
  colorSystem: ColorSystem | null;
  width: number;
  tabSize: number;
  justify: JustifyMethod;
  overflow: OverflowMethod;
  debug: boolean;
  /** Theme overrides: style name → style definition. */
  styles?: Record<string, string>;
}

/** The shape persisted in the config file. */
export interface ConfigFile {
  colorSystem?: ColorSystemName;
  width?: number;
  tabSize?: number;
  justify?: JustifyMethod;
  overflow?: OverflowMethod;
  debug?: boolean;
  styles?: Record<string, string>;
}

export interface ConfigSource {
  /** Config file location (default ~/.config/cellmark/config.json). */
  path?: string;
  /** Environment to read overrides from (default process.env). */
  env?: NodeJS.ProcessEnv;
}

const defaultConfig: Config = {
  colorSystem: ColorSystem.TrueColor,
  width: 80,
  tabSize: 8,
  justify: 'default',
  overflow: 'fold',
  debug: false,
};

export const CONFIG_PATH = path.join(os.homedir(), '.config', 'cellmark', 'config.json');

const COLOR_SYSTEMS: Record<ColorSystemName, ColorSystem | null> = {
  standard: ColorSystem.Standard,
  '256': ColorSystem.EightBit,
  truecolor: ColorSystem.TrueColor,
  windows: ColorSystem.Windows,
  none: null,
};

export const VALID_COLOR_SYSTEMS = Object.keys(COLOR_SYSTEMS);

function isColorSystemName(value: unknown): value is ColorSystemName {
  return typeof value === 'string' && Object.hasOwn(COLOR_SYSTEMS, value);
}

/**
 * Map a color system name to its value: `null` for `none`, `undefined` for
 * an unknown name.
 */
export function parseColorSystem(name: string): ColorSystem | null | undefined {
  const normalized = name.trim().toLowerCase();
  return isColorSystemName(normalized) ? COLOR_SYSTEMS[normalized] : undefined;
}

/** The config name of a color system; `none` for no color. */
export function colorSystemName(colorSystem: ColorSystem | null): ColorSystemName {
  return colorSystem === null ? 'none' : COLOR_SYSTEM_NAMES[colorSystem];
}

export function isJustifyMethod(value: unknown): value is JustifyMethod {
  return JUSTIFY_METHODS.some((method) => method === value);
}

export function isOverflowMethod(value: unknown): value is OverflowMethod {
  return OVERFLOW_METHODS.some((method) => method === value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStyleTable(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'string');
}

function readConfigFile(configPath: string): Record<string, unknown> | undefined {
  if (!fs.existsSync(configPath)) return undefined;
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    if (isRecord(parsed)) return parsed;
    logger.warn(`Ignoring ${configPath}: expected a JSON object`);
  } catch (err) {
    logger.warn(`Ignoring unreadable config ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return undefined;
}

function applyFileConfig(config: Config, fileConfig: Record<string, unknown>): void {
  const invalid = (key: string): void => logger.warn(`Ignoring invalid config value for '${key}'`);

  if (fileConfig.colorSystem !== undefined) {
    if (isColorSystemName(fileConfig.colorSystem)) config.colorSystem = COLOR_SYSTEMS[fileConfig.colorSystem];
    else invalid('colorSystem');
  }
  if (fileConfig.width !== undefined) {
    if (isPositiveInteger(fileConfig.width)) config.width = fileConfig.width;
    else invalid('width');
  }
  if (fileConfig.tabSize !== undefined) {
    if (isPositiveInteger(fileConfig.tabSize)) config.tabSize = fileConfig.tabSize;
    else invalid('tabSize');
  }
  if (fileConfig.justify !== undefined) {
    if (isJustifyMethod(fileConfig.justify)) config.justify = fileConfig.justify;
    else invalid('justify');
  }
  if (fileConfig.overflow !== undefined) {
    if (isOverflowMethod(fileConfig.overflow)) config.overflow = fileConfig.overflow;
    else invalid('overflow');
  }
  if (fileConfig.debug !== undefined) {
    if (typeof fileConfig.debug === 'boolean') config.debug = fileConfig.debug;
    else invalid('debug');
  }
  if (fileConfig.styles !== undefined) {
    if (isStyleTable(fileConfig.styles)) config.styles = fileConfig.styles;
    else invalid('styles');
  }
}

function applyEnv(config: Config, env: NodeJS.ProcessEnv): void {
  const colorSystem = env.CELLMARK_COLOR_SYSTEM;
  if (colorSystem) {
    const parsed = parseColorSystem(colorSystem);
    if (parsed !== undefined) config.colorSystem = parsed;
    else logger.warn(`Ignoring CELLMARK_COLOR_SYSTEM=${colorSystem}`);
  }

  const width = env.CELLMARK_WIDTH;
  if (width) {
    const parsed = Number(width);
    if (isPositiveInteger(parsed)) config.width = parsed;
    else logger.warn(`Ignoring CELLMARK_WIDTH=${width}`);
  }

  // https://no-color.org: any non-empty value disables color
  if (env.NO_COLOR) {
    config.colorSystem = null;
  }
}

/**
 * Load configuration: defaults, then the config file, then the environment.
 */
export function loadConfig(source: ConfigSource = {}): Config {
  const config: Config = { ...defaultConfig };

  const fileConfig = readConfigFile(source.path ?? CONFIG_PATH);
  if (fileConfig) {
    applyFileConfig(config, fileConfig);
  }
  applyEnv(config, source.env ?? process.env);

  return config;
}

/**
 * Merge `updates` into the config file, creating it if needed.
 */
export function saveConfig(updates: ConfigFile, source: Pick<ConfigSource, 'path'> = {}): void {
  const configPath = source.path ?? CONFIG_PATH;

  // Ensure config directory exists
  const configDir = path.dirname(configPath);
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true });
  }

  const fileConfig = { ...readConfigFile(configPath), ...updates };
  fs.writeFileSync(configPath, JSON.stringify(fileConfig, null, 2) + '\n');
}
