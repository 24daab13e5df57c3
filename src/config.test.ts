import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ColorSystem } from './color/Color.js';
import { colorSystemName, isJustifyMethod, isOverflowMethod, loadConfig, parseColorSystem, saveConfig } from './config.js';

describe('parseColorSystem', () => {
  it('maps every supported name', () => {
    expect(parseColorSystem('standard')).toBe(ColorSystem.Standard);
    expect(parseColorSystem('256')).toBe(ColorSystem.EightBit);
    expect(parseColorSystem('truecolor')).toBe(ColorSystem.TrueColor);
    expect(parseColorSystem('windows')).toBe(ColorSystem.Windows);
    expect(parseColorSystem('none')).toBeNull();
  });

  it('ignores case and surrounding space', () => {
    expect(parseColorSystem(' TrueColor ')).toBe(ColorSystem.TrueColor);
  });

  it('returns undefined for unknown names', () => {
    expect(parseColorSystem('16m')).toBeUndefined();
    expect(parseColorSystem('')).toBeUndefined();
    expect(parseColorSystem('toString')).toBeUndefined();
  });
});

describe('colorSystemName', () => {
  it('names every color system so parseColorSystem reads it back', () => {
    expect(colorSystemName(ColorSystem.EightBit)).toBe('256');
    expect(colorSystemName(null)).toBe('none');
    for (const system of [ColorSystem.Standard, ColorSystem.EightBit, ColorSystem.TrueColor, ColorSystem.Windows]) {
      expect(parseColorSystem(colorSystemName(system))).toBe(system);
    }
  });
});

describe('isJustifyMethod / isOverflowMethod', () => {
  it('accepts known methods only', () => {
    expect(isJustifyMethod('full')).toBe(true);
    expect(isJustifyMethod('Full')).toBe(false);
    expect(isOverflowMethod('ellipsis')).toBe(true);
    expect(isOverflowMethod(3)).toBe(false);
  });
});

/**
 * Uses a real temp directory so the user's own config is never touched.
 */
describe('loadConfig/saveConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cellmark-config-'));
    configPath = path.join(dir, 'config.json');
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults without a config file', () => {
    expect(loadConfig({ path: configPath, env: {} })).toEqual({
      colorSystem: ColorSystem.TrueColor,
      width: 80,
      tabSize: 8,
      justify: 'default',
      overflow: 'fold',
      debug: false,
    });
  });

  it('reads values from the config file', () => {
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        colorSystem: '256',
        width: 100,
        tabSize: 4,
        justify: 'center',
        overflow: 'ellipsis',
        debug: true,
        styles: { warning: 'bold yellow' },
      })
    );

    const config = loadConfig({ path: configPath, env: {} });
    expect(config).toEqual({
      colorSystem: ColorSystem.EightBit,
      width: 100,
      tabSize: 4,
      justify: 'center',
      overflow: 'ellipsis',
      debug: true,
      styles: { warning: 'bold yellow' },
    });
  });

  it('ignores invalid values with a warning', () => {
    fs.writeFileSync(
      configPath,
      JSON.stringify({ colorSystem: 'rainbow', width: 0, tabSize: 2.5, justify: 'middle', debug: 'yes', styles: { a: 1 } })
    );

    const config = loadConfig({ path: configPath, env: {} });
    expect(config.colorSystem).toBe(ColorSystem.TrueColor);
    expect(config.width).toBe(80);
    expect(config.tabSize).toBe(8);
    expect(config.justify).toBe('default');
    expect(config.debug).toBe(false);
    expect(config.styles).toBeUndefined();
    expect(process.stderr.write).toHaveBeenCalledWith("[cellmark warn] Ignoring invalid config value for 'width'\n");
  });

  it('ignores an unreadable file', () => {
    fs.writeFileSync(configPath, '{ not json');
    expect(loadConfig({ path: configPath, env: {} }).width).toBe(80);
  });

  it('lets the environment override the file', () => {
    fs.writeFileSync(configPath, JSON.stringify({ colorSystem: 'standard', width: 100 }));

    const config = loadConfig({
      path: configPath,
      env: { CELLMARK_COLOR_SYSTEM: 'truecolor', CELLMARK_WIDTH: '42' },
    });
    expect(config.colorSystem).toBe(ColorSystem.TrueColor);
    expect(config.width).toBe(42);
  });

  it('ignores invalid environment values', () => {
    const config = loadConfig({ path: configPath, env: { CELLMARK_COLOR_SYSTEM: 'lots', CELLMARK_WIDTH: 'wide' } });
    expect(config.colorSystem).toBe(ColorSystem.TrueColor);
    expect(config.width).toBe(80);
  });

  it('disables color with NO_COLOR', () => {
    const config = loadConfig({ path: configPath, env: { NO_COLOR: '1', CELLMARK_COLOR_SYSTEM: '256' } });
    expect(config.colorSystem).toBeNull();
    expect(loadConfig({ path: configPath, env: { NO_COLOR: '' } }).colorSystem).toBe(ColorSystem.TrueColor);
  });

  it('saveConfig merges into the existing file', () => {
    fs.writeFileSync(configPath, JSON.stringify({ width: 100 }));

    saveConfig({ colorSystem: 'none', justify: 'right' }, { path: configPath });

    const written: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    expect(written).toEqual({ width: 100, colorSystem: 'none', justify: 'right' });
  });

  it('round-trip: save then load preserves values', () => {
    const nested = path.join(dir, 'nested', 'config.json');
    saveConfig({ overflow: 'crop', tabSize: 2 }, { path: nested });

    const config = loadConfig({ path: nested, env: {} });
    expect(config.overflow).toBe('crop');
    expect(config.tabSize).toBe(2);
  });
});
