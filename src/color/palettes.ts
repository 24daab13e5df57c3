import * as fs from 'node:fs';

/** RGB color triplet, each channel 0-255. */
export class ColorTriplet {
  readonly red: number;
  readonly green: number;
  readonly blue: number;

  constructor(red: number, green: number, blue: number) {
    this.red = red;
    this.green = green;
    this.blue = blue;
  }

  /** CSS-style `#rrggbb`. */
  get hex(): string {
    const hex2 = (n: number): string => n.toString(16).padStart(2, '0');
    return `#${hex2(this.red)}${hex2(this.green)}${hex2(this.blue)}`;
  }

  /** CSS-style `rgb(r,g,b)`. */
  get rgb(): string {
    return `rgb(${this.red},${this.green},${this.blue})`;
  }

  /** Channels scaled to 0.0-1.0. */
  get normalized(): [number, number, number] {
    return [this.red / 255, this.green / 255, this.blue / 255];
  }

  /** Convert to hue, lightness, saturation (each 0.0-1.0). */
  toHls(): [number, number, number] {
    const [r, g, b] = this.normalized;
    const max = Math.max(r, g, b);
    const min = Math.min(r, g, b);
    const lightness = (max + min) / 2;

    if (Math.abs(max - min) < Number.EPSILON) {
      return [0, lightness, 0];
    }

    const delta = max - min;
    const saturation = lightness <= 0.5 ? delta / (max + min) : delta / (2 - max - min);

    let hue: number;
    if (Math.abs(max - r) < Number.EPSILON) {
      hue = (g - b) / delta + (g < b ? 6 : 0);
    } else if (Math.abs(max - g) < Number.EPSILON) {
      hue = (b - r) / delta + 2;
    } else {
      hue = (r - g) / delta + 4;
    }

    return [hue / 6, lightness, saturation];
  }

  equals(other: ColorTriplet): boolean {
    return this.red === other.red && this.green === other.green && this.blue === other.blue;
  }

  toString(): string {
    return `rgb(${this.red}, ${this.green}, ${this.blue})`;
  }
}

function triplets(values: Array<[number, number, number]>): readonly ColorTriplet[] {
  return values.map(([r, g, b]) => new ColorTriplet(r, g, b));
}

/** Standard 16-color ANSI palette. */
export const STANDARD_PALETTE = triplets([
  [0, 0, 0],
  [170, 0, 0],
  [0, 170, 0],
  [170, 85, 0],
  [0, 0, 170],
  [170, 0, 170],
  [0, 170, 170],
  [170, 170, 170],
  [85, 85, 85],
  [255, 85, 85],
  [85, 255, 85],
  [255, 255, 85],
  [85, 85, 255],
  [255, 85, 255],
  [85, 255, 255],
  [255, 255, 255],
]);

/** Windows 10+ console palette. */
export const WINDOWS_PALETTE = triplets([
  [12, 12, 12],
  [197, 15, 31],
  [19, 161, 14],
  [193, 156, 0],
  [0, 55, 218],
  [136, 23, 152],
  [58, 150, 221],
  [204, 204, 204],
  [118, 118, 118],
  [231, 72, 86],
  [22, 198, 12],
  [249, 241, 165],
  [59, 120, 255],
  [180, 0, 158],
  [97, 214, 214],
  [242, 242, 242],
]);

const CUBE_LEVELS = [0, 95, 135, 175, 215, 255];

function generateEightBitPalette(): readonly ColorTriplet[] {
  const palette: ColorTriplet[] = [...STANDARD_PALETTE];

  // 16-231: 6x6x6 color cube
  for (let r = 0; r < 6; r++) {
    for (let g = 0; g < 6; g++) {
      for (let b = 0; b < 6; b++) {
        palette.push(new ColorTriplet(CUBE_LEVELS[r], CUBE_LEVELS[g], CUBE_LEVELS[b]));
      }
    }
  }

  // 232-255: grayscale ramp
  for (let i = 0; i < 24; i++) {
    const gray = 8 + i * 10;
    palette.push(new ColorTriplet(gray, gray, gray));
  }

  return palette;
}

/** 256-color palette: standard colors, color cube, grayscale ramp. */
export const EIGHT_BIT_PALETTE = generateEightBitPalette();

// --- Conversion ---

function quantize(value: number): number {
  const index = value < 95 ? Math.round(value / 95) : 1 + Math.round((value - 95) / 40);
  return Math.min(index, 5);
}

/** Convert RGB to the nearest 8-bit palette number. */
export function rgbToEightBit(triplet: ColorTriplet): number {
  const [, lightness, saturation] = triplet.toHls();

  if (saturation < 0.15) {
    if (lightness < 0.04) return 16;
    if (lightness > 0.96) return 231;
    const grayIndex = Math.round(((lightness - 0.04) / 0.92) * 24);
    return 232 + Math.min(grayIndex, 23);
  }

  return 16 + quantize(triplet.red) * 36 + quantize(triplet.green) * 6 + quantize(triplet.blue);
}

/** Weighted "red mean" distance between two colors. */
function colorDistance(a: ColorTriplet, b: ColorTriplet): number {
  const redMean = Math.floor((a.red + b.red) / 2);
  const redDiff = Math.abs(a.red - b.red);
  const greenDiff = Math.abs(a.green - b.green);
  const blueDiff = Math.abs(a.blue - b.blue);

  const redWeight = Math.floor(((512 + redMean) * redDiff * redDiff) / 256);
  const greenWeight = 4 * greenDiff * greenDiff;
  const blueWeight = Math.floor(((767 - redMean) * blueDiff * blueDiff) / 256);

  return redWeight + greenWeight + blueWeight;
}

/** Convert RGB to the nearest standard 16-color number (first minimum wins). */
export function rgbToStandard(triplet: ColorTriplet): number {
  let bestIndex = 0;
  let bestDistance = Number.POSITIVE_INFINITY;

  STANDARD_PALETTE.forEach((paletteColor, index) => {
    const distance = colorDistance(triplet, paletteColor);
    if (distance < bestDistance) {
      bestDistance = distance;
      bestIndex = index;
    }
  });

  return bestIndex;
}

// --- Named colors ---

function loadNamedColors(): ReadonlyMap<string, number> {
  const raw: unknown = JSON.parse(
    fs.readFileSync(new URL('./namedColors.json', import.meta.url), 'utf-8')
  );
  const names = new Map<string, number>();
  if (typeof raw === 'object' && raw !== null) {
    for (const [name, value] of Object.entries(raw)) {
      if (typeof value === 'number') names.set(name, value);
    }
  }
  return names;
}

/** Color names mapped to their palette number. */
export const NAMED_COLORS = loadNamedColors();
