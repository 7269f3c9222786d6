/**
 * Border synthesis by shifted-difference accumulation.
 *
 * Single borders compare against right, down and down-right shifts only, so
 * border pixels sit on one side of each boundary. Double borders compare in
 * all four cardinal directions (eight when thick) and cover both sides,
 * which is what makes excluding regions afterwards safe.
 */
import { getMaskBit } from '../raster/mask';
import { createIndexedRaster, setRgb } from '../raster/raster';
import type { BitMask, BoundingBox, GrayRaster, Rgb, RgbRaster } from '../raster/types';
import { accumulateDifferences, shiftDifference, type Shift } from './shift-difference';

export type BorderPolarity = {
  border: number;
  background: number;
};

export const DEFAULT_BORDER_POLARITY: BorderPolarity = { border: 0, background: 255 };

export type BorderRaster = GrayRaster & {
  polarity: BorderPolarity;
};

export type BorderOptions = {
  polarity?: BorderPolarity;
};

export type DoubleBorderOptions = BorderOptions & {
  thick?: boolean;
};

export type MaskedRegion = {
  mask: BitMask;
  boundingBox: BoundingBox;
};

export const SINGLE_BORDER_SHIFTS: readonly Shift[] = [
  [0, 1],
  [1, 0],
  [1, 1],
];

export const DOUBLE_BORDER_SHIFTS: readonly Shift[] = [
  [0, 1],
  [1, 0],
  [0, -1],
  [-1, 0],
];

export const THICK_BORDER_SHIFTS: readonly Shift[] = [
  ...DOUBLE_BORDER_SHIFTS,
  [1, 1],
  [-1, 1],
  [1, -1],
  [-1, -1],
];

function differencesToBorders(source: RgbRaster, shifts: readonly Shift[], polarity: BorderPolarity): BorderRaster {
  const accumulator = accumulateDifferences(shifts.map(([dx, dy]) => shiftDifference(source, dx, dy)));
  const borders = createIndexedRaster(accumulator.width, accumulator.height);
  for (let i = 0; i < accumulator.data.length; i += 1) {
    // flatten (any difference -> max), then invert into the chosen polarity
    borders.data[i] = accumulator.data[i] !== 0 ? polarity.border : polarity.background;
  }
  return { ...borders, polarity };
}

/**
 * Not suitable for excluding regions afterwards: the excluded region may own
 * the only border pixels of a neighboring boundary.
 */
export function renderBorders(source: RgbRaster, options: BorderOptions = {}): BorderRaster {
  return differencesToBorders(source, SINGLE_BORDER_SHIFTS, options.polarity ?? DEFAULT_BORDER_POLARITY);
}

export function renderDoubleBorders(source: RgbRaster, options: DoubleBorderOptions = {}): BorderRaster {
  const shifts = options.thick ? THICK_BORDER_SHIFTS : DOUBLE_BORDER_SHIFTS;
  return differencesToBorders(source, shifts, options.polarity ?? DEFAULT_BORDER_POLARITY);
}

/**
 * Paints each region's own pixels back to background. Only meaningful on
 * double borders.
 */
export function excludeRegions(borders: BorderRaster, regions: Iterable<MaskedRegion>): void {
  for (const region of regions) {
    const { left, top } = region.boundingBox;
    for (let y = 0; y < region.mask.height; y += 1) {
      const targetY = top + y;
      if (targetY < 0 || targetY >= borders.height) {
        continue;
      }
      for (let x = 0; x < region.mask.width; x += 1) {
        const targetX = left + x;
        if (targetX < 0 || targetX >= borders.width || !getMaskBit(region.mask, x, y)) {
          continue;
        }
        borders.data[targetY * borders.width + targetX] = borders.polarity.background;
      }
    }
  }
}

export function isBorderPixel(borders: BorderRaster, x: number, y: number): boolean {
  return borders.data[y * borders.width + x] === borders.polarity.border;
}

export function countBorderPixels(borders: BorderRaster): number {
  let count = 0;
  for (let i = 0; i < borders.data.length; i += 1) {
    if (borders.data[i] === borders.polarity.border) {
      count += 1;
    }
  }
  return count;
}

/**
 * Paints border pixels onto a copy of the background.
 */
export function overlayBorders(background: RgbRaster, borders: BorderRaster, color: Rgb = [0, 0, 0]): RgbRaster {
  if (background.width !== borders.width || background.height !== borders.height) {
    throw new Error(
      `Border raster ${borders.width}x${borders.height} does not match background ${background.width}x${background.height}`
    );
  }
  const result: RgbRaster = { width: background.width, height: background.height, data: background.data.slice() };
  for (let y = 0; y < borders.height; y += 1) {
    for (let x = 0; x < borders.width; x += 1) {
      if (isBorderPixel(borders, x, y)) {
        setRgb(result, x, y, color);
      }
    }
  }
  return result;
}
