import { createProvinceColorTable } from '../src/provinces/color-table';
import type { ProvinceColorTable } from '../src/provinces/types';
import { createIndexedRaster, createRgbRaster, setRgb } from '../src/raster/raster';
import type { IndexedRaster, Rgb, RgbRaster } from '../src/raster/types';
import { TreeProjection } from '../src/terrain/tree-projection';

export const RED: Rgb = [255, 0, 0];
export const GREEN: Rgb = [0, 255, 0];
export const BLUE: Rgb = [0, 0, 255];
export const YELLOW: Rgb = [255, 255, 0];
export const GREY: Rgb = [90, 90, 90];

export const PALETTE: Record<string, Rgb> = {
  R: RED,
  G: GREEN,
  B: BLUE,
  Y: YELLOW,
  X: GREY,
};

// Each character picks a color from PALETTE.
export function rasterFromRows(rows: string[]): RgbRaster {
  const height = rows.length;
  const width = height > 0 ? rows[0].length : 0;
  const raster = createRgbRaster(width, height);
  rows.forEach((row, y) => {
    Array.from(row).forEach((symbol, x) => {
      const color = PALETTE[symbol];
      if (!color) {
        throw new Error(`Unknown fixture symbol ${symbol}`);
      }
      setRgb(raster, x, y, color);
    });
  });
  return raster;
}

// R=1, G=2, B=3, Y=4; GREY stays unmapped.
export function fixtureColorTable(): ProvinceColorTable {
  return createProvinceColorTable([
    { id: 1, color: RED },
    { id: 2, color: GREEN },
    { id: 3, color: BLUE },
    { id: 4, color: YELLOW },
  ]);
}

export function indexedFromRows(rows: number[][]): IndexedRaster {
  const height = rows.length;
  const width = height > 0 ? rows[0].length : 0;
  const raster = createIndexedRaster(width, height);
  rows.forEach((row, y) => row.forEach((value, x) => (raster.data[y * width + x] = value)));
  return raster;
}

export function indexedFromList(width: number, height: number, values: number[]): IndexedRaster {
  if (values.length !== width * height) {
    throw new Error(`Expected ${width * height} values, got ${values.length}`);
  }
  return { width, height, data: Uint8Array.from(values) };
}

export function projectionOf(raster: IndexedRaster): TreeProjection {
  return new TreeProjection(raster, raster);
}

export function repeat(value: number, count: number): number[] {
  return new Array<number>(count).fill(value);
}
