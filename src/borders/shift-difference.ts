import { createIndexedRaster, createRgbRaster } from '../raster/raster';
import type { GrayRaster, RgbRaster } from '../raster/types';

export type Shift = readonly [dx: number, dy: number];

/**
 * Per-channel absolute difference between the raster and a copy of itself
 * moved by (shiftX, shiftY). The band the move exposes is cleared, so the
 * image edge never reads as a border.
 */
export function shiftDifference(source: RgbRaster, shiftX: number, shiftY: number): RgbRaster {
  const { width, height } = source;
  const diff = createRgbRaster(width, height);
  for (let y = 0; y < height; y += 1) {
    const fromY = y - shiftY;
    for (let x = 0; x < width; x += 1) {
      const fromX = x - shiftX;
      const target = (y * width + x) * 3;
      const inside = fromX >= 0 && fromX < width && fromY >= 0 && fromY < height;
      const from = (fromY * width + fromX) * 3;
      for (let channel = 0; channel < 3; channel += 1) {
        const shifted = inside ? source.data[from + channel] : 0;
        diff.data[target + channel] = Math.abs(source.data[target + channel] - shifted);
      }
    }
  }
  clearExposedBand(diff, shiftX, shiftY);
  return diff;
}

function clearExposedBand(diff: RgbRaster, shiftX: number, shiftY: number): void {
  const { width, height } = diff;
  const clearColumns = (from: number, to: number) => {
    for (let y = 0; y < height; y += 1) {
      diff.data.fill(0, (y * width + from) * 3, (y * width + to) * 3);
    }
  };
  const clearRows = (from: number, to: number) => {
    diff.data.fill(0, from * width * 3, to * width * 3);
  };
  if (shiftX > 0) {
    clearColumns(0, Math.min(shiftX, width));
  }
  if (shiftX < 0) {
    clearColumns(Math.max(0, width + shiftX), width);
  }
  if (shiftY > 0) {
    clearRows(0, Math.min(shiftY, height));
  }
  if (shiftY < 0) {
    clearRows(Math.max(0, height + shiftY), height);
  }
}

/**
 * Adds every channel of every difference raster into one grayscale
 * accumulator, saturating at 255.
 */
export function accumulateDifferences(differences: readonly RgbRaster[]): GrayRaster {
  if (differences.length === 0) {
    throw new Error('No difference rasters to accumulate');
  }
  const { width, height } = differences[0];
  const accumulator = createIndexedRaster(width, height);
  for (const diff of differences) {
    if (diff.width !== width || diff.height !== height) {
      throw new Error('Difference rasters must share one size');
    }
    for (let i = 0; i < accumulator.data.length; i += 1) {
      const offset = i * 3;
      const sum = accumulator.data[i] + diff.data[offset] + diff.data[offset + 1] + diff.data[offset + 2];
      accumulator.data[i] = Math.min(255, sum);
    }
  }
  return accumulator;
}
