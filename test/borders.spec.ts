import { describe, expect, it } from 'vitest';
import {
  countBorderPixels,
  excludeRegions,
  isBorderPixel,
  overlayBorders,
  renderBorders,
  renderDoubleBorders,
  type BorderRaster,
} from '../src/borders/borders';
import { accumulateDifferences, shiftDifference } from '../src/borders/shift-difference';
import { segmentProvinces } from '../src/provinces/segmenter';
import { createRgbRaster } from '../src/raster/raster';
import { fixtureColorTable, rasterFromRows } from './fixtures';

function borderCoordinates(borders: BorderRaster): string[] {
  const found: string[] = [];
  for (let y = 0; y < borders.height; y += 1) {
    for (let x = 0; x < borders.width; x += 1) {
      if (isBorderPixel(borders, x, y)) {
        found.push(`${x},${y}`);
      }
    }
  }
  return found;
}

describe('shift difference', () => {
  it('clears the band exposed by the shift', () => {
    const uniform = rasterFromRows(['RRR', 'RRR', 'RRR']);
    const diff = shiftDifference(uniform, 1, 0);
    expect(Array.from(diff.data).every((value) => value === 0)).toBe(true);
    expect(countBorderPixels(renderBorders(uniform))).toBe(0);
    expect(countBorderPixels(renderDoubleBorders(uniform, { thick: true }))).toBe(0);
  });

  it('compares against the neighbor on the far side of the shift', () => {
    const diff = shiftDifference(rasterFromRows(['RGB']), -1, 0);
    // x=0 compares red with green, x=1 green with blue, x=2 is cleared
    expect(Array.from(diff.data)).toEqual([255, 255, 0, 0, 255, 255, 0, 0, 0]);
  });

  it('saturates the accumulator', () => {
    const diff = createRgbRaster(1, 1, [200, 200, 200]);
    expect(Array.from(accumulateDifferences([diff, diff]).data)).toEqual([255]);
  });
});

describe('border synthesis', () => {
  const SPLIT = ['RRGG', 'RRGG'];

  it('puts single borders on one side of a vertical boundary', () => {
    expect(borderCoordinates(renderBorders(rasterFromRows(SPLIT)))).toEqual(['2,0', '2,1']);
  });

  it('puts double borders on both sides of a vertical boundary', () => {
    expect(borderCoordinates(renderDoubleBorders(rasterFromRows(SPLIT)))).toEqual(['1,0', '2,0', '1,1', '2,1']);
  });

  it('reaches diagonal neighbors only when thick', () => {
    const island = rasterFromRows(['RRR', 'RGR', 'RRR']);
    expect(borderCoordinates(renderBorders(island))).toEqual(['1,1', '2,1', '1,2', '2,2']);
    expect(borderCoordinates(renderDoubleBorders(island))).toEqual(['1,0', '0,1', '1,1', '2,1', '1,2']);
    expect(countBorderPixels(renderDoubleBorders(island, { thick: true }))).toBe(9);
  });

  it('writes the chosen polarity', () => {
    const borders = renderBorders(rasterFromRows(SPLIT), { polarity: { border: 255, background: 0 } });
    expect(Array.from(borders.data)).toEqual([0, 0, 255, 0, 0, 0, 255, 0]);
  });

  it('keeps neighboring borders intact when a region is excluded', () => {
    const raster = rasterFromRows(['RRGG', 'RRGG', 'BBBB', 'BBBB']);
    const provinces = segmentProvinces(raster, fixtureColorTable());
    const borders = renderDoubleBorders(raster);
    const blue = provinces.byId.get(3);
    if (!blue) {
      throw new Error('missing blue province');
    }
    excludeRegions(borders, [blue]);

    expect(borderCoordinates(borders)).toEqual(['1,0', '2,0', '0,1', '1,1', '2,1', '3,1']);
  });

  it('overlays border pixels onto a background', () => {
    const background = createRgbRaster(4, 2, [255, 255, 255]);
    const result = overlayBorders(background, renderBorders(rasterFromRows(SPLIT)), [10, 20, 30]);
    expect(Array.from(result.data.subarray(6, 9))).toEqual([10, 20, 30]);
    expect(Array.from(result.data.subarray(3, 6))).toEqual([255, 255, 255]);
    expect(Array.from(background.data.subarray(6, 9))).toEqual([255, 255, 255]);
  });
});
