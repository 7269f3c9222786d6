import { afterEach, describe, expect, it, vi } from 'vitest';
import { isBorderPixel, countBorderPixels } from '../src/borders/borders';
import { ProvinceRecolor, shadesOfWhite } from '../src/provinces/recolor';
import { segmentProvinces } from '../src/provinces/segmenter';
import { getRgb } from '../src/raster/raster';
import { fixtureColorTable, GREY, GREEN, rasterFromRows } from './fixtures';

function recolorOf(rows: string[]): ProvinceRecolor {
  const table = fixtureColorTable();
  return new ProvinceRecolor(segmentProvinces(rasterFromRows(rows), table), table);
}

describe('province recolor', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('recolors assigned provinces and leaves the rest', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const recolor = recolorOf(['RGX']);
    recolor.set(1, [10, 20, 30]);
    recolor.set(99, [1, 2, 3]);
    const raster = recolor.generate();

    expect(getRgb(raster, 0, 0)).toEqual([10, 20, 30]);
    expect(getRgb(raster, 1, 0)).toEqual(GREEN);
    expect(getRgb(raster, 2, 0)).toEqual(GREY);
  });

  it('applies the fallback to provinces without a target', () => {
    const recolor = recolorOf(['RG']);
    recolor.set(1, 'default');
    const raster = recolor.generate([7, 7, 7]);
    expect(getRgb(raster, 0, 0)).toEqual([255, 0, 0]);
    expect(getRgb(raster, 1, 0)).toEqual([7, 7, 7]);
  });

  it('clears alpha for transparent provinces', () => {
    const recolor = recolorOf(['RG']);
    recolor.set(2, 'transparent');
    const { rgb, alpha } = recolor.generateWithAlpha();
    expect(Array.from(alpha)).toEqual([255, 0]);
    expect(getRgb(rgb, 1, 0)).toEqual([0, 0, 0]);
  });

  it('hands out unique shades of white and keeps them', () => {
    const recolor = recolorOf(['RGB']);
    recolor.set(1, [255, 255, 255]);
    const first = recolor.generate('shades-of-white');
    expect(getRgb(first, 0, 0)).toEqual([255, 255, 255]);
    expect(getRgb(first, 1, 0)).toEqual([255, 255, 254]);
    expect(getRgb(first, 2, 0)).toEqual([255, 254, 255]);

    const second = recolor.generate('shades-of-white');
    expect(getRgb(second, 1, 0)).toEqual([255, 255, 254]);
  });

  it('filters provinces out of double borders', () => {
    const recolor = recolorOf(['RRGG', 'RRGG', 'BBBB', 'BBBB']);
    const borders = recolor.generateDoubleBorders('default', { filterProvinces: [3, 42] });
    expect(countBorderPixels(borders)).toBe(6);
    expect(isBorderPixel(borders, 1, 0)).toBe(true);
    expect(isBorderPixel(borders, 0, 2)).toBe(false);
  });

  it('merges same-colored provinces before drawing borders', () => {
    const recolor = recolorOf(['RRGG', 'RRGG']);
    recolor.set(1, [9, 9, 9]);
    recolor.set(2, [9, 9, 9]);
    expect(countBorderPixels(recolor.generateBorders())).toBe(0);
  });
});

describe('shades of white', () => {
  it('walks away from white one step at a time', () => {
    const shades = shadesOfWhite(new Set());
    expect([shades.next().value, shades.next().value, shades.next().value, shades.next().value]).toEqual([
      [255, 255, 255],
      [255, 255, 254],
      [255, 254, 255],
      [255, 254, 254],
    ]);
  });
});
