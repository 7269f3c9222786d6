import { afterEach, describe, expect, it, vi } from 'vitest';
import { doubleProvinceSet, segmentProvinces } from '../src/provinces/segmenter';
import { getMaskBit } from '../src/raster/mask';
import { colorKey, getColorKey, setRgb } from '../src/raster/raster';
import { fixtureColorTable, rasterFromRows } from './fixtures';

const QUADRANTS = ['RRGG', 'RRGG', 'BBYY', 'BBYY'];

describe('province segmentation', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('finds one province per quadrant with exact bounding boxes', () => {
    const set = segmentProvinces(rasterFromRows(QUADRANTS), fixtureColorTable());

    expect(set.provinces.map((province) => province.id)).toEqual([1, 2, 3, 4]);
    expect(set.byId.get(1)?.boundingBox).toEqual({ left: 0, top: 0, right: 2, bottom: 2 });
    expect(set.byId.get(2)?.boundingBox).toEqual({ left: 2, top: 0, right: 4, bottom: 2 });
    expect(set.byId.get(3)?.boundingBox).toEqual({ left: 0, top: 2, right: 2, bottom: 4 });
    expect(set.byId.get(4)?.boundingBox).toEqual({ left: 2, top: 2, right: 4, bottom: 4 });
  });

  it('keeps its own copy of the province map', () => {
    const raster = rasterFromRows(QUADRANTS);
    const set = segmentProvinces(raster, fixtureColorTable());
    setRgb(raster, 0, 0, [0, 0, 255]);

    expect(set.raster).not.toBe(raster);
    expect(getColorKey(set.raster, 0, 0)).toBe(colorKey(255, 0, 0));
  });

  it('covers every pixel with exactly one mask', () => {
    const set = segmentProvinces(rasterFromRows(QUADRANTS), fixtureColorTable());
    for (let y = 0; y < 4; y += 1) {
      for (let x = 0; x < 4; x += 1) {
        const owners = set.provinces.filter((province) =>
          getMaskBit(province.mask, x - province.boundingBox.left, y - province.boundingBox.top)
        );
        expect(owners).toHaveLength(1);
      }
    }
  });

  it('pads mask rows to whole bytes', () => {
    const set = segmentProvinces(rasterFromRows(['RRRRRRRRRG']), fixtureColorTable());
    const mask = set.byId.get(1)?.mask;
    expect(mask?.width).toBe(9);
    expect(mask?.stride).toBe(2);
    expect(Array.from(mask?.bits ?? [])).toEqual([0xff, 0x80]);
  });

  it('drops colors missing from the color table and warns once', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const set = segmentProvinces(rasterFromRows(['RXR']), fixtureColorTable());

    expect(set.provinces).toHaveLength(1);
    const red = set.byId.get(1);
    expect(red?.boundingBox).toEqual({ left: 0, top: 0, right: 3, bottom: 1 });
    expect(red && getMaskBit(red.mask, 0, 0)).toBe(true);
    expect(red && getMaskBit(red.mask, 1, 0)).toBe(false);
    expect(red && getMaskBit(red.mask, 2, 0)).toBe(true);
    expect(set.unrecognizedColors).toEqual([colorKey(90, 90, 90)]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[ProvinceSegmenter] ignoring 1 unrecognized color(s) covering 1 pixel(s)');
  });

  it('doubles the raster, masks and bounding boxes', () => {
    const doubled = doubleProvinceSet(segmentProvinces(rasterFromRows(QUADRANTS), fixtureColorTable()));
    const yellow = doubled.byId.get(4);

    expect(doubled.scale).toBe(2);
    expect(doubled.raster.width).toBe(8);
    expect(doubled.raster.height).toBe(8);
    expect(yellow?.boundingBox).toEqual({ left: 4, top: 4, right: 8, bottom: 8 });
    expect(yellow?.mask.width).toBe(4);
    expect(yellow && getMaskBit(yellow.mask, 3, 3)).toBe(true);
    expect(() => doubleProvinceSet(doubled)).toThrow('Province set is already doubled');
  });
});
