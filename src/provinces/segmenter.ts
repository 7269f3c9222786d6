/**
 * Province segmentation: one linear scan groups pixel coordinates by exact
 * color, then every color with a province id becomes a cropped bit mask.
 */
import { cloneRgbRaster, getColorKey, keyToRgb, resizeRgbNearest2x, scaleBoundingBox } from '../raster/raster';
import { createBitMask, doubleMask, setMaskBit } from '../raster/mask';
import type { BitMask, BoundingBox, ColorKey, RgbRaster } from '../raster/types';
import type { Province, ProvinceColorTable, ProvinceSet } from './types';

type CoordinateList = {
  xs: number[];
  ys: number[];
};

function groupPixelsByColor(raster: RgbRaster): Map<ColorKey, CoordinateList> {
  const groups = new Map<ColorKey, CoordinateList>();
  for (let y = 0; y < raster.height; y += 1) {
    for (let x = 0; x < raster.width; x += 1) {
      const key = getColorKey(raster, x, y);
      let group = groups.get(key);
      if (!group) {
        group = { xs: [], ys: [] };
        groups.set(key, group);
      }
      group.xs.push(x);
      group.ys.push(y);
    }
  }
  return groups;
}

function buildMask(coordinates: CoordinateList): { mask: BitMask; boundingBox: BoundingBox } {
  const { xs, ys } = coordinates;
  let left = Infinity;
  let top = Infinity;
  let right = -Infinity;
  let bottom = -Infinity;
  for (let i = 0; i < xs.length; i += 1) {
    left = Math.min(left, xs[i]);
    top = Math.min(top, ys[i]);
    right = Math.max(right, xs[i] + 1);
    bottom = Math.max(bottom, ys[i] + 1);
  }
  const mask = createBitMask(right - left, bottom - top);
  for (let i = 0; i < xs.length; i += 1) {
    setMaskBit(mask, xs[i] - left, ys[i] - top);
  }
  return { mask, boundingBox: { left, top, right, bottom } };
}

export function segmentProvinces(raster: RgbRaster, colorTable: ProvinceColorTable): ProvinceSet {
  const groups = groupPixelsByColor(raster);
  const provinces: Province[] = [];
  const byId = new Map<number, Province>();
  const unrecognizedColors: ColorKey[] = [];
  let unrecognizedPixels = 0;

  for (const [key, coordinates] of groups) {
    const id = colorTable.idByColor.get(key);
    if (id === undefined) {
      unrecognizedColors.push(key);
      unrecognizedPixels += coordinates.xs.length;
      continue;
    }
    const { mask, boundingBox } = buildMask(coordinates);
    const province: Province = { id, color: keyToRgb(key), mask, boundingBox };
    provinces.push(province);
    byId.set(id, province);
  }

  if (unrecognizedColors.length > 0) {
    console.warn(
      `[ProvinceSegmenter] ignoring ${unrecognizedColors.length} unrecognized color(s) covering ${unrecognizedPixels} pixel(s)`
    );
  }

  return { raster: cloneRgbRaster(raster), provinces, byId, unrecognizedColors, scale: 1 };
}

/**
 * Nearest-neighbor 2x upscale of the raster and every mask. Borders drawn
 * from the doubled set are half as thick relative to each province.
 */
export function doubleProvinceSet(set: ProvinceSet): ProvinceSet {
  if (set.scale === 2) {
    throw new Error('Province set is already doubled');
  }
  const provinces = set.provinces.map(
    (province): Province => ({
      id: province.id,
      color: province.color,
      mask: doubleMask(province.mask),
      boundingBox: scaleBoundingBox(province.boundingBox, 2),
    })
  );
  return {
    raster: resizeRgbNearest2x(set.raster),
    provinces,
    byId: new Map(provinces.map((province) => [province.id, province])),
    unrecognizedColors: set.unrecognizedColors,
    scale: 2,
  };
}
