import type { BitMask, BoundingBox, ColorKey, Rgb, RgbRaster } from '../raster/types';

export type Province = {
  id: number;
  color: Rgb;
  // Cropped to boundingBox.
  mask: BitMask;
  boundingBox: BoundingBox;
};

export type ProvinceColorTable = {
  colorById: ReadonlyMap<number, Rgb>;
  idByColor: ReadonlyMap<ColorKey, number>;
};

export type ProvinceSet = {
  // Source raster the masks were cut from (doubled along with them).
  raster: RgbRaster;
  // Province ids in order of first pixel appearance.
  provinces: readonly Province[];
  byId: ReadonlyMap<number, Province>;
  // Distinct colors found in the raster without a province id.
  unrecognizedColors: readonly ColorKey[];
  scale: 1 | 2;
};
