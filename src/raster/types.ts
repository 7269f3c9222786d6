export type Rgb = readonly [number, number, number];

// Packed 24-bit color key, (r << 16) | (g << 8) | b.
export type ColorKey = number;

// Left/top inclusive, right/bottom exclusive.
export type BoundingBox = {
  left: number;
  top: number;
  right: number;
  bottom: number;
};

export type RasterSize = {
  width: number;
  height: number;
};

export type RgbRaster = RasterSize & {
  // Three bytes per pixel, row-major.
  data: Uint8Array;
};

export type IndexedRaster = RasterSize & {
  // One palette index per pixel, row-major.
  data: Uint8Array;
};

export type GrayRaster = IndexedRaster;

export type BitMask = RasterSize & {
  // Bytes per row; the row width is padded up to a multiple of 8 bits.
  stride: number;
  // MSB-first within each byte.
  bits: Uint8Array;
};
