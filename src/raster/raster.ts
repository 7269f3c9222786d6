import type { BoundingBox, ColorKey, IndexedRaster, RasterSize, Rgb, RgbRaster } from './types';

export function colorKey(r: number, g: number, b: number): ColorKey {
  return ((r & 0xff) << 16) | ((g & 0xff) << 8) | (b & 0xff);
}

export function rgbToKey(color: Rgb): ColorKey {
  return colorKey(color[0], color[1], color[2]);
}

export function keyToRgb(key: ColorKey): Rgb {
  return [(key >> 16) & 0xff, (key >> 8) & 0xff, key & 0xff];
}

function assertSize(size: RasterSize): void {
  if (!Number.isInteger(size.width) || !Number.isInteger(size.height) || size.width < 0 || size.height < 0) {
    throw new Error(`Invalid raster size ${size.width}x${size.height}`);
  }
}

export function createRgbRaster(width: number, height: number, fill: Rgb = [0, 0, 0]): RgbRaster {
  assertSize({ width, height });
  const data = new Uint8Array(width * height * 3);
  if (fill[0] !== 0 || fill[1] !== 0 || fill[2] !== 0) {
    for (let offset = 0; offset < data.length; offset += 3) {
      data[offset] = fill[0];
      data[offset + 1] = fill[1];
      data[offset + 2] = fill[2];
    }
  }
  return { width, height, data };
}

export function createIndexedRaster(width: number, height: number, fill = 0): IndexedRaster {
  assertSize({ width, height });
  const data = new Uint8Array(width * height);
  if (fill !== 0) {
    data.fill(fill);
  }
  return { width, height, data };
}

export function getRgb(raster: RgbRaster, x: number, y: number): Rgb {
  const offset = (y * raster.width + x) * 3;
  return [raster.data[offset], raster.data[offset + 1], raster.data[offset + 2]];
}

export function setRgb(raster: RgbRaster, x: number, y: number, color: Rgb): void {
  const offset = (y * raster.width + x) * 3;
  raster.data[offset] = color[0];
  raster.data[offset + 1] = color[1];
  raster.data[offset + 2] = color[2];
}

export function getColorKey(raster: RgbRaster, x: number, y: number): ColorKey {
  const offset = (y * raster.width + x) * 3;
  return colorKey(raster.data[offset], raster.data[offset + 1], raster.data[offset + 2]);
}

export function fillRgbRect(raster: RgbRaster, box: BoundingBox, color: Rgb): void {
  for (let y = Math.max(0, box.top); y < Math.min(raster.height, box.bottom); y += 1) {
    for (let x = Math.max(0, box.left); x < Math.min(raster.width, box.right); x += 1) {
      setRgb(raster, x, y, color);
    }
  }
}

export function getIndex(raster: IndexedRaster, x: number, y: number): number {
  return raster.data[y * raster.width + x];
}

export function setIndex(raster: IndexedRaster, x: number, y: number, index: number): void {
  raster.data[y * raster.width + x] = index;
}

/**
 * Palette usage enumeration: index -> pixel count, in ascending index order.
 */
export function paletteUsage(raster: IndexedRaster): Map<number, number> {
  const counts = new Uint32Array(256);
  for (let i = 0; i < raster.data.length; i += 1) {
    counts[raster.data[i]] += 1;
  }
  const usage = new Map<number, number>();
  for (let index = 0; index < counts.length; index += 1) {
    if (counts[index] > 0) {
      usage.set(index, counts[index]);
    }
  }
  return usage;
}

/**
 * Copies the box out of the raster. Pixels of the box that lie outside the
 * raster take `fill`.
 */
export function cropIndexed(raster: IndexedRaster, box: BoundingBox, fill: number): IndexedRaster {
  const width = box.right - box.left;
  const height = box.bottom - box.top;
  const crop = createIndexedRaster(width, height, fill);
  for (let y = 0; y < height; y += 1) {
    const sourceY = box.top + y;
    if (sourceY < 0 || sourceY >= raster.height) {
      continue;
    }
    for (let x = 0; x < width; x += 1) {
      const sourceX = box.left + x;
      if (sourceX < 0 || sourceX >= raster.width) {
        continue;
      }
      crop.data[y * width + x] = raster.data[sourceY * raster.width + sourceX];
    }
  }
  return crop;
}

export function cloneRgbRaster(raster: RgbRaster): RgbRaster {
  return { width: raster.width, height: raster.height, data: raster.data.slice() };
}

export function resizeRgbNearest2x(raster: RgbRaster): RgbRaster {
  const doubled = createRgbRaster(raster.width * 2, raster.height * 2);
  for (let y = 0; y < doubled.height; y += 1) {
    for (let x = 0; x < doubled.width; x += 1) {
      const source = ((y >> 1) * raster.width + (x >> 1)) * 3;
      const target = (y * doubled.width + x) * 3;
      doubled.data[target] = raster.data[source];
      doubled.data[target + 1] = raster.data[source + 1];
      doubled.data[target + 2] = raster.data[source + 2];
    }
  }
  return doubled;
}

export function boundingBoxSize(box: BoundingBox): RasterSize {
  return { width: box.right - box.left, height: box.bottom - box.top };
}

export function scaleBoundingBox(box: BoundingBox, factor: number): BoundingBox {
  return {
    left: box.left * factor,
    top: box.top * factor,
    right: box.right * factor,
    bottom: box.bottom * factor,
  };
}
