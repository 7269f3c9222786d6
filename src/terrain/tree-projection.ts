/**
 * Projects the low-resolution tree bitmap onto the terrain grid the way the
 * game places trees when assigning terrain: even rows move half a source
 * pixel left, rows land half a pixel lower, and each upscaled row is pasted
 * only on every other destination row.
 */
import { createIndexedRaster, cropIndexed } from '../raster/raster';
import type { BoundingBox, IndexedRaster, RasterSize } from '../raster/types';

export const NO_TREE_INDEX = 0;

/**
 * Tree indices on the terrain grid. The buffer never leaves the instance;
 * readers get single pixels or copies.
 */
export class TreeProjection {
  readonly width: number;
  readonly height: number;
  readonly sourceWidth: number;
  readonly sourceHeight: number;
  private readonly indices: Uint8Array;

  constructor(projected: IndexedRaster, source: RasterSize) {
    if (projected.data.length !== projected.width * projected.height) {
      throw new Error(`Tree projection buffer holds ${projected.data.length} pixels, expected ${projected.width * projected.height}`);
    }
    this.width = projected.width;
    this.height = projected.height;
    this.sourceWidth = source.width;
    this.sourceHeight = source.height;
    this.indices = Uint8Array.from(projected.data);
    Object.freeze(this);
  }

  indexAt(x: number, y: number): number {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return NO_TREE_INDEX;
    }
    return this.indices[y * this.width + x];
  }

  crop(box: BoundingBox): IndexedRaster {
    return cropIndexed({ width: this.width, height: this.height, data: this.indices }, box, NO_TREE_INDEX);
  }

  toRaster(): IndexedRaster {
    return { width: this.width, height: this.height, data: Uint8Array.from(this.indices) };
  }
}

function projectRow(tree: IndexedRaster, sourceY: number, destWidth: number, xRatio: number): Uint8Array {
  const row = new Uint8Array(destWidth);
  const shift = sourceY % 2 === 0 ? 0.5 : 0;
  for (let sourceX = 0; sourceX < tree.width; sourceX += 1) {
    const index = tree.data[sourceY * tree.width + sourceX];
    if (index === NO_TREE_INDEX) {
      continue;
    }
    const xStart = Math.max(0, Math.floor((sourceX - shift) * xRatio));
    // Exclusive end; the clamp keeps the final column out of reach.
    const xEnd = Math.min(Math.ceil((sourceX + 1 - shift) * xRatio), destWidth - 1);
    if (xEnd > xStart) {
      row.fill(index, xStart, xEnd);
    }
  }
  return row;
}

export function projectTreeLayout(tree: IndexedRaster, target: RasterSize): TreeProjection {
  const projected = createIndexedRaster(target.width, target.height, NO_TREE_INDEX);
  if (tree.width > 0 && tree.height > 0 && target.width > 0 && target.height > 0) {
    const xRatio = target.width / tree.width;
    const yRatio = target.height / tree.height;
    for (let sourceY = 0; sourceY < tree.height; sourceY += 1) {
      const row = projectRow(tree, sourceY, target.width, xRatio);
      const yEnd = Math.floor((sourceY + 0.5) * yRatio);
      const yStart = Math.min(Math.floor((sourceY + 1.5) * yRatio), target.height - 1);
      for (let y = yStart; y >= yEnd; y -= 2) {
        const offset = y * target.width;
        for (let x = 0; x < target.width; x += 1) {
          if (row[x] !== NO_TREE_INDEX) {
            projected.data[offset + x] = row[x];
          }
        }
      }
    }
  }
  return new TreeProjection(projected, tree);
}
