import type { BitMask } from './types';

export function maskStride(width: number): number {
  // Round the row up to whole bytes so every row starts byte-aligned.
  return Math.ceil(width / 8);
}

export function createBitMask(width: number, height: number): BitMask {
  const stride = maskStride(width);
  return { width, height, stride, bits: new Uint8Array(stride * height) };
}

export function getMaskBit(mask: BitMask, x: number, y: number): boolean {
  if (x < 0 || y < 0 || x >= mask.width || y >= mask.height) {
    return false;
  }
  const byte = mask.bits[y * mask.stride + (x >> 3)];
  return (byte & (0x80 >> (x & 7))) !== 0;
}

export function setMaskBit(mask: BitMask, x: number, y: number): void {
  mask.bits[y * mask.stride + (x >> 3)] |= 0x80 >> (x & 7);
}

export function countMaskPixels(mask: BitMask): number {
  let count = 0;
  for (let y = 0; y < mask.height; y += 1) {
    for (let x = 0; x < mask.width; x += 1) {
      if (getMaskBit(mask, x, y)) {
        count += 1;
      }
    }
  }
  return count;
}

/**
 * Visits every set pixel in row-major order, in mask-local coordinates.
 */
export function forEachMaskPixel(mask: BitMask, visit: (x: number, y: number) => void): void {
  for (let y = 0; y < mask.height; y += 1) {
    const row = y * mask.stride;
    for (let x = 0; x < mask.width; x += 1) {
      if ((mask.bits[row + (x >> 3)] & (0x80 >> (x & 7))) !== 0) {
        visit(x, y);
      }
    }
  }
}

export function doubleMask(mask: BitMask): BitMask {
  const doubled = createBitMask(mask.width * 2, mask.height * 2);
  forEachMaskPixel(mask, (x, y) => {
    setMaskBit(doubled, x * 2, y * 2);
    setMaskBit(doubled, x * 2 + 1, y * 2);
    setMaskBit(doubled, x * 2, y * 2 + 1);
    setMaskBit(doubled, x * 2 + 1, y * 2 + 1);
  });
  return doubled;
}
