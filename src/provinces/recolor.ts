import {
  renderBorders,
  renderDoubleBorders,
  excludeRegions,
  type BorderRaster,
  type MaskedRegion,
} from '../borders/borders';
import { forEachMaskPixel } from '../raster/mask';
import { cloneRgbRaster, rgbToKey, setRgb } from '../raster/raster';
import type { ColorKey, Rgb, RgbRaster } from '../raster/types';
import type { ProvinceColorTable, ProvinceSet } from './types';

// 'default' keeps the province map color, 'transparent' zeroes alpha (black without alpha).
export type SpecialColor = 'default' | 'shades-of-white' | 'transparent';

export type RecolorTarget = Rgb | SpecialColor;

export type RgbaRaster = {
  rgb: RgbRaster;
  // One byte per pixel, 255 opaque.
  alpha: Uint8Array;
};

export type DoubleBorderRecolorOptions = {
  thick?: boolean;
  filterProvinces?: Iterable<number>;
};

/**
 * Near-white colors in order of growing distance from white, skipping any
 * color that is already taken.
 */
export function* shadesOfWhite(taken: ReadonlySet<ColorKey>): Generator<Rgb, never> {
  for (let maxValue = 0; maxValue < 256; maxValue += 1) {
    for (let r = 0; r <= maxValue; r += 1) {
      for (let g = 0; g <= maxValue; g += 1) {
        for (let b = 0; b <= maxValue; b += 1) {
          if (r !== maxValue && g !== maxValue && b !== maxValue) {
            continue;
          }
          const shade: Rgb = [255 - r, 255 - g, 255 - b];
          if (!taken.has(rgbToKey(shade))) {
            yield shade;
          }
        }
      }
    }
  }
  throw new Error('No unique shade of white available');
}

export class ProvinceRecolor {
  private readonly provinces: ProvinceSet;
  private readonly colorTable: ProvinceColorTable;
  private readonly targets = new Map<number, RecolorTarget>();
  private readonly usedColors = new Set<ColorKey>();

  constructor(provinces: ProvinceSet, colorTable: ProvinceColorTable) {
    this.provinces = provinces;
    this.colorTable = colorTable;
  }

  set(provinceId: number, target: RecolorTarget): void {
    const provinceColor = this.colorTable.colorById.get(provinceId);
    if (!provinceColor) {
      return;
    }
    this.targets.set(provinceId, target);
    if (typeof target !== 'string') {
      this.usedColors.add(rgbToKey(target));
    } else if (target === 'default') {
      this.usedColors.add(rgbToKey(provinceColor));
    }
  }

  generate(fallback: RecolorTarget = 'default'): RgbRaster {
    return this.compile(fallback).rgb;
  }

  generateWithAlpha(fallback: RecolorTarget = 'default'): RgbaRaster {
    return this.compile(fallback);
  }

  generateBorders(fallback: RecolorTarget = 'default'): BorderRaster {
    return renderBorders(this.generate(fallback));
  }

  generateDoubleBorders(
    fallback: RecolorTarget = 'default',
    options: DoubleBorderRecolorOptions = {}
  ): BorderRaster {
    const borders = renderDoubleBorders(this.generate(fallback), { thick: options.thick });
    const filtered: MaskedRegion[] = [];
    for (const provinceId of options.filterProvinces ?? []) {
      const province = this.provinces.byId.get(provinceId);
      if (province) {
        filtered.push(province);
      }
    }
    excludeRegions(borders, filtered);
    return borders;
  }

  private compile(fallback: RecolorTarget): RgbaRaster {
    const rgb = cloneRgbRaster(this.provinces.raster);
    const alpha = new Uint8Array(rgb.width * rgb.height).fill(255);
    const shades = shadesOfWhite(this.usedColors);

    for (const province of this.provinces.provinces) {
      const target = this.targets.get(province.id) ?? fallback;
      if (target === 'default') {
        continue;
      }
      let color: Rgb;
      let opacity = 255;
      if (target === 'transparent') {
        color = [0, 0, 0];
        opacity = 0;
      } else if (target === 'shades-of-white') {
        // keep the shade so later generations reuse it
        color = shades.next().value;
        this.targets.set(province.id, color);
        this.usedColors.add(rgbToKey(color));
      } else {
        color = target;
      }
      const { left, top } = province.boundingBox;
      forEachMaskPixel(province.mask, (x, y) => {
        setRgb(rgb, left + x, top + y, color);
        alpha[(top + y) * rgb.width + left + x] = opacity;
      });
    }
    return { rgb, alpha };
  }
}
