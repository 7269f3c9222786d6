import { keyToRgb, rgbToKey } from '../raster/raster';
import type { ColorKey, Rgb } from '../raster/types';
import type { ProvinceColorTable } from './types';

export type ProvinceColorEntry = {
  id: number;
  color: Rgb;
};

export function createProvinceColorTable(entries: Iterable<ProvinceColorEntry>): ProvinceColorTable {
  const colorById = new Map<number, Rgb>();
  const idByColor = new Map<ColorKey, number>();
  for (const entry of entries) {
    const key = rgbToKey(entry.color);
    const previousColor = colorById.get(entry.id);
    if (previousColor) {
      idByColor.delete(rgbToKey(previousColor));
    }
    const previousId = idByColor.get(key);
    if (previousId !== undefined) {
      colorById.delete(previousId);
    }
    colorById.set(entry.id, keyToRgb(key));
    idByColor.set(key, entry.id);
  }
  return { colorById, idByColor };
}

// The game's own reader drops trailing non-digits from color fields ("104o" reads as 104).
function parseLenientInt(raw: string): number | null {
  const value = raw.trim();
  if (/^-?\d+$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  const match = /^(-?\d+)\D+$/.exec(value);
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * Reads a semicolon separated province definition file
 * (`province;red;green;blue;name;x`).
 */
export function parseProvinceDefinitionCsv(text: string): ProvinceColorEntry[] {
  const entries: ProvinceColorEntry[] = [];
  for (const line of text.split(/\r?\n/)) {
    const fields = line.split(';');
    if (fields.length < 5) {
      continue;
    }
    const [rawId, rawRed, rawGreen, rawBlue] = fields;
    if (!rawId.trim() || !rawRed.trim() || !rawGreen.trim() || !rawBlue.trim()) {
      continue;
    }
    if (!/^\d+$/.test(rawId.trim())) {
      // header row
      continue;
    }
    const red = parseLenientInt(rawRed);
    const green = parseLenientInt(rawGreen);
    const blue = parseLenientInt(rawBlue);
    if (red === null || green === null || blue === null) {
      continue;
    }
    entries.push({ id: Number.parseInt(rawId.trim(), 10), color: [red, green, blue] });
  }
  return entries;
}
