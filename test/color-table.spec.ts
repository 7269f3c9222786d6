import { describe, expect, it } from 'vitest';
import { createProvinceColorTable, parseProvinceDefinitionCsv } from '../src/provinces/color-table';
import { colorKey } from '../src/raster/raster';

const DEFINITION = [
  'province;red;green;blue;x;x',
  '1;128;34;64;Uppland;x',
  '2;0;36;128;Gotland;x',
  '3;104o;10;20;Misprint;x',
  '4;;1;2;Broken;x',
  '5;1;2',
  '',
].join('\r\n');

describe('province color table', () => {
  it('reads definition rows and skips malformed ones', () => {
    expect(parseProvinceDefinitionCsv(DEFINITION)).toEqual([
      { id: 1, color: [128, 34, 64] },
      { id: 2, color: [0, 36, 128] },
      { id: 3, color: [104, 10, 20] },
    ]);
  });

  it('maps colors to ids both ways', () => {
    const table = createProvinceColorTable(parseProvinceDefinitionCsv(DEFINITION));
    expect(table.idByColor.get(colorKey(128, 34, 64))).toBe(1);
    expect(table.colorById.get(2)).toEqual([0, 36, 128]);
  });

  it('keeps the mapping bijective when an id is redefined', () => {
    const table = createProvinceColorTable([
      { id: 1, color: [1, 1, 1] },
      { id: 1, color: [2, 2, 2] },
    ]);
    expect(table.colorById.get(1)).toEqual([2, 2, 2]);
    expect(table.idByColor.has(colorKey(1, 1, 1))).toBe(false);
    expect(table.idByColor.get(colorKey(2, 2, 2))).toBe(1);
  });
});
