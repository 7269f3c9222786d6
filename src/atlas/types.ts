import type { BorderRaster } from '../borders/borders';
import type { ProvinceColorTable, ProvinceSet } from '../provinces/types';
import type { IndexedRaster, RgbRaster } from '../raster/types';
import type { TreeProjection } from '../terrain/tree-projection';
import type { TerrainAssignment, TerrainDefinition } from '../terrain/types';
import type { AtlasControls } from './controls';

// Decoded map data; rebuilt as a whole whenever the underlying files change.
export type AtlasInputs = {
  provinceMap: RgbRaster;
  colorTable: ProvinceColorTable;
  terrainDefinition: TerrainDefinition;
  terrainMap: IndexedRaster;
  treeMap: IndexedRaster;
  riverMap: IndexedRaster;
  seaProvinces: readonly number[];
  lakeProvinces: readonly number[];
};

export type AtlasStage = 'provinces' | 'trees' | 'terrain' | 'borders';

export type AtlasDirtyFlags = {
  provinces: boolean;
  trees: boolean;
  terrain: boolean;
  borders: boolean;
};

// Which map inputs differ from the ones a cache was built from.
export type AtlasInputChanges = {
  provinces: boolean;
  trees: boolean;
  terrain: boolean;
};

export type AtlasCache = {
  inputs: AtlasInputs;
  controls: AtlasControls;
  fingerprint: string;
  provinces: ProvinceSet | null;
  trees: TreeProjection | null;
  terrain: ReadonlyMap<number, TerrainAssignment> | null;
  borders: BorderRaster | null;
};

export type AtlasState = {
  provinces: ProvinceSet;
  trees: TreeProjection;
  terrain: ReadonlyMap<number, TerrainAssignment>;
  borders: BorderRaster;
  waterProvinces: ReadonlySet<number>;
  fingerprint: string;
};

export type AtlasIteration = {
  stage: AtlasStage;
  computed: boolean;
  cache: AtlasCache;
};
