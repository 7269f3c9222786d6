import type { Rgb } from '../raster/types';

export const TERRAIN_GAMEPLAY_TYPES = [
  'pti',
  'plains',
  'forest',
  'hills',
  'mountains',
  'jungle',
  'marsh',
  'desert',
] as const;

export const TERRAIN_SOUND_TYPES = ['plains', 'forest', 'desert', 'sea', 'jungle', 'mountains'] as const;

export type TerrainGameplayType = (typeof TERRAIN_GAMEPLAY_TYPES)[number];
export type TerrainSoundType = (typeof TERRAIN_SOUND_TYPES)[number];

// An unrecognized script value stays visible as `unknown` instead of collapsing into `absent`.
export type DeclaredValue<T extends string> =
  | { kind: 'absent' }
  | { kind: 'known'; value: T }
  | { kind: 'unknown'; raw: string };

export type TerrainCategory = {
  name: string;
  displayColor: Rgb;
  gameplayType: DeclaredValue<TerrainGameplayType>;
  soundType: DeclaredValue<TerrainSoundType>;
  isWater: boolean;
  isInlandSea: boolean;
  overrideProvinceIds: ReadonlySet<number>;
};

export type TerrainDefinition = {
  // Declaration order.
  categories: readonly TerrainCategory[];
  terrainIndex: ReadonlyMap<number, TerrainCategory>;
  treeIndex: ReadonlyMap<number, TerrainCategory>;
  overrides: ReadonlyMap<number, TerrainCategory>;
  // Assigned when nothing else qualifies.
  fallback: TerrainCategory;
};

export type TerrainLayer = 'terrain' | 'tree';

export type TerrainVote = {
  category: TerrainCategory;
  votes: number;
  // Lowest palette index seen; tree indices carry the tiebreak offset.
  tiebreak: number;
};

export type TerrainAssignmentSource = 'override' | 'vote' | 'fallback';

export type TerrainAssignment = {
  provinceId: number;
  category: TerrainCategory;
  source: TerrainAssignmentSource;
  // Candidates in decision order; empty for overrides.
  ranking: readonly TerrainVote[];
};
