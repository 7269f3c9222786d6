/**
 * Terrain assignment by weighted voting over the terrain bitmap and the
 * projected tree layer, cropped to one province at a time.
 *
 * Order per province:
 * override -> crop + mask -> river suppression -> trees hide terrain ->
 * drop decorative trees -> tally -> rank -> water/land filter -> fallback.
 */
import { cropIndexed } from '../raster/raster';
import { getMaskBit } from '../raster/mask';
import type { IndexedRaster } from '../raster/types';
import type { Province, ProvinceSet } from '../provinces/types';
import { NO_TREE_INDEX, type TreeProjection } from './tree-projection';
import type {
  TerrainAssignment,
  TerrainCategory,
  TerrainDefinition,
  TerrainLayer,
  TerrainVote,
} from './types';

export const IGNORED_TERRAIN_INDEX = 255;

export type TerrainVoteWeights = {
  terrainVoteWeight: number;
  // Tree votes count double; an empirical factor, not a derived one.
  treeVoteWeight: number;
  // Added to tree indices so terrain-layer ties always rank first.
  treeTiebreakOffset: number;
  // Tree indices that never vote (palms, savanna decoration).
  suppressedTreeIndices: readonly number[];
  // River indices strictly inside (min, max) hide both layers.
  riverSuppressionMin: number;
  riverSuppressionMax: number;
};

export const DEFAULT_TERRAIN_VOTE_WEIGHTS: TerrainVoteWeights = {
  terrainVoteWeight: 1,
  treeVoteWeight: 2,
  treeTiebreakOffset: 255,
  suppressedTreeIndices: [12, 27, 28, 29, 30],
  riverSuppressionMin: 3,
  riverSuppressionMax: 254,
};

export type UnmappedIndexPolicy = 'skip' | 'error';

export type TerrainClassifierContext = {
  definition: TerrainDefinition;
  terrainMap: IndexedRaster;
  // Computed once up front and shared by every classification.
  treeProjection: TreeProjection;
  riverMap: IndexedRaster;
  // Sea and lake province ids.
  waterProvinces: ReadonlySet<number>;
  weights?: TerrainVoteWeights;
  unmappedIndexPolicy?: UnmappedIndexPolicy;
};

export class UnmappedPaletteIndexError extends Error {
  readonly layer: TerrainLayer;
  readonly index: number;
  readonly provinceId: number;

  constructor(layer: TerrainLayer, index: number, provinceId: number) {
    super(`Unmapped ${layer} palette index ${index} in province ${provinceId}`);
    this.name = 'UnmappedPaletteIndexError';
    this.layer = layer;
    this.index = index;
    this.provinceId = provinceId;
  }
}

type ProvinceCrops = {
  terrain: IndexedRaster;
  tree: IndexedRaster;
};

function cropProvinceLayers(province: Province, context: TerrainClassifierContext, weights: TerrainVoteWeights): ProvinceCrops {
  const box = province.boundingBox;
  const terrain = cropIndexed(context.terrainMap, box, IGNORED_TERRAIN_INDEX);
  const tree = context.treeProjection.crop(box);
  const river = cropIndexed(context.riverMap, box, 0);
  const suppressed = new Set(weights.suppressedTreeIndices);

  for (let y = 0; y < terrain.height; y += 1) {
    for (let x = 0; x < terrain.width; x += 1) {
      const offset = y * terrain.width + x;
      if (!getMaskBit(province.mask, x, y)) {
        terrain.data[offset] = IGNORED_TERRAIN_INDEX;
        tree.data[offset] = NO_TREE_INDEX;
        continue;
      }
      const riverIndex = river.data[offset];
      if (riverIndex > weights.riverSuppressionMin && riverIndex < weights.riverSuppressionMax) {
        terrain.data[offset] = IGNORED_TERRAIN_INDEX;
        tree.data[offset] = NO_TREE_INDEX;
        continue;
      }
      if (tree.data[offset] !== NO_TREE_INDEX) {
        // a tree pixel hides the terrain under it even when it is decorative
        terrain.data[offset] = IGNORED_TERRAIN_INDEX;
        if (suppressed.has(tree.data[offset])) {
          tree.data[offset] = NO_TREE_INDEX;
        }
      }
    }
  }
  return { terrain, tree };
}

type Tally = Map<TerrainCategory, { votes: number; tiebreak: number }>;

function tallyLayer(
  tally: Tally,
  crop: IndexedRaster,
  ignored: number,
  index: ReadonlyMap<number, TerrainCategory>,
  weight: number,
  tiebreakOffset: number,
  layer: TerrainLayer,
  provinceId: number,
  policy: UnmappedIndexPolicy
): void {
  const counts = new Uint32Array(256);
  for (let i = 0; i < crop.data.length; i += 1) {
    counts[crop.data[i]] += 1;
  }
  for (let paletteIndex = 0; paletteIndex < counts.length; paletteIndex += 1) {
    const count = counts[paletteIndex];
    if (count === 0 || paletteIndex === ignored) {
      continue;
    }
    const category = index.get(paletteIndex);
    if (!category) {
      if (policy === 'error') {
        throw new UnmappedPaletteIndexError(layer, paletteIndex, provinceId);
      }
      continue;
    }
    const entry = tally.get(category);
    const tiebreak = paletteIndex + tiebreakOffset;
    if (entry) {
      entry.votes += count * weight;
      entry.tiebreak = Math.min(entry.tiebreak, tiebreak);
    } else {
      tally.set(category, { votes: count * weight, tiebreak });
    }
  }
}

export function rankTerrainVotes(province: Province, context: TerrainClassifierContext): TerrainVote[] {
  const weights = context.weights ?? DEFAULT_TERRAIN_VOTE_WEIGHTS;
  const policy = context.unmappedIndexPolicy ?? 'skip';
  const crops = cropProvinceLayers(province, context, weights);
  const tally: Tally = new Map();
  tallyLayer(
    tally,
    crops.terrain,
    IGNORED_TERRAIN_INDEX,
    context.definition.terrainIndex,
    weights.terrainVoteWeight,
    0,
    'terrain',
    province.id,
    policy
  );
  tallyLayer(
    tally,
    crops.tree,
    NO_TREE_INDEX,
    context.definition.treeIndex,
    weights.treeVoteWeight,
    weights.treeTiebreakOffset,
    'tree',
    province.id,
    policy
  );
  const ranking = Array.from(tally, ([category, entry]): TerrainVote => ({
    category,
    votes: entry.votes,
    tiebreak: entry.tiebreak,
  }));
  ranking.sort((a, b) => b.votes - a.votes || a.tiebreak - b.tiebreak);
  return ranking;
}

export function classifyProvinceTerrain(province: Province, context: TerrainClassifierContext): TerrainAssignment {
  const override = context.definition.overrides.get(province.id);
  if (override) {
    return { provinceId: province.id, category: override, source: 'override', ranking: [] };
  }
  const ranking = rankTerrainVotes(province, context);
  const isWaterProvince = context.waterProvinces.has(province.id);
  const winner = ranking.find((vote) => vote.category.isWater === isWaterProvince);
  if (!winner) {
    return { provinceId: province.id, category: context.definition.fallback, source: 'fallback', ranking };
  }
  return { provinceId: province.id, category: winner.category, source: 'vote', ranking };
}

export function classifyAllProvinces(
  provinces: ProvinceSet,
  context: TerrainClassifierContext
): Map<number, TerrainAssignment> {
  if (provinces.scale !== 1) {
    throw new Error('Terrain classification needs the province set at native scale');
  }
  if (
    context.treeProjection.width !== context.terrainMap.width ||
    context.treeProjection.height !== context.terrainMap.height
  ) {
    throw new Error(
      `Tree projection ${context.treeProjection.width}x${context.treeProjection.height} does not match terrain map ${context.terrainMap.width}x${context.terrainMap.height}`
    );
  }
  const assignments = new Map<number, TerrainAssignment>();
  for (const province of provinces.provinces) {
    assignments.set(province.id, classifyProvinceTerrain(province, context));
  }
  return assignments;
}
