import type { TerrainCategory, TerrainDefinition } from './types';

/**
 * Land categories worth a legend row: anything reachable from a palette index
 * that is actually used, plus every category with manual overrides.
 */
export function collectLegendTerrains(
  definition: TerrainDefinition,
  terrainUsage: ReadonlyMap<number, number>,
  treeUsage: ReadonlyMap<number, number>
): TerrainCategory[] {
  const used = new Set<TerrainCategory>();
  for (const index of terrainUsage.keys()) {
    const category = definition.terrainIndex.get(index);
    if (category) {
      used.add(category);
    }
  }
  for (const index of treeUsage.keys()) {
    const category = definition.treeIndex.get(index);
    if (category) {
      used.add(category);
    }
  }
  return definition.categories.filter(
    (category) => !category.isWater && (used.has(category) || category.overrideProvinceIds.size > 0)
  );
}
