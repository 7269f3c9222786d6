import type { Rgb } from '../raster/types';
import {
  TERRAIN_GAMEPLAY_TYPES,
  TERRAIN_SOUND_TYPES,
  type DeclaredValue,
  type TerrainCategory,
  type TerrainDefinition,
} from './types';

/**
 * Terrain script contents as handed over by the script reader. Keys keep the
 * script's own spelling.
 */
export type TerrainCategoryDeclaration = {
  name: string;
  color?: readonly number[];
  type?: string;
  sound_type?: string;
  is_water?: boolean;
  inland_sea?: boolean;
  terrain_override?: readonly number[];
};

export type TerrainIndexDeclaration = {
  // Category name.
  type: string;
  color: readonly number[];
};

export type TreeIndexDeclaration = {
  // Category name.
  terrain: string;
  color: readonly number[];
};

export type TerrainDefinitionSource = {
  categories: readonly TerrainCategoryDeclaration[];
  terrain?: readonly TerrainIndexDeclaration[];
  tree?: readonly TreeIndexDeclaration[];
};

export type TerrainDefinitionOptions = {
  fallbackCategory?: string;
};

export class TerrainDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TerrainDefinitionError';
  }
}

const DEFAULT_DISPLAY_COLOR: Rgb = [255, 255, 255];

function readDeclared<T extends string>(raw: string | undefined, known: readonly T[]): DeclaredValue<T> {
  if (raw === undefined || raw === '') {
    return { kind: 'absent' };
  }
  const value = known.find((entry) => entry === raw);
  return value === undefined ? { kind: 'unknown', raw } : { kind: 'known', value };
}

function readDisplayColor(color: readonly number[] | undefined, name: string): Rgb {
  if (!color) {
    return DEFAULT_DISPLAY_COLOR;
  }
  if (color.length !== 3 || color.some((channel) => !Number.isInteger(channel) || channel < 0 || channel > 255)) {
    throw new TerrainDefinitionError(`Terrain category "${name}" has an invalid color [${color.join(', ')}]`);
  }
  return [color[0], color[1], color[2]];
}

function toCategory(declaration: TerrainCategoryDeclaration): TerrainCategory {
  return {
    name: declaration.name,
    displayColor: readDisplayColor(declaration.color, declaration.name),
    gameplayType: readDeclared(declaration.type, TERRAIN_GAMEPLAY_TYPES),
    soundType: readDeclared(declaration.sound_type, TERRAIN_SOUND_TYPES),
    isWater: declaration.is_water ?? false,
    isInlandSea: declaration.inland_sea ?? false,
    overrideProvinceIds: new Set(declaration.terrain_override ?? []),
  };
}

function mapIndices(
  target: Map<number, TerrainCategory>,
  indices: readonly number[],
  categoryName: string,
  categories: ReadonlyMap<string, TerrainCategory>,
  layer: string
): void {
  const category = categories.get(categoryName);
  if (!category) {
    throw new TerrainDefinitionError(`${layer} entry references undeclared terrain category "${categoryName}"`);
  }
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 0 || index > 255) {
      throw new TerrainDefinitionError(`${layer} entry for "${categoryName}" has invalid palette index ${index}`);
    }
    target.set(index, category);
  }
}

export function buildTerrainDefinition(
  source: TerrainDefinitionSource,
  options: TerrainDefinitionOptions = {}
): TerrainDefinition {
  const fallbackName = options.fallbackCategory ?? 'pti';
  const categories: TerrainCategory[] = [];
  const byName = new Map<string, TerrainCategory>();
  const overrides = new Map<number, TerrainCategory>();

  for (const declaration of source.categories) {
    const category = toCategory(declaration);
    categories.push(category);
    byName.set(category.name, category);
    for (const provinceId of category.overrideProvinceIds) {
      // first declared category keeps the province
      if (!overrides.has(provinceId)) {
        overrides.set(provinceId, category);
      }
    }
  }

  const fallback = byName.get(fallbackName);
  if (!fallback) {
    throw new TerrainDefinitionError(`Fallback terrain category "${fallbackName}" is not declared`);
  }

  const terrainIndex = new Map<number, TerrainCategory>();
  for (const entry of source.terrain ?? []) {
    mapIndices(terrainIndex, entry.color, entry.type, byName, 'Terrain');
  }
  const treeIndex = new Map<number, TerrainCategory>();
  for (const entry of source.tree ?? []) {
    mapIndices(treeIndex, entry.color, entry.terrain, byName, 'Tree');
  }

  return { categories, terrainIndex, treeIndex, overrides, fallback };
}

export type UnknownTerrainType = {
  category: string;
  field: 'type' | 'sound_type';
  raw: string;
};

export function collectUnknownTerrainTypes(definition: TerrainDefinition): UnknownTerrainType[] {
  const unknown: UnknownTerrainType[] = [];
  for (const category of definition.categories) {
    if (category.gameplayType.kind === 'unknown') {
      unknown.push({ category: category.name, field: 'type', raw: category.gameplayType.raw });
    }
    if (category.soundType.kind === 'unknown') {
      unknown.push({ category: category.name, field: 'sound_type', raw: category.soundType.raw });
    }
  }
  return unknown;
}
