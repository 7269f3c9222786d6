/**
 * Atlas build orchestrator.
 * Stages run in order: provinces -> trees -> terrain -> borders.
 * Terrain depends on provinces and trees; borders depend on provinces only.
 */
import { excludeRegions, renderBorders, renderDoubleBorders, type BorderRaster, type MaskedRegion } from '../borders/borders';
import { doubleProvinceSet, segmentProvinces } from '../provinces/segmenter';
import type { ProvinceSet } from '../provinces/types';
import { classifyAllProvinces, DEFAULT_TERRAIN_VOTE_WEIGHTS } from '../terrain/classifier';
import { projectTreeLayout } from '../terrain/tree-projection';
import { fingerprintAtlasControls, type AtlasControls } from './controls';
import type {
  AtlasCache,
  AtlasDirtyFlags,
  AtlasInputChanges,
  AtlasInputs,
  AtlasIteration,
  AtlasStage,
  AtlasState,
} from './types';

const NO_INPUT_CHANGES: AtlasInputChanges = { provinces: false, trees: false, terrain: false };

function stageRank(stage: AtlasStage): number {
  switch (stage) {
    case 'provinces':
      return 1;
    case 'trees':
      return 2;
    case 'terrain':
      return 3;
    case 'borders':
      return 4;
    default:
      return 4;
  }
}

function defaultDirtyFlags(): AtlasDirtyFlags {
  return {
    provinces: true,
    trees: true,
    terrain: true,
    borders: true,
  };
}

function cloneCache(cache: AtlasCache): AtlasCache {
  return {
    ...cache,
    controls: { ...cache.controls },
  };
}

function sameList(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

export function collectWaterProvinces(inputs: AtlasInputs): Set<number> {
  return new Set([...inputs.seaProvinces, ...inputs.lakeProvinces]);
}

// Inputs are compared by identity; decoded map data is replaced, never edited.
export function diffAtlasInputs(prev: AtlasInputs, next: AtlasInputs): AtlasInputChanges {
  return {
    provinces: prev.provinceMap !== next.provinceMap || prev.colorTable !== next.colorTable,
    trees: prev.treeMap !== next.treeMap || prev.terrainMap !== next.terrainMap,
    terrain:
      prev.terrainDefinition !== next.terrainDefinition ||
      prev.terrainMap !== next.terrainMap ||
      prev.riverMap !== next.riverMap ||
      !sameList(prev.seaProvinces, next.seaProvinces) ||
      !sameList(prev.lakeProvinces, next.lakeProvinces),
  };
}

export function computeAtlasDirty(
  prev: AtlasControls,
  next: AtlasControls,
  changes: AtlasInputChanges = NO_INPUT_CHANGES
): AtlasDirtyFlags {
  const votingChanged =
    prev.treeVoteWeight !== next.treeVoteWeight ||
    prev.treeTiebreakOffset !== next.treeTiebreakOffset ||
    prev.unmappedIndexPolicy !== next.unmappedIndexPolicy ||
    !sameList(prev.suppressedTreeIndices, next.suppressedTreeIndices);
  const bordersChanged =
    prev.doubleBorderResolution !== next.doubleBorderResolution ||
    prev.borderMode !== next.borderMode ||
    prev.thickBorders !== next.thickBorders ||
    !sameList(prev.excludedBorderProvinces, next.excludedBorderProvinces);

  // Province segmentation and tree projection depend on the inputs alone.
  const provinces = changes.provinces;
  const trees = changes.trees;
  const terrain = provinces || trees || changes.terrain || votingChanged;
  const borders = provinces || bordersChanged;

  return {
    provinces,
    trees,
    terrain,
    borders,
  };
}

function synthesizeBorders(provinces: ProvinceSet, controls: AtlasControls): BorderRaster {
  const source = controls.doubleBorderResolution ? doubleProvinceSet(provinces) : provinces;
  if (controls.borderMode === 'single') {
    if (controls.excludedBorderProvinces.length > 0) {
      throw new Error('Excluding provinces from borders requires double border mode');
    }
    return renderBorders(source.raster);
  }
  const borders = renderDoubleBorders(source.raster, { thick: controls.thickBorders });
  const excluded: MaskedRegion[] = [];
  for (const provinceId of controls.excludedBorderProvinces) {
    const province = source.byId.get(provinceId);
    if (province) {
      excluded.push(province);
    }
  }
  excludeRegions(borders, excluded);
  return borders;
}

// Caller-supplied flags may widen the rebuild but never skip a stage whose inputs changed.
function resolveDirtyFlags(args: {
  inputs: AtlasInputs;
  controls: AtlasControls;
  previous?: AtlasCache | null;
  dirty?: AtlasDirtyFlags;
}): AtlasDirtyFlags {
  const { inputs, controls, previous, dirty } = args;
  if (!previous) {
    return dirty ?? defaultDirtyFlags();
  }
  const required = computeAtlasDirty(previous.controls, controls, diffAtlasInputs(previous.inputs, inputs));
  if (!dirty) {
    return required;
  }
  return {
    provinces: dirty.provinces || required.provinces,
    trees: dirty.trees || required.trees,
    terrain: dirty.terrain || required.terrain,
    borders: dirty.borders || required.borders,
  };
}

export function* iterateAtlasBuild(args: {
  inputs: AtlasInputs;
  controls: AtlasControls;
  previous?: AtlasCache | null;
  dirty?: AtlasDirtyFlags;
  stopAfter?: AtlasStage;
}): Generator<AtlasIteration, AtlasCache> {
  const { inputs, controls, previous, stopAfter = 'borders' } = args;
  const dirty = resolveDirtyFlags(args);
  const cache: AtlasCache = previous
    ? {
        ...cloneCache(previous),
        inputs,
        controls: { ...controls },
        fingerprint: fingerprintAtlasControls(controls),
      }
    : {
        inputs,
        controls: { ...controls },
        fingerprint: fingerprintAtlasControls(controls),
        provinces: null,
        trees: null,
        terrain: null,
        borders: null,
      };
  const stopRank = stageRank(stopAfter);

  if (dirty.provinces || !cache.provinces) {
    cache.provinces = segmentProvinces(inputs.provinceMap, inputs.colorTable);
    cache.terrain = null;
    cache.borders = null;
    yield { stage: 'provinces', computed: true, cache: cloneCache(cache) };
  } else {
    yield { stage: 'provinces', computed: false, cache: cloneCache(cache) };
  }
  if (stopRank <= stageRank('provinces')) {
    return cache;
  }

  if (dirty.trees || !cache.trees) {
    // Projected once here; every classification below shares the frozen result.
    cache.trees = projectTreeLayout(inputs.treeMap, inputs.terrainMap);
    cache.terrain = null;
    yield { stage: 'trees', computed: true, cache: cloneCache(cache) };
  } else {
    yield { stage: 'trees', computed: false, cache: cloneCache(cache) };
  }
  if (stopRank <= stageRank('trees')) {
    return cache;
  }

  if (dirty.terrain || !cache.terrain) {
    cache.terrain = classifyAllProvinces(cache.provinces, {
      definition: inputs.terrainDefinition,
      terrainMap: inputs.terrainMap,
      treeProjection: cache.trees,
      riverMap: inputs.riverMap,
      waterProvinces: collectWaterProvinces(inputs),
      weights: {
        ...DEFAULT_TERRAIN_VOTE_WEIGHTS,
        treeVoteWeight: controls.treeVoteWeight,
        treeTiebreakOffset: controls.treeTiebreakOffset,
        suppressedTreeIndices: controls.suppressedTreeIndices,
      },
      unmappedIndexPolicy: controls.unmappedIndexPolicy,
    });
    yield { stage: 'terrain', computed: true, cache: cloneCache(cache) };
  } else {
    yield { stage: 'terrain', computed: false, cache: cloneCache(cache) };
  }
  if (stopRank <= stageRank('terrain')) {
    return cache;
  }

  if (dirty.borders || !cache.borders) {
    cache.borders = synthesizeBorders(cache.provinces, controls);
    yield { stage: 'borders', computed: true, cache: cloneCache(cache) };
  } else {
    yield { stage: 'borders', computed: false, cache: cloneCache(cache) };
  }

  return cache;
}

export function buildAtlas(args: {
  inputs: AtlasInputs;
  controls: AtlasControls;
  previous?: AtlasCache | null;
  dirty?: AtlasDirtyFlags;
  stopAfter?: AtlasStage;
}): AtlasCache {
  const iterator = iterateAtlasBuild(args);
  let step = iterator.next();
  while (!step.done) {
    step = iterator.next();
  }
  return step.value;
}

export function toAtlasState(cache: AtlasCache): AtlasState {
  if (!cache.provinces || !cache.trees || !cache.terrain || !cache.borders) {
    throw new Error('Atlas cache is incomplete');
  }
  return {
    provinces: cache.provinces,
    trees: cache.trees,
    terrain: cache.terrain,
    borders: cache.borders,
    waterProvinces: collectWaterProvinces(cache.inputs),
    fingerprint: cache.fingerprint,
  };
}
