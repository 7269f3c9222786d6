import { DEFAULT_TERRAIN_VOTE_WEIGHTS, type UnmappedIndexPolicy } from '../terrain/classifier';

export type BorderMode = 'single' | 'double';

export type AtlasControls = {
  // Draw borders from a 2x province map, halving their relative width.
  doubleBorderResolution: boolean;
  borderMode: BorderMode;
  thickBorders: boolean;
  // Province ids painted back to "no border" (double mode only).
  excludedBorderProvinces: number[];
  treeVoteWeight: number;
  treeTiebreakOffset: number;
  suppressedTreeIndices: number[];
  unmappedIndexPolicy: UnmappedIndexPolicy;
};

export const DEFAULT_ATLAS_CONTROLS: AtlasControls = {
  doubleBorderResolution: false,
  borderMode: 'double',
  thickBorders: false,
  excludedBorderProvinces: [],
  treeVoteWeight: DEFAULT_TERRAIN_VOTE_WEIGHTS.treeVoteWeight,
  treeTiebreakOffset: DEFAULT_TERRAIN_VOTE_WEIGHTS.treeTiebreakOffset,
  suppressedTreeIndices: [...DEFAULT_TERRAIN_VOTE_WEIGHTS.suppressedTreeIndices],
  unmappedIndexPolicy: 'skip',
};

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function readNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function readBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function readChoice<T extends string>(value: unknown, choices: readonly T[], fallback: T): T {
  return choices.find((choice) => choice === value) ?? fallback;
}

function readIntegerList(value: unknown, fallback: readonly number[], min: number, max: number): number[] {
  if (!Array.isArray(value)) {
    return [...fallback];
  }
  const result: number[] = [];
  for (const entry of value) {
    if (typeof entry === 'number' && Number.isInteger(entry) && entry >= min && entry <= max && !result.includes(entry)) {
      result.push(entry);
    }
  }
  return result;
}

function readRecord(raw: unknown): Record<string, unknown> {
  if (raw && typeof raw === 'object' && !Array.isArray(raw)) {
    return Object.fromEntries(Object.entries(raw));
  }
  return {};
}

export function normalizeAtlasControls(raw: unknown): AtlasControls {
  const source = readRecord(raw);
  const defaults = DEFAULT_ATLAS_CONTROLS;
  return {
    doubleBorderResolution: readBoolean(source.doubleBorderResolution, defaults.doubleBorderResolution),
    borderMode: readChoice(source.borderMode, ['single', 'double'], defaults.borderMode),
    thickBorders: readBoolean(source.thickBorders, defaults.thickBorders),
    excludedBorderProvinces: readIntegerList(
      source.excludedBorderProvinces,
      defaults.excludedBorderProvinces,
      0,
      Number.MAX_SAFE_INTEGER
    ),
    treeVoteWeight: clamp(Math.round(readNumber(source.treeVoteWeight, defaults.treeVoteWeight)), 0, 16),
    treeTiebreakOffset: clamp(Math.round(readNumber(source.treeTiebreakOffset, defaults.treeTiebreakOffset)), 0, 1024),
    suppressedTreeIndices: readIntegerList(source.suppressedTreeIndices, defaults.suppressedTreeIndices, 1, 255),
    unmappedIndexPolicy: readChoice(source.unmappedIndexPolicy, ['skip', 'error'], defaults.unmappedIndexPolicy),
  };
}

export function fingerprintAtlasControls(controls: AtlasControls): string {
  return [
    controls.doubleBorderResolution ? 'x2' : 'x1',
    controls.borderMode,
    controls.thickBorders ? 'thick' : 'thin',
    controls.excludedBorderProvinces.join('.'),
    controls.treeVoteWeight,
    controls.treeTiebreakOffset,
    controls.suppressedTreeIndices.join('.'),
    controls.unmappedIndexPolicy,
  ].join('|');
}
