export * from './raster/types';
export * from './raster/raster';
export * from './raster/mask';
export * from './provinces/types';
export * from './provinces/color-table';
export * from './provinces/segmenter';
export * from './provinces/recolor';
export * from './terrain/types';
export * from './terrain/definition';
export * from './terrain/tree-projection';
export * from './terrain/classifier';
export * from './terrain/legend';
export * from './borders/shift-difference';
export * from './borders/borders';
export * from './atlas/controls';
export * from './atlas/types';
export * from './atlas/pipeline';
export * from './ecs/components';
export * from './ecs/atlas-world';
