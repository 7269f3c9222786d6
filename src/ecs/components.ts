import type { BoundingBox, Rgb } from '../raster/types';
import type { TerrainAssignmentSource, TerrainCategory } from '../terrain/types';

export type ProvinceComponent = {
	provinceId: number[];
	color: Rgb[];
	boundingBox: BoundingBox[];
	pixelCount: number[];
};

export type TerrainComponent = {
	category: TerrainCategory[];
	source: TerrainAssignmentSource[];
};

// Stores are indexed by entity id, so every world owns its own set.
export type AtlasComponents = {
	province: ProvinceComponent;
	terrain: TerrainComponent;
	waterProvince: object;
	overriddenTerrain: object;
};

export function createAtlasComponents(): AtlasComponents
{
	return {
		province: {
			provinceId: [],
			color: [],
			boundingBox: [],
			pixelCount: [],
		},
		terrain: {
			category: [],
			source: [],
		},
		waterProvince: {},
		overriddenTerrain: {},
	};
}
