import { addComponent, addComponents, addEntity, createWorld, hasComponent, query, removeEntity, type World } from 'bitecs';
import type { AtlasState } from '../atlas/types';
import { countMaskPixels } from '../raster/mask';
import type { BoundingBox, Rgb } from '../raster/types';
import { createAtlasComponents, type AtlasComponents } from './components';

export type AtlasWorld = {
	world: World;
	components: AtlasComponents;
};

export type ProvinceSnapshot = {
	provinceId: number;
	color: Rgb;
	boundingBox: BoundingBox;
	pixelCount: number;
	terrain: string;
	isWater: boolean;
	overridden: boolean;
};

export function createAtlasWorld(state: AtlasState): AtlasWorld
{
	const world = createWorld();
	const components = createAtlasComponents();
	const { province: provinceStore, terrain: terrainStore } = components;
	for (const province of state.provinces.provinces)
	{
		const assignment = state.terrain.get(province.id);
		if (!assignment)
		{
			throw new Error(`Province ${province.id} has no terrain assignment`);
		}
		const entity = addEntity(world);
		addComponents(world, entity, provinceStore, terrainStore);
		provinceStore.provinceId[entity] = province.id;
		provinceStore.color[entity] = province.color;
		provinceStore.boundingBox[entity] = province.boundingBox;
		provinceStore.pixelCount[entity] = countMaskPixels(province.mask);
		terrainStore.category[entity] = assignment.category;
		terrainStore.source[entity] = assignment.source;
		if (state.waterProvinces.has(province.id))
		{
			addComponent(world, entity, components.waterProvince);
		}
		if (assignment.source === 'override')
		{
			addComponent(world, entity, components.overriddenTerrain);
		}
	}
	return { world, components };
}

export function findProvinceEntity(atlas: AtlasWorld, provinceId: number): number | null
{
	const store = atlas.components.province;
	for (const eid of query(atlas.world, [store]))
	{
		if (store.provinceId[eid] === provinceId)
		{
			return eid;
		}
	}
	return null;
}

// Clears the entity's slots too; bitecs hands removed ids out again.
export function removeProvinceEntity(atlas: AtlasWorld, eid: number): void
{
	const { province, terrain } = atlas.components;
	removeEntity(atlas.world, eid);
	delete province.provinceId[eid];
	delete province.color[eid];
	delete province.boundingBox[eid];
	delete province.pixelCount[eid];
	delete terrain.category[eid];
	delete terrain.source[eid];
}

export function collectProvinceSnapshots(atlas: AtlasWorld): ProvinceSnapshot[]
{
	const { world, components } = atlas;
	const { province, terrain } = components;
	const snapshots: ProvinceSnapshot[] = [];
	for (const eid of query(world, [province, terrain]))
	{
		snapshots.push({
			provinceId: province.provinceId[eid],
			color: province.color[eid],
			boundingBox: province.boundingBox[eid],
			pixelCount: province.pixelCount[eid],
			terrain: terrain.category[eid].name,
			isWater: hasComponent(world, eid, components.waterProvince),
			overridden: hasComponent(world, eid, components.overriddenTerrain),
		});
	}
	snapshots.sort((a, b) => a.provinceId - b.provinceId);
	return snapshots;
}
