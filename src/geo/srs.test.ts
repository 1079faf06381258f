import {describe, test, expect} from 'vitest';
import {lngLatToWorld, tileBounds, worldExtent} from './srs';
import {TileID} from '../tile/tile_id';

describe('srs', () => {
    test('worldExtent', () => {
        expect(worldExtent).toBeCloseTo(20037508.342789244, 6);
    });

    test('tileBounds of the root covers the world', () => {
        const bounds = tileBounds(new TileID(0, 0, 0));
        expect(bounds.min).toEqual([-worldExtent, -worldExtent]);
        expect(bounds.max).toEqual([worldExtent, worldExtent]);
    });

    test('tileBounds rows count from the south', () => {
        const bounds = tileBounds(new TileID(1, 1, 0));
        expect(bounds.min).toEqual([0, -worldExtent]);
        expect(bounds.max).toEqual([worldExtent, 0]);
    });

    test('tileBounds of children tile their parent', () => {
        const parent = new TileID(3, 5, 2);
        const parentBounds = tileBounds(parent);
        const children = parent.children().map(tileBounds);
        expect(children[0].min[0]).toBeCloseTo(parentBounds.min[0], 6);
        expect(children[0].min[1]).toBeCloseTo(parentBounds.min[1], 6);
        expect(children[3].max[0]).toBeCloseTo(parentBounds.max[0], 6);
        expect(children[3].max[1]).toBeCloseTo(parentBounds.max[1], 6);
        expect(children[1].min[0]).toBeCloseTo(children[0].max[0], 6);
        expect(children[2].min[1]).toBeCloseTo(children[0].max[1], 6);
    });

    test('lngLatToWorld', () => {
        const origin = lngLatToWorld(0, 0, 1500);
        expect(origin[0]).toBe(0);
        expect(origin[1]).toBeCloseTo(0, 6);
        expect(origin[2]).toBe(1500);
        expect(lngLatToWorld(0, 0)[2]).toBe(0);
        expect(lngLatToWorld(180, 0)[0]).toBeCloseTo(worldExtent, 6);
        expect(lngLatToWorld(-90, 0)[0]).toBeCloseTo(-worldExtent / 2, 6);
        expect(lngLatToWorld(0, 85.051129)[1]).toBeCloseTo(worldExtent, -1);
        expect(lngLatToWorld(0, 89)[1]).toBe(lngLatToWorld(0, 85.051129)[1]);
    });

    test('lngLatToWorld rejects invalid latitudes', () => {
        expect(() => lngLatToWorld(0, 91)).toThrow('Invalid LngLat latitude value: must be between -90 and 90');
        expect(() => lngLatToWorld(Number.NaN, 0)).toThrow();
    });
});
