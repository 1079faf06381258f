import {mat4} from 'gl-matrix';
import {CameraDefinition, type CameraDefinitionOptions} from '../../geo/camera_definition';
import {Frustum} from '../primitives/frustum';
import {Aabb} from '../primitives/aabb';
import {RGBAImage} from '../image';
import {TileID} from '../../tile/tile_id';
import type {BoundsProvider} from '../../tile/aabb_decorator';
import type {LayeredTile, TileQuad} from '../../tile/tile_types';

/**
 * Frustum of a camera at the origin looking along -z with a 90 degree field
 * of view, near plane 0.1 and far plane 100.
 */
export function createTestFrustum(): Frustum {
    const proj = mat4.perspective(new Float64Array(16), Math.PI / 2, 1.0, 0.1, 100.0);
    const invProj = mat4.invert(new Float64Array(16), proj);
    if (!invProj) throw new Error('projection matrix is not invertible');
    return Frustum.fromInvViewProjectionMatrix(invProj);
}

/**
 * Camera 1000 units above the origin looking straight down, with a 90 degree
 * field of view on a 512x512 viewport: one world unit at distance 1 covers 256 pixels.
 */
export function createTestCamera(options?: Partial<CameraDefinitionOptions>): CameraDefinition {
    return new CameraDefinition({
        position: [0, 0, 1000],
        target: [0, 0, 0],
        up: [0, 1, 0],
        fieldOfView: 90,
        nearPlane: 1,
        farPlane: 10000,
        viewportSize: {width: 512, height: 512},
        ...options
    });
}

/**
 * Bounds provider for scheduler tests. Tiles listed in `refined` get a box
 * around the test camera, so the refinement predicate always subdivides
 * them; every other tile gets a box behind the camera and is never refined.
 */
export class StubBoundsProvider implements BoundsProvider {
    refined: Set<string>;

    constructor(refined: Iterable<string> = []) {
        this.refined = new Set(refined);
    }

    aabb(tileID: TileID): Aabb {
        if (this.refined.has(tileID.toString())) {
            return new Aabb([-10, -10, 990], [10, 10, 1010]);
        }
        return new Aabb([-10, -10, 5000], [10, 10, 5100]);
    }
}

/**
 * Ids `z/x/y` of every tile with zoom level below `zoom`.
 */
export function tilesAboveZoom(zoom: number): string[] {
    const ids: string[] = [];
    for (let z = 0; z < zoom; z++) {
        for (let x = 0; x < (1 << z); x++) {
            for (let y = 0; y < (1 << z); y++) {
                ids.push(`${z}/${x}/${y}`);
            }
        }
    }
    return ids;
}

export function parseTileID(id: string): TileID {
    const [z, x, y] = id.split('/').map(Number);
    return new TileID(z, x, y);
}

/**
 * Builds a quad whose four children carry small solid-colour rasters. Children
 * listed in `missing` are left out.
 */
export function createTileQuad(id: TileID, missing: number[] = []): TileQuad {
    const tiles: LayeredTile[] = [];
    id.children().forEach((childID, i) => {
        if (missing.includes(i)) return;
        tiles.push({
            id: childID,
            ortho: RGBAImage.filled({width: 4, height: 4}, [10, 20, 30, 255]),
            height: RGBAImage.filled({width: 2, height: 2}, [1, 2, 0, 255])
        });
    });
    return {id, tiles};
}
