import {IntersectionResult} from '../util/primitives/aabb';
import {config} from '../util/config';
import type {CameraDefinition} from '../geo/camera_definition';
import type {BoundsProvider} from './aabb_decorator';
import type {TileID} from './tile_id';

export type RefineFunction = (tileID: TileID) => boolean;

/**
 * Creates the screen-space-error test that decides whether a tile must be
 * replaced by its four children for the given camera.
 *
 * A tile is refined if it is inside the view frustum and one of its texels,
 * seen from the closest point of its bounding box, covers at least
 * `errorThresholdPx` pixels on screen. Tiles at `config.MAX_REFINEMENT_ZOOM`
 * are never refined.
 *
 * @param camera - camera the tiles are selected for
 * @param boundsProvider - source of the tiles' bounding boxes
 * @param errorThresholdPx - permissible screen space error, in pixels
 * @param tileSize - texels along one edge of a tile
 */
export function refineFunctor(camera: CameraDefinition, boundsProvider: BoundsProvider | null, errorThresholdPx: number, tileSize: number = 256): RefineFunction {
    const frustum = camera.frustum();
    const position = camera.position;

    return (tileID: TileID) => {
        if (!boundsProvider || tileID.z >= config.MAX_REFINEMENT_ZOOM) {
            return false;
        }

        const aabb = boundsProvider.aabb(tileID);
        if (aabb.intersectsFrustum(frustum) === IntersectionResult.None) {
            return false;
        }

        if (aabb.contains(position)) {
            return true;
        }
        const distance = aabb.distanceTo(position);
        const texelSize = aabb.width / tileSize;
        return camera.toScreenSpace(texelSize, distance) >= errorThresholdPx;
    };
}
