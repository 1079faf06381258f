import {Aabb} from '../util/primitives/aabb';
import {tileBounds} from '../geo/srs';
import {TileHeights} from './tile_heights';
import type {TileID} from './tile_id';

/**
 * Supplies the world space bounding box of a tile. Called on the refinement
 * hot path, so implementations must be cheap and free of side effects.
 */
export interface BoundsProvider {
    aabb(tileID: TileID): Aabb;
}

/**
 * Bounds provider for web mercator tiles: the horizontal extent comes from
 * the tile grid, the vertical extent from a table of elevation ranges.
 */
export class AabbDecorator implements BoundsProvider {
    readonly heights: TileHeights;

    constructor(heights: TileHeights = new TileHeights()) {
        this.heights = heights;
    }

    aabb(tileID: TileID): Aabb {
        const bounds = tileBounds(tileID);
        const [minHeight, maxHeight] = this.heights.query(tileID);
        return new Aabb(
            [bounds.min[0], bounds.min[1], minHeight],
            [bounds.max[0], bounds.max[1], maxHeight]
        );
    }
}
