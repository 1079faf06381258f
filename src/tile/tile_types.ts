import type {Aabb} from '../util/primitives/aabb';
import type {HeightRaster, RGBAImage} from '../util/image';
import type {TileID} from './tile_id';

/**
 * Payload of one tile as delivered by the loader. Either raster may be
 * missing when its download failed or has not finished.
 */
export type LayeredTile = {
    readonly id: TileID;
    /**
     * Decoded imagery.
     */
    readonly ortho?: RGBAImage;
    /**
     * Decoded elevation image, height packed as `(r << 8) | g`.
     */
    readonly height?: RGBAImage;
};

/**
 * A parent tile id together with the payloads of its (up to four) children.
 * This is the unit the scheduler requests, caches and promotes.
 */
export type TileQuad = {
    readonly id: TileID;
    readonly tiles: ReadonlyArray<LayeredTile>;
};

export type GpuLayeredTile = {
    readonly id: TileID;
    readonly bounds: Aabb;
    readonly ortho: RGBAImage;
    readonly height: HeightRaster;
};

/**
 * Render-ready counterpart of a {@link TileQuad}: one entry per child, in
 * `TileID.children()` order, with placeholders standing in for missing rasters.
 */
export type GpuTileQuad = {
    readonly id: TileID;
    readonly tiles: readonly [GpuLayeredTile, GpuLayeredTile, GpuLayeredTile, GpuLayeredTile];
};

/**
 * Entry of the GPU tier: the scheduler only tracks which quads the renderer holds.
 */
export type GpuCacheInfo = {
    readonly id: TileID;
};
