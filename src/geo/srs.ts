import {type vec3} from 'gl-matrix';
import {clamp, degreesToRadians} from '../util/util';
import type {TileID} from '../tile/tile_id';

/*
 * WGS-84 semi-major axis in metres, the sphere radius of web mercator (EPSG:3857).
 */
export const earthSemiMajorAxis = 6378137;

/*
 * Half the width of the web mercator world square, in metres.
 */
export const worldExtent = Math.PI * earthSemiMajorAxis;

/*
 * Latitude at which the web mercator world square ends.
 */
export const MAX_VALID_LATITUDE = 85.051129;

export type TileBounds = {
    min: [number, number];
    max: [number, number];
};

/**
 * Returns the extent of a tile in web mercator metres. Tile rows count from
 * the south, so `y = 0` is the southernmost row.
 */
export function tileBounds(tileID: TileID): TileBounds {
    const tileWidth = 2 * worldExtent / Math.pow(2, tileID.z);
    const minX = -worldExtent + tileID.x * tileWidth;
    const minY = -worldExtent + tileID.y * tileWidth;
    return {
        min: [minX, minY],
        max: [minX + tileWidth, minY + tileWidth]
    };
}

/**
 * Converts a geographic position to world coordinates: web mercator metres
 * with the altitude, in metres, as z. Latitudes beyond the mercator square are clamped.
 */
export function lngLatToWorld(lng: number, lat: number, altitude: number = 0): vec3 {
    if (isNaN(lng) || isNaN(lat)) {
        throw new Error(`Invalid LngLat object: (${lng}, ${lat})`);
    }
    if (lat > 90 || lat < -90) {
        throw new Error('Invalid LngLat latitude value: must be between -90 and 90');
    }
    const constrainedLat = clamp(lat, -MAX_VALID_LATITUDE, MAX_VALID_LATITUDE);
    return [
        earthSemiMajorAxis * degreesToRadians(lng),
        earthSemiMajorAxis * Math.log(Math.tan(Math.PI / 4 + degreesToRadians(constrainedLat) / 2)),
        altitude
    ];
}
