import {config} from '../util/config';

/**
 * Identifies a node of the terrain quad-tree by zoom level and tile coordinate.
 * Ids are plain values: two instances with the same components are interchangeable.
 */
export class TileID {
    readonly z: number;
    readonly x: number;
    readonly y: number;
    readonly key: string;

    constructor(z: number, x: number, y: number) {
        if (!isValidTileZoomXY(z, x, y)) {
            throw new Error(`x=${x}, y=${y}, z=${z} outside of bounds. 0<=x<${Math.pow(2, z)}, 0<=y<${Math.pow(2, z)} 0<=z<=${config.MAX_TILE_ZOOM} `);
        }

        this.z = z;
        this.x = x;
        this.y = y;
        this.key = calculateTileKey(z, x, y);
    }

    static root(): TileID {
        return new TileID(0, 0, 0);
    }

    equals(id: TileID) {
        return this.z === id.z && this.x === id.x && this.y === id.y;
    }

    /**
     * The four tiles one zoom level deeper, in the order
     * (2x, 2y), (2x + 1, 2y), (2x, 2y + 1), (2x + 1, 2y + 1).
     */
    children(): [TileID, TileID, TileID, TileID] {
        const z = this.z + 1;
        const x = this.x * 2;
        const y = this.y * 2;
        return [
            new TileID(z, x, y),
            new TileID(z, x + 1, y),
            new TileID(z, x, y + 1),
            new TileID(z, x + 1, y + 1)
        ];
    }

    parent(): TileID | null {
        if (this.z === 0) return null;
        return new TileID(this.z - 1, this.x >> 1, this.y >> 1);
    }

    isChildOf(parent: TileID) {
        const dz = this.z - parent.z;
        return dz > 0 && parent.x === (this.x >> dz) && parent.y === (this.y >> dz);
    }

    toString() {
        return `${this.z}/${this.x}/${this.y}`;
    }
}

function isValidTileZoomXY(z: number, x: number, y: number): boolean {
    if (!Number.isInteger(z) || z < 0 || z > config.MAX_TILE_ZOOM) return false;
    const tilesAtZoom = Math.pow(2, z);
    return Number.isInteger(x) && Number.isInteger(y) &&
        x >= 0 && x < tilesAtZoom && y >= 0 && y < tilesAtZoom;
}

export function calculateTileKey(z: number, x: number, y: number): string {
    const dim = Math.pow(2, z);
    return (dim * y + x).toString(36) + z.toString(36);
}
