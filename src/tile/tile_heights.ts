import {config} from '../util/config';
import {TileID} from './tile_id';

/**
 * Minimum and maximum elevation, in metres.
 */
export type HeightRange = readonly [number, number];

/**
 * Serialised form of {@link TileHeights}: `[z, x, y, min, max]` rows.
 */
export type TileHeightsJSON = Array<[number, number, number, number, number]>;

/**
 * Sparse table of elevation ranges per tile. Tiles without an entry inherit
 * the range of their closest stored ancestor.
 */
export class TileHeights {
    _data: Map<string, {id: TileID; range: HeightRange}>;

    constructor() {
        this._data = new Map();
    }

    emplace(id: TileID, range: HeightRange) {
        if (!(range[0] <= range[1])) {
            throw new RangeError(`invalid height range [${range[0]}, ${range[1]}] for tile ${id.toString()}`);
        }
        this._data.set(id.key, {id, range});
    }

    /**
     * Looks up the range of `id`, walking up towards the root until a stored range is found.
     */
    query(id: TileID): HeightRange {
        let current: TileID | null = id;
        while (current) {
            const entry = this._data.get(current.key);
            if (entry) return entry.range;
            current = current.parent();
        }
        return config.DEFAULT_HEIGHT_RANGE;
    }

    get size(): number {
        return this._data.size;
    }

    toJSON(): TileHeightsJSON {
        const rows: TileHeightsJSON = [];
        for (const {id, range} of this._data.values()) {
            rows.push([id.z, id.x, id.y, range[0], range[1]]);
        }
        return rows;
    }

    static fromJSON(rows: TileHeightsJSON): TileHeights {
        const heights = new TileHeights();
        for (const [z, x, y, min, max] of rows) {
            heights.emplace(new TileID(z, x, y), [min, max]);
        }
        return heights;
    }
}
