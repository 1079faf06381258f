import {isIntegerInRange} from '../util/util';
import type {TileID} from './tile_id';

type CacheEntry<T> = {
    data: T;
    /**
     * Outcome of the latest `visit`, or `null` if the entry was not visited since it was inserted.
     */
    relevant: boolean | null;
};

function assertValidCapacity(capacity: number) {
    if (!isIntegerInRange(capacity, 0, Number.MAX_SAFE_INTEGER)) {
        throw new RangeError(`cache capacity must be a non-negative integer, got ${capacity}`);
    }
}

/**
 * A keyed store for tile payloads with mark and sweep eviction.
 *
 * Capacity is not enforced on insertion. Instead, `visit` marks every entry
 * relevant or not, and `purge` drops the entries that are not relevant plus,
 * when more entries are relevant than `capacity` allows, the excess. Every
 * `visit` replaces all marks, so all relevant entries are equally recent and
 * the ones inserted earliest are kept.
 */
export class TileCache<T extends {readonly id: TileID}> {
    private _capacity: number;
    private _data: Map<string, CacheEntry<T>>;

    constructor(capacity: number) {
        assertValidCapacity(capacity);
        this._capacity = capacity;
        this._data = new Map();
    }

    /**
     * Adds entries, replacing entries with the same id. A replaced entry
     * loses its mark and counts as the most recently inserted one.
     */
    insert(entries: Iterable<T>) {
        for (const data of entries) {
            const key = data.id.key;
            this._data.delete(key);
            this._data.set(key, {data, relevant: null});
        }
    }

    /**
     * Removes a single entry.
     * @returns whether an entry was removed
     */
    remove(id: TileID): boolean {
        return this._data.delete(id.key);
    }

    contains(id: TileID): boolean {
        return this._data.has(id.key);
    }

    get(id: TileID): T | undefined {
        return this._data.get(id.key)?.data;
    }

    nCachedObjects(): number {
        return this._data.size;
    }

    capacity(): number {
        return this._capacity;
    }

    /**
     * Updates the capacity used by future purges. Does not evict anything.
     */
    setCapacity(capacity: number) {
        assertValidCapacity(capacity);
        this._capacity = capacity;
    }

    /**
     * Marks every entry with the outcome of `predicate`, replacing previous marks.
     */
    visit(predicate: (data: T) => boolean) {
        for (const entry of this._data.values()) {
            entry.relevant = predicate(entry.data);
        }
    }

    /**
     * Removes the entries that are not marked relevant and, if needed, the
     * most recently inserted relevant ones until at most `capacity` entries remain.
     * @returns the removed entries, in insertion order
     */
    purge(): T[] {
        const removed: T[] = [];
        let kept = 0;
        for (const [key, entry] of this._data) {
            if (entry.relevant && kept < this._capacity) {
                kept++;
                continue;
            }
            this._data.delete(key);
            removed.push(entry.data);
        }
        return removed;
    }

    /**
     * Cached payloads in insertion order.
     */
    entries(): T[] {
        return Array.from(this._data.values(), entry => entry.data);
    }

    clear() {
        this._data.clear();
    }
}
