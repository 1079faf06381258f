/**
 * This is a global config object used to store library-wide constants.
 * Values may be changed at wiring time, before any scheduler is created.
 */
type Config = {
    /**
     * Deepest zoom level a tile id may address.
     */
    MAX_TILE_ZOOM: number;
    /**
     * Tiles at this zoom level or deeper are never refined.
     */
    MAX_REFINEMENT_ZOOM: number;
    /**
     * Elevation range, in metres, assumed for regions without height information.
     */
    DEFAULT_HEIGHT_RANGE: [number, number];
    /**
     * Largest delay accepted by the scheduler's debounce timers (the limit of `setTimeout`).
     */
    MAX_TIMEOUT: number;
    /**
     * The RAM tier is only purged once it holds this many times its configured limit.
     */
    RAM_PURGE_HYSTERESIS: number;
};

export const config: Config = {
    MAX_TILE_ZOOM: 25,
    MAX_REFINEMENT_ZOOM: 18,
    DEFAULT_HEIGHT_RANGE: [0, 9000],
    MAX_TIMEOUT: 2147483647,
    RAM_PURGE_HYSTERESIS: 1.1
};
