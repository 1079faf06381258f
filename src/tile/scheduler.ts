import {ErrorEvent, Event, Evented} from '../util/evented';
import {DebounceTimer, assertValidTimeout} from '../util/debounce_timer';
import {config} from '../util/config';
import {extend, warnOnce} from '../util/util';
import {TileCache} from './tile_cache';
import {TileID} from './tile_id';
import {onTheFlyTraverse} from './quad_tree';
import {refineFunctor, type RefineFunction} from './refine';
import {createDefaultHeightTile, createDefaultOrthoTile, rgbaToHeightRaster} from './tile_conversion';

import type {CameraDefinition} from '../geo/camera_definition';
import type {BoundsProvider} from './aabb_decorator';
import type {HeightRaster, RGBAImage} from '../util/image';
import type {GpuCacheInfo, GpuLayeredTile, GpuTileQuad, LayeredTile, TileQuad} from './tile_types';

export type SchedulerOptions = {
    /**
     * Number of quads the RAM tier keeps after a purge.
     * @defaultValue 12000
     */
    ramQuadLimit?: number;
    /**
     * Number of quads the renderer is asked to hold at most.
     * @defaultValue 250
     */
    gpuQuadLimit?: number;
    /**
     * Refinement threshold in pixels.
     * @defaultValue 2
     */
    permissibleScreenSpaceError?: number;
    /**
     * Delay in milliseconds between a camera change or a delivery and the
     * following request and promotion cycle.
     * @defaultValue 100
     */
    updateTimeout?: number;
    /**
     * Delay in milliseconds between a delivery and the following RAM purge.
     * @defaultValue 1000
     */
    purgeTimeout?: number;
    /**
     * While disabled, nothing is scheduled.
     * @defaultValue false
     */
    enabled?: boolean;
    /**
     * Edge length of imagery tiles in pixels, also used as tile footprint for refinement.
     * @defaultValue 256
     */
    orthoTileSize?: number;
    /**
     * Edge length of elevation tiles in pixels.
     * @defaultValue 64
     */
    heightTileSize?: number;
    /**
     * Bounding boxes of the tiles. Without one no tile is refined.
     * @defaultValue null
     */
    aabbDecorator?: BoundsProvider | null;
};

type CompleteSchedulerOptions = Required<SchedulerOptions>;

const defaultOptions: CompleteSchedulerOptions = {
    ramQuadLimit: 12000,
    gpuQuadLimit: 250,
    permissibleScreenSpaceError: 2,
    updateTimeout: 100,
    purgeTimeout: 1000,
    enabled: false,
    orthoTileSize: 256,
    heightTileSize: 64,
    aabbDecorator: null
};

export type SchedulerStatistics = {
    nRamQuads: number;
    nGpuQuads: number;
    ramQuadLimit: number;
    gpuQuadLimit: number;
};

export type GpuQuadsUpdate = {
    newQuads: GpuTileQuad[];
    deletedIds: TileID[];
};

/**
 * Fired with the quads that are needed for the current camera but not in the RAM tier.
 */
export class QuadsRequestedEvent extends Event<'quadsrequested'> {
    readonly ids: TileID[];

    constructor(ids: TileID[]) {
        super('quadsrequested');
        this.ids = ids;
    }
}

/**
 * Fired with the quads the renderer has to upload and the ids it has to drop.
 */
export class GpuQuadsUpdatedEvent extends Event<'gpuquadsupdated'> {
    readonly newQuads: GpuTileQuad[];
    readonly deletedIds: TileID[];

    constructor(update: GpuQuadsUpdate) {
        super('gpuquadsupdated');
        this.newQuads = update.newQuads;
        this.deletedIds = update.deletedIds;
    }
}

export type SchedulerEvents = {
    quadsrequested: QuadsRequestedEvent;
    gpuquadsupdated: GpuQuadsUpdatedEvent;
    error: ErrorEvent;
};

function assertValidScreenSpaceError(error: number) {
    if (!(error > 0) || !Number.isFinite(error)) {
        throw new RangeError(`permissible screen space error must be a positive number, got ${error}`);
    }
}

/**
 * Decides which terrain quads are needed for the current camera, requests
 * the missing ones and tells the renderer which quads to upload or drop.
 *
 * Quads live in two tiers: the RAM tier holds delivered quads, the GPU tier
 * tracks which quads the renderer holds. Both are trimmed with the same
 * refinement predicate. Work is driven by two debounce timers: camera
 * changes and deliveries arm the update timer, which runs
 * {@link Scheduler#sendQuadRequests} followed by {@link Scheduler#updateGpuQuads};
 * deliveries also arm the purge timer, which runs {@link Scheduler#purgeRamCache}.
 *
 * @example
 * ```ts
 * const scheduler = new Scheduler({aabbDecorator: new AabbDecorator(heights), enabled: true});
 * scheduler.on('quadsrequested', (e) => loader.loadQuads(e.ids));
 * scheduler.on('gpuquadsupdated', (e) => renderer.update(e.newQuads, e.deletedIds));
 * scheduler.updateCamera(camera);
 * ```
 */
export class Scheduler extends Evented<SchedulerEvents> {
    _ramCache: TileCache<TileQuad>;
    _gpuCache: TileCache<GpuCacheInfo>;
    _updateTimer: DebounceTimer;
    _purgeTimer: DebounceTimer;
    _camera: CameraDefinition | null;
    _aabbDecorator: BoundsProvider | null;
    _permissibleScreenSpaceError: number;
    _updateTimeout: number;
    _purgeTimeout: number;
    _enabled: boolean;
    _orthoTileSize: number;
    _defaultOrthoTile: RGBAImage;
    _defaultHeightTile: HeightRaster;

    constructor(options?: SchedulerOptions) {
        super();
        const resolved = extend({}, defaultOptions, options ?? {});

        assertValidTimeout(resolved.updateTimeout);
        assertValidTimeout(resolved.purgeTimeout);
        assertValidScreenSpaceError(resolved.permissibleScreenSpaceError);

        this._ramCache = new TileCache(resolved.ramQuadLimit);
        this._gpuCache = new TileCache(resolved.gpuQuadLimit);
        this._updateTimer = new DebounceTimer(() => {
            // a failed request step must not hold back promotion
            this._runGuarded(() => this.sendQuadRequests());
            this._runGuarded(() => this.updateGpuQuads());
        });
        this._purgeTimer = new DebounceTimer(() => this._runGuarded(() => this.purgeRamCache()));

        this._camera = null;
        this._aabbDecorator = resolved.aabbDecorator;
        this._permissibleScreenSpaceError = resolved.permissibleScreenSpaceError;
        this._updateTimeout = resolved.updateTimeout;
        this._purgeTimeout = resolved.purgeTimeout;
        this._enabled = false;
        this._orthoTileSize = resolved.orthoTileSize;
        this._defaultOrthoTile = createDefaultOrthoTile(resolved.orthoTileSize);
        this._defaultHeightTile = createDefaultHeightTile(resolved.heightTileSize);

        this.setEnabled(resolved.enabled);
    }

    /**
     * Stores the camera and schedules an update. The update reads whichever
     * camera is stored when it runs.
     */
    updateCamera(camera: CameraDefinition) {
        this._camera = camera;
        this.scheduleUpdate();
    }

    /**
     * Adds delivered quads to the RAM tier. Quads that are no longer needed
     * are accepted as well and dropped by a later purge.
     */
    receiveQuads(quads: ReadonlyArray<TileQuad>) {
        for (const quad of quads) {
            if (quad.tiles.some(tile => !tile.id.isChildOf(quad.id) || tile.id.z !== quad.id.z + 1)) {
                warnOnce(`Quad ${quad.id.toString()} contains tiles that are not its children. They are ignored.`);
            }
        }
        this._ramCache.insert(quads);
        this.schedulePurge();
        this.scheduleUpdate();
    }

    scheduleUpdate() {
        if (this._enabled) {
            this._updateTimer.start(this._updateTimeout);
        }
    }

    schedulePurge() {
        if (this._enabled) {
            this._purgeTimer.start(this._purgeTimeout);
        }
    }

    /**
     * Fires `quadsrequested` with every quad the current camera needs that
     * is not in the RAM tier. The event is fired even if nothing is missing.
     */
    sendQuadRequests(): TileID[] {
        const missing = this.tilesForCurrentCamera().filter(id => !this._ramCache.contains(id));
        this.fire(new QuadsRequestedEvent(missing));
        return missing;
    }

    /**
     * Promotes relevant RAM quads the renderer does not hold yet, drops the
     * ones it no longer needs and fires `gpuquadsupdated` with the difference.
     */
    updateGpuQuads(): GpuQuadsUpdate {
        const refine = this._refineFunction();
        const staged: TileQuad[] = [];
        this._ramCache.visit((quad) => {
            if (!refine(quad.id)) return false;
            if (!this._gpuCache.contains(quad.id)) {
                staged.push(quad);
            }
            return true;
        });

        this._gpuCache.insert(staged.map(quad => ({id: quad.id})));
        this._gpuCache.visit((info) => refine(info.id));
        const superfluous = this._gpuCache.purge();

        // staged quads evicted by the purge are never built
        const superfluousKeys = new Set(superfluous.map(info => info.id.key));
        const promoted = staged.filter(quad => !superfluousKeys.has(quad.id.key));
        let newQuads: GpuTileQuad[];
        try {
            newQuads = promoted.map(quad => this._createGpuQuad(quad));
        } catch (e) {
            // the renderer never receives these, so the next cycle has to stage them again
            for (const quad of promoted) this._gpuCache.remove(quad.id);
            throw e;
        }
        if (newQuads.length < staged.length) {
            warnOnce(`GPU quad limit of ${this._gpuCache.capacity()} is too small for the current view.`);
        }
        const stagedKeys = new Set(staged.map(quad => quad.id.key));
        const deletedIds = superfluous
            .filter(info => !stagedKeys.has(info.id.key))
            .map(info => info.id);

        this.fire(new GpuQuadsUpdatedEvent({newQuads, deletedIds}));
        return {newQuads, deletedIds};
    }

    /**
     * Drops RAM quads the current camera does not need, but only once the
     * tier has grown past its limit by the hysteresis factor.
     */
    purgeRamCache() {
        const threshold = Math.floor(this._ramCache.capacity() * config.RAM_PURGE_HYSTERESIS);
        if (this._ramCache.nCachedObjects() < threshold) return;

        const refine = this._refineFunction();
        this._ramCache.visit((quad) => refine(quad.id));
        this._ramCache.purge();
    }

    /**
     * Ids of the quads needed for the current camera: every node the
     * refinement predicate subdivides, in depth-first order.
     */
    tilesForCurrentCamera(): TileID[] {
        const innerNodes: TileID[] = [];
        onTheFlyTraverse(TileID.root(), this._refineFunction(), (id) => {
            innerNodes.push(id);
            return id.children();
        });
        return innerNodes;
    }

    /**
     * Read access to the RAM tier.
     */
    ramCache(): Pick<TileCache<TileQuad>, 'contains' | 'get' | 'nCachedObjects' | 'capacity' | 'entries'> {
        return this._ramCache;
    }

    getStatistics(): SchedulerStatistics {
        return {
            nRamQuads: this._ramCache.nCachedObjects(),
            nGpuQuads: this._gpuCache.nCachedObjects(),
            ramQuadLimit: this._ramCache.capacity(),
            gpuQuadLimit: this._gpuCache.capacity()
        };
    }

    isEnabled(): boolean {
        return this._enabled;
    }

    /**
     * Enabling schedules an update. Disabling cancels pending timers.
     */
    setEnabled(enabled: boolean) {
        this._enabled = enabled;
        if (enabled) {
            this.scheduleUpdate();
        } else {
            this._updateTimer.stop();
            this._purgeTimer.stop();
        }
    }

    setRamQuadLimit(limit: number) {
        this._ramCache.setCapacity(limit);
    }

    setGpuQuadLimit(limit: number) {
        this._gpuCache.setCapacity(limit);
    }

    setPermissibleScreenSpaceError(error: number) {
        assertValidScreenSpaceError(error);
        this._permissibleScreenSpaceError = error;
    }

    setAabbDecorator(aabbDecorator: BoundsProvider | null) {
        this._aabbDecorator = aabbDecorator;
    }

    /**
     * Changes the update delay. A pending update is restarted with the new delay.
     */
    setUpdateTimeout(timeout: number) {
        assertValidTimeout(timeout);
        this._updateTimeout = timeout;
        this._updateTimer.restart(timeout);
    }

    /**
     * Changes the purge delay. A pending purge is restarted with the new delay.
     */
    setPurgeTimeout(timeout: number) {
        assertValidTimeout(timeout);
        this._purgeTimeout = timeout;
        this._purgeTimer.restart(timeout);
    }

    setOrthoTileSize(size: number) {
        this._defaultOrthoTile = createDefaultOrthoTile(size);
        this._orthoTileSize = size;
    }

    setHeightTileSize(size: number) {
        this._defaultHeightTile = createDefaultHeightTile(size);
    }

    /**
     * Cancels pending work and releases the cached quads. The scheduler must
     * not be used afterwards.
     */
    remove() {
        this._enabled = false;
        this._updateTimer.remove();
        this._purgeTimer.remove();
        this._ramCache.clear();
        this._gpuCache.clear();
    }

    _refineFunction(): RefineFunction {
        if (!this._camera) return () => false;
        return refineFunctor(this._camera, this._aabbDecorator, this._permissibleScreenSpaceError, this._orthoTileSize);
    }

    _createGpuQuad(quad: TileQuad): GpuTileQuad {
        const [a, b, c, d] = quad.id.children().map(childID => this._createGpuTile(childID, quad.tiles.find(tile => tile.id.equals(childID))));
        return {id: quad.id, tiles: [a, b, c, d]};
    }

    _createGpuTile(id: TileID, tile: LayeredTile | undefined): GpuLayeredTile {
        if (!this._aabbDecorator) throw new Error('cannot create GPU tiles without an aabb decorator');
        return {
            id,
            bounds: this._aabbDecorator.aabb(id),
            ortho: tile?.ortho ?? this._defaultOrthoTile,
            height: tile?.height ? rgbaToHeightRaster(tile.height) : this._defaultHeightTile
        };
    }

    /**
     * Runs work on behalf of a timer. Errors are fired as `error` events; an
     * error thrown by an `error` listener itself is written to the console.
     */
    _runGuarded(work: () => void) {
        try {
            work();
        } catch (e) {
            try {
                this.fire(new ErrorEvent(e instanceof Error ? e : new Error(String(e))));
            } catch (listenerError) {
                console.error(listenerError);
            }
        }
    }
}
