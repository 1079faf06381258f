import {Scheduler, QuadsRequestedEvent, GpuQuadsUpdatedEvent, type SchedulerOptions, type SchedulerEvents, type SchedulerStatistics, type GpuQuadsUpdate} from './tile/scheduler';
import {bindScheduler, formatSchedulerStatistics, type TileLoader, type RenderWindow} from './tile/scheduler_binding';
import {TileCache} from './tile/tile_cache';
import {TileID} from './tile/tile_id';
import {TileHeights, type HeightRange, type TileHeightsJSON} from './tile/tile_heights';
import {AabbDecorator, type BoundsProvider} from './tile/aabb_decorator';
import {onTheFlyTraverse} from './tile/quad_tree';
import {refineFunctor, type RefineFunction} from './tile/refine';
import {rgbaToHeightRaster, createDefaultOrthoTile, createDefaultHeightTile} from './tile/tile_conversion';
import {type LayeredTile, type TileQuad, type GpuLayeredTile, type GpuTileQuad, type GpuCacheInfo} from './tile/tile_types';
import {CameraDefinition, type CameraDefinitionOptions} from './geo/camera_definition';
import {tileBounds, lngLatToWorld, worldExtent} from './geo/srs';
import {Aabb, IntersectionResult} from './util/primitives/aabb';
import {Frustum} from './util/primitives/frustum';
import {RGBAImage, HeightRaster, type Size} from './util/image';
import {Evented, Event, ErrorEvent, type Listener} from './util/evented';
import {config} from './util/config';
import {type Subscription} from './util/util';

export {
    Scheduler,
    QuadsRequestedEvent,
    GpuQuadsUpdatedEvent,
    bindScheduler,
    formatSchedulerStatistics,
    TileCache,
    TileID,
    TileHeights,
    AabbDecorator,
    onTheFlyTraverse,
    refineFunctor,
    rgbaToHeightRaster,
    createDefaultOrthoTile,
    createDefaultHeightTile,
    CameraDefinition,
    tileBounds,
    lngLatToWorld,
    worldExtent,
    Aabb,
    IntersectionResult,
    Frustum,
    RGBAImage,
    HeightRaster,
    Evented,
    Event,
    ErrorEvent,
    config,
    type SchedulerOptions,
    type SchedulerEvents,
    type SchedulerStatistics,
    type GpuQuadsUpdate,
    type TileLoader,
    type RenderWindow,
    type HeightRange,
    type TileHeightsJSON,
    type BoundsProvider,
    type RefineFunction,
    type LayeredTile,
    type TileQuad,
    type GpuLayeredTile,
    type GpuTileQuad,
    type GpuCacheInfo,
    type CameraDefinitionOptions,
    type Size,
    type Listener,
    type Subscription
};
