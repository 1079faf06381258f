import type {Scheduler, SchedulerStatistics} from './scheduler';
import type {TileID} from './tile_id';
import type {GpuTileQuad} from './tile_types';
import type {Subscription} from '../util/util';

/**
 * Fetches quads. Implementations hand finished quads to
 * {@link Scheduler#receiveQuads}, in any order and at any time.
 */
export interface TileLoader {
    loadQuads(ids: TileID[]): void;
}

/**
 * The rendering side of the scheduler.
 */
export interface RenderWindow {
    updateGpuQuads(newQuads: GpuTileQuad[], deletedIds: TileID[]): void;
    /**
     * Receives a one line summary of the cache occupancy after every GPU update.
     */
    updateDebugSchedulerStats?(stats: string): void;
}

export function formatSchedulerStatistics(stats: SchedulerStatistics): string {
    return `ram: ${stats.nRamQuads}/${stats.ramQuadLimit} quads, gpu: ${stats.nGpuQuads}/${stats.gpuQuadLimit} quads`;
}

/**
 * Connects a loader and a render window to the events of a scheduler.
 */
export function bindScheduler(scheduler: Scheduler, {loader, renderWindow}: {loader: TileLoader; renderWindow: RenderWindow}): Subscription {
    const subscriptions = [
        scheduler.on('quadsrequested', (e) => loader.loadQuads(e.ids)),
        scheduler.on('gpuquadsupdated', (e) => {
            renderWindow.updateGpuQuads(e.newQuads, e.deletedIds);
            renderWindow.updateDebugSchedulerStats?.(formatSchedulerStatistics(scheduler.getStatistics()));
        })
    ];

    return {
        unsubscribe: () => {
            for (const subscription of subscriptions) {
                subscription.unsubscribe();
            }
        }
    };
}
