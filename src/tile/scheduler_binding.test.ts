import {describe, test, expect, vi, beforeEach, afterEach} from 'vitest';
import {Scheduler} from './scheduler';
import {bindScheduler, formatSchedulerStatistics, type RenderWindow, type TileLoader} from './scheduler_binding';
import {TileID} from './tile_id';
import {StubBoundsProvider, createTestCamera, createTileQuad, tilesAboveZoom} from '../util/test/util';

describe('bindScheduler', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    test('forwards requests to the loader and updates to the render window', () => {
        const scheduler = new Scheduler({aabbDecorator: new StubBoundsProvider(tilesAboveZoom(1)), enabled: true});
        const loader: TileLoader = {
            loadQuads: vi.fn((ids: TileID[]) => {
                scheduler.receiveQuads(ids.map(id => createTileQuad(id)));
            })
        };
        const renderWindow: RenderWindow = {
            updateGpuQuads: vi.fn(),
            updateDebugSchedulerStats: vi.fn()
        };
        bindScheduler(scheduler, {loader, renderWindow});

        scheduler.updateCamera(createTestCamera());
        vi.advanceTimersByTime(100);

        expect(loader.loadQuads).toHaveBeenCalledTimes(1);
        expect(loader.loadQuads).toHaveBeenCalledWith([TileID.root()]);
        // the loader delivers synchronously, so the quad is promoted in the same cycle
        expect(renderWindow.updateGpuQuads).toHaveBeenCalledTimes(1);
        const [newQuads, deletedIds] = vi.mocked(renderWindow.updateGpuQuads).mock.calls[0];
        expect(newQuads.map(quad => quad.id.toString())).toEqual(['0/0/0']);
        expect(deletedIds).toEqual([]);
        expect(renderWindow.updateDebugSchedulerStats).toHaveBeenLastCalledWith('ram: 1/12000 quads, gpu: 1/250 quads');

        // the delivery armed another cycle, which finds nothing left to do
        vi.advanceTimersByTime(100);
        expect(loader.loadQuads).toHaveBeenCalledTimes(2);
        expect(loader.loadQuads).toHaveBeenLastCalledWith([]);
        expect(renderWindow.updateGpuQuads).toHaveBeenCalledTimes(2);
        expect(renderWindow.updateGpuQuads).toHaveBeenLastCalledWith([], []);
    });

    test('works without debug statistics', () => {
        const scheduler = new Scheduler({aabbDecorator: new StubBoundsProvider(tilesAboveZoom(1))});
        const renderWindow: RenderWindow = {updateGpuQuads: vi.fn()};
        bindScheduler(scheduler, {loader: {loadQuads: vi.fn()}, renderWindow});
        scheduler.updateCamera(createTestCamera());
        scheduler.receiveQuads([createTileQuad(TileID.root())]);

        scheduler.updateGpuQuads();
        expect(renderWindow.updateGpuQuads).toHaveBeenCalledTimes(1);
    });

    test('unsubscribe detaches both collaborators', () => {
        const scheduler = new Scheduler({aabbDecorator: new StubBoundsProvider(tilesAboveZoom(1))});
        const loader: TileLoader = {loadQuads: vi.fn()};
        const renderWindow: RenderWindow = {updateGpuQuads: vi.fn()};
        const subscription = bindScheduler(scheduler, {loader, renderWindow});

        subscription.unsubscribe();
        scheduler.sendQuadRequests();
        scheduler.updateGpuQuads();
        expect(loader.loadQuads).not.toHaveBeenCalled();
        expect(renderWindow.updateGpuQuads).not.toHaveBeenCalled();
    });
});

describe('formatSchedulerStatistics', () => {
    test('prints occupancy against limits', () => {
        expect(formatSchedulerStatistics({nRamQuads: 3, nGpuQuads: 2, ramQuadLimit: 10, gpuQuadLimit: 4}))
            .toBe('ram: 3/10 quads, gpu: 2/4 quads');
    });
});
