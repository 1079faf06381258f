import {describe, test, expect, vi, beforeEach, afterEach} from 'vitest';
import {DebounceTimer, assertValidTimeout} from './debounce_timer';

describe('DebounceTimer', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    test('fires once after the timeout', () => {
        const callback = vi.fn();
        const timer = new DebounceTimer(callback);
        expect(timer.start(100)).toBe(true);
        expect(timer.isActive()).toBe(true);

        vi.advanceTimersByTime(99);
        expect(callback).not.toHaveBeenCalled();
        vi.advanceTimersByTime(1);
        expect(callback).toHaveBeenCalledTimes(1);
        expect(timer.isActive()).toBe(false);
    });

    test('ignores start while running', () => {
        const callback = vi.fn();
        const timer = new DebounceTimer(callback);
        timer.start(100);
        vi.advanceTimersByTime(50);
        expect(timer.start(100)).toBe(false);

        vi.advanceTimersByTime(50);
        expect(callback).toHaveBeenCalledTimes(1);
        vi.advanceTimersByTime(500);
        expect(callback).toHaveBeenCalledTimes(1);
    });

    test('can be armed again after firing', () => {
        const callback = vi.fn();
        const timer = new DebounceTimer(callback);
        timer.start(10);
        vi.advanceTimersByTime(10);
        timer.start(10);
        vi.advanceTimersByTime(10);
        expect(callback).toHaveBeenCalledTimes(2);
    });

    test('restart applies the new timeout from now', () => {
        const callback = vi.fn();
        const timer = new DebounceTimer(callback);
        timer.start(100);
        vi.advanceTimersByTime(80);
        timer.restart(50);

        vi.advanceTimersByTime(49);
        expect(callback).not.toHaveBeenCalled();
        vi.advanceTimersByTime(1);
        expect(callback).toHaveBeenCalledTimes(1);
    });

    test('restart does not arm an idle timer', () => {
        const callback = vi.fn();
        const timer = new DebounceTimer(callback);
        timer.restart(50);
        expect(timer.isActive()).toBe(false);
        vi.advanceTimersByTime(100);
        expect(callback).not.toHaveBeenCalled();
    });

    test('stop cancels a pending call', () => {
        const callback = vi.fn();
        const timer = new DebounceTimer(callback);
        timer.start(100);
        timer.stop();
        expect(timer.isActive()).toBe(false);
        vi.advanceTimersByTime(200);
        expect(callback).not.toHaveBeenCalled();
    });

    test('remove detaches the callback', () => {
        const callback = vi.fn();
        const timer = new DebounceTimer(callback);
        timer.start(100);
        timer.remove();
        timer.start(100);
        vi.advanceTimersByTime(200);
        expect(callback).not.toHaveBeenCalled();
    });
});

describe('assertValidTimeout', () => {
    test('accepts the setTimeout range', () => {
        expect(() => assertValidTimeout(0)).not.toThrow();
        expect(() => assertValidTimeout(2147483647)).not.toThrow();
    });

    test('rejects values setTimeout would clamp', () => {
        expect(() => assertValidTimeout(-1)).toThrow(RangeError);
        expect(() => assertValidTimeout(2147483648)).toThrow(RangeError);
        expect(() => assertValidTimeout(1.5)).toThrow(RangeError);
        expect(() => assertValidTimeout(Number.NaN)).toThrow(RangeError);
    });
});
