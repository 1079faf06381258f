import {config} from './config';
import {isIntegerInRange} from './util';

/**
 * Throws if `timeout` cannot be handed to `setTimeout` unchanged.
 */
export function assertValidTimeout(timeout: number) {
    if (!isIntegerInRange(timeout, 0, config.MAX_TIMEOUT)) {
        throw new RangeError(`timeout must be an integer between 0 and ${config.MAX_TIMEOUT} ms, got ${timeout}`);
    }
}

/**
 * A single-shot, re-armable timer that invokes the wrapped function once the
 * timeout elapses. Calls to `start` while the timer is running are ignored,
 * so that a burst of triggers coalesces into one invocation at the end of
 * the interval.
 */
export class DebounceTimer {
    _timerId: ReturnType<typeof setTimeout> | null;
    _callback: () => void;

    constructor(callback: () => void) {
        this._callback = callback;
        this._timerId = null;
    }

    /**
     * Arms the timer unless it is already running.
     * @returns `true` if the timer was armed by this call
     */
    start(timeout: number): boolean {
        assertValidTimeout(timeout);
        if (this._timerId !== null) {
            return false;
        }
        this._timerId = setTimeout(() => {
            this._timerId = null;
            this._callback();
        }, timeout);
        return true;
    }

    /**
     * Stops a running timer and arms it again with a new timeout.
     * Does nothing if the timer is not running.
     */
    restart(timeout: number) {
        assertValidTimeout(timeout);
        if (this._timerId === null) return;
        this.stop();
        this.start(timeout);
    }

    stop() {
        if (this._timerId !== null) {
            clearTimeout(this._timerId);
            this._timerId = null;
        }
    }

    isActive(): boolean {
        return this._timerId !== null;
    }

    remove() {
        this.stop();
        this._callback = () => {};
    }
}
