import {type Subscription} from './util';

/**
 * A listener method used as a callback to events
 */
export type Listener<E extends Event> = (event: E) => void;

type Listeners<M> = {[K in keyof M]?: Array<Listener<M[K] & Event>>};

function _addEventListener<M, K extends keyof M>(type: K, listener: Listener<M[K] & Event>, listenerList: Listeners<M>) {
    const listeners = listenerList[type] || [];
    if (listeners.indexOf(listener) === -1) {
        listeners.push(listener);
    }
    listenerList[type] = listeners;
}

function _removeEventListener<M, K extends keyof M>(type: K, listener: Listener<M[K] & Event>, listenerList: Listeners<M>) {
    const listeners = listenerList[type];
    if (listeners) {
        const index = listeners.indexOf(listener);
        if (index !== -1) {
            listeners.splice(index, 1);
        }
    }
}

/**
 * The event class
 */
export class Event<T extends string = string> {
    readonly type: T;
    target?: object;

    constructor(type: T) {
        this.type = type;
    }
}

/**
 * An error event
 */
export class ErrorEvent extends Event<'error'> {
    error: Error;

    constructor(error: Error) {
        super('error');
        this.error = error;
    }
}

/**
 * Base class for event capabilities. `M` maps each event type to the event
 * object its listeners receive.
 *
 * @group Event Related
 */
export class Evented<M extends {[K in keyof M]: Event}> {
    private _listeners: Listeners<M> = {};
    private _oneTimeListeners: Listeners<M> = {};

    /**
     * Adds a listener to a specified event type.
     *
     * @param type - The event type to add a listen for.
     * @param listener - The function to be called when the event is fired.
     * The listener function is called with the event passed to `fire`,
     * extended with a `target` property.
     */
    on<K extends keyof M>(type: K, listener: Listener<M[K]>): Subscription {
        _addEventListener(type, listener, this._listeners);

        return {
            unsubscribe: () => {
                this.off(type, listener);
            }
        };
    }

    /**
     * Removes a previously registered event listener.
     *
     * @param type - The event type to remove listeners for.
     * @param listener - The listener function to remove.
     */
    off<K extends keyof M>(type: K, listener: Listener<M[K]>): this {
        _removeEventListener(type, listener, this._listeners);
        _removeEventListener(type, listener, this._oneTimeListeners);

        return this;
    }

    /**
     * Adds a listener that will be called only once to a specified event type.
     *
     * The listener will be called first time the event fires after the listener is registered.
     *
     * @param type - The event type to listen for.
     * @returns a promise resolved with the event when no listener is provided
     */
    once<K extends keyof M>(type: K): Promise<M[K]>;
    once<K extends keyof M>(type: K, listener: Listener<M[K]>): this;
    once<K extends keyof M>(type: K, listener?: Listener<M[K]>): this | Promise<M[K]> {
        if (!listener) {
            return new Promise((resolve) => this.once(type, resolve));
        }
        _addEventListener(type, listener, this._oneTimeListeners);

        return this;
    }

    fire<K extends keyof M>(event: M[K] & {readonly type: K}): this {
        const type: K = event.type;

        if (this.listens(type)) {
            event.target = this;

            // make sure adding or removing listeners inside other listeners won't cause an infinite loop
            const listeners = (this._listeners[type] || []).slice();
            for (const listener of listeners) {
                listener.call(this, event);
            }

            const oneTimeListeners = (this._oneTimeListeners[type] || []).slice();
            for (const listener of oneTimeListeners) {
                _removeEventListener(type, listener, this._oneTimeListeners);
                listener.call(this, event);
            }

        // To ensure that no error events are dropped, print them to the
        // console if they have no listeners.
        } else if (event instanceof ErrorEvent) {
            console.error(event.error);
        }

        return this;
    }

    /**
     * Returns true if this instance of Evented has a listener for the specified type.
     *
     * @param type - The event type
     * @returns `true` if there is at least one registered listener for specified event type, `false` otherwise
     */
    listens(type: keyof M): boolean {
        const listeners = this._listeners[type];
        const oneTimeListeners = this._oneTimeListeners[type];
        return (listeners !== undefined && listeners.length > 0) ||
            (oneTimeListeners !== undefined && oneTimeListeners.length > 0);
    }
}
