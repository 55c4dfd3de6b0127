export type Listener<T extends unknown[]> = (...args: T) => void;

type EventMap = Record<string, unknown[]>;

/**
 * Typed event emitter. `Events` maps each event name to the tuple of
 * arguments its listeners receive.
 */
export class EventEmitter<Events extends EventMap> {
	private _listeners: { [K in keyof Events]?: Listener<Events[K]>[] } = {};

	public on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
		const listeners = this._listeners[event] ?? [];
		listeners.push(listener);
		this._listeners[event] = listeners;
		return this;
	}

	public off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
		const listeners = this._listeners[event];
		if (!listeners) return this;

		const index = listeners.indexOf(listener);
		if (index !== -1) {
			listeners.splice(index, 1);
		}
		return this;
	}

	public emit<K extends keyof Events>(event: K, ...args: Events[K]): boolean {
		const listeners = this._listeners[event];
		if (!listeners || listeners.length === 0) return false;

		// copy so listeners may unsubscribe while being called
		for (const listener of [...listeners]) {
			listener(...args);
		}
		return true;
	}

	public once<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
		const wrapper: Listener<Events[K]> = (...args) => {
			this.off(event, wrapper);
			listener(...args);
		};
		return this.on(event, wrapper);
	}
}
