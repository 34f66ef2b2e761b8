import { EventEmitter } from "eventemitter3";

/**
 * Generic typed event map -- keys are event names, values are handler signatures.
 * Declare maps with `type`, not `interface`, so they satisfy the index signature.
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

/** Called with the error and the event name when a handler throws during `emitIsolated`. */
export type ListenerErrorCallback = (error: unknown, event: string) => void;

/**
 * Type-safe event emitter over eventemitter3.
 *
 * Delivery is synchronous and unbuffered: a handler registered after an
 * emission never sees it. `on` returns its own unsubscribe function.
 *
 * @example
 * ```ts
 * type Events = { state: (s: ScreenState<Movie[]>) => void };
 * const emitter = new TypedEmitter<Events>();
 * const off = emitter.on("state", render);
 * emitter.emit("state", { status: "loading" });
 * off();
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	/** Registers a handler and returns a function that removes it. */
	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): () => void {
		this.ee.on(event, handler);
		return () => {
			this.ee.off(event, handler);
		};
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler);
		return this;
	}

	/** Invokes every handler in registration order; a throwing handler stops delivery. */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	/**
	 * Invokes every handler in registration order. A handler that throws is
	 * reported to `onError` and the remaining handlers still run.
	 * @returns the number of handlers invoked
	 */
	emitIsolated<K extends keyof TEvents & string>(
		event: K,
		onError: ListenerErrorCallback,
		...args: Parameters<TEvents[K]>
	): number {
		const handlers = this.ee.listeners(event);
		for (const handler of handlers) {
			try {
				handler(...args);
			} catch (error: unknown) {
				onError(error, event);
			}
		}
		return handlers.length;
	}

	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
