/**
 * Coordinator: per-screen state reducer.
 *
 * Folds Outcome streams into one current state that the rendering layer
 * subscribes to, and carries a separate one-shot notification channel
 * (navigation, toasts) that is never replayed to late listeners.
 *
 * The coordinator owns every stream it launches. `dispose()` aborts them all;
 * after that no state transition or notification happens, whatever the
 * in-flight operations still resolve to.
 */

import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { SILENT_LOGGER } from "../lib/logger/index.js";
import { DEFAULT_PIPELINE_CONFIG } from "../shared/config.js";
import { CoordinatorFault } from "../shared/errors.js";
import type { Outcome } from "../shared/outcome.js";

type CoordinatorEvents<S, N> = {
	state: (state: S) => void;
	notification: (notification: N) => void;
};

export interface CoordinatorOptions {
	/** Bound to every log line as `coordinator` */
	readonly name?: string | undefined;
	readonly logger?: Logger | undefined;
	/** Shown when a failure or fault carries no message */
	readonly defaultErrorMessage?: string | undefined;
}

export abstract class Coordinator<S, N = never> {
	protected readonly logger: Logger;
	protected readonly defaultErrorMessage: string;
	private current: S;
	private disposed = false;
	private readonly emitter = new TypedEmitter<CoordinatorEvents<S, N>>();
	private readonly jobs = new Set<AbortController>();

	protected constructor(initialState: S, options: CoordinatorOptions = {}) {
		this.current = initialState;
		this.logger = (options.logger ?? SILENT_LOGGER).child({
			coordinator: options.name ?? this.constructor.name,
		});
		this.defaultErrorMessage =
			options.defaultErrorMessage ?? DEFAULT_PIPELINE_CONFIG.defaultErrorMessage;
	}

	// ── Queries ────────────────────────────────────────────────────

	get state(): S {
		return this.current;
	}

	get isDisposed(): boolean {
		return this.disposed;
	}

	/** Number of launched streams and tasks that have not finished yet. */
	get activeJobs(): number {
		return this.jobs.size;
	}

	// ── Subscriptions ──────────────────────────────────────────────

	/** Called synchronously with every new state. Returns an unsubscribe function. */
	subscribe(listener: (state: S) => void): () => void {
		if (this.disposed) return () => {};
		return this.emitter.on("state", listener);
	}

	/** Receives notifications emitted while attached; earlier ones are gone. */
	onNotification(listener: (notification: N) => void): () => void {
		if (this.disposed) return () => {};
		return this.emitter.on("notification", listener);
	}

	/** Abort every in-flight stream and detach all listeners. Idempotent. */
	dispose(): void {
		if (this.disposed) return;
		this.disposed = true;
		for (const job of this.jobs) {
			job.abort();
		}
		this.jobs.clear();
		this.emitter.removeAllListeners();
		this.logger.debug("Coordinator disposed");
	}

	// ── For subclasses ─────────────────────────────────────────────

	/** State shown after a fault in the coordinator's own reaction logic. */
	protected abstract faultState(message: string): S;

	/** Replace the state with `reducer(current)`. A throwing reducer is a fault. */
	protected setState(reducer: (current: S) => S): void {
		if (this.disposed) return;
		let next: S;
		try {
			next = reducer(this.current);
		} catch (error: unknown) {
			this.handleFault(error);
			return;
		}
		this.replaceState(next);
	}

	/** Push a one-shot notification to the listeners attached right now. */
	protected notify(notification: N): void {
		if (this.disposed) return;
		this.emitter.emitIsolated("notification", this.onListenerError, notification);
	}

	/**
	 * Collect `source` until it ends, the coordinator is disposed, or
	 * `onOutcome` throws (a fault). The returned promise never rejects.
	 */
	protected launch<T>(
		job: string,
		source: (signal: AbortSignal) => AsyncIterable<Outcome<T>>,
		onOutcome: (outcome: Outcome<T>) => void,
	): Promise<void> {
		return this.track(job, async (signal) => {
			for await (const outcome of source(signal)) {
				if (signal.aborted) return;
				onOutcome(outcome);
			}
		});
	}

	/** Single-shot counterpart of `launch`: `onResult` only runs if still attached. */
	protected launchOnce<T>(
		job: string,
		task: (signal: AbortSignal) => Promise<T>,
		onResult: (result: T) => void,
	): Promise<void> {
		return this.track(job, async (signal) => {
			const result = await task(signal);
			if (signal.aborted) return;
			onResult(result);
		});
	}

	/** Log the fault and show `faultState`. Never throws. */
	protected handleFault(error: unknown): void {
		const fault =
			error instanceof CoordinatorFault
				? error
				: new CoordinatorFault(error instanceof Error ? error.message : String(error), {
						cause: error,
					});
		this.logger.error({ err: fault }, "Coordinator fault");
		if (this.disposed) return;

		let next: S;
		try {
			next = this.faultState(fault.message.length > 0 ? fault.message : this.defaultErrorMessage);
		} catch (stateError: unknown) {
			this.logger.error({ err: stateError }, "faultState threw; keeping current state");
			return;
		}
		this.replaceState(next);
	}

	// ── Internal ──────────────────────────────────────────────────

	private async track(job: string, body: (signal: AbortSignal) => Promise<void>): Promise<void> {
		if (this.disposed) return;
		const controller = new AbortController();
		this.jobs.add(controller);
		try {
			await body(controller.signal);
		} catch (error: unknown) {
			if (!controller.signal.aborted) {
				this.logger.debug({ job }, "Job ended with a fault");
				this.handleFault(error);
			}
		} finally {
			this.jobs.delete(controller);
		}
	}

	private replaceState(next: S): void {
		this.current = next;
		this.emitter.emitIsolated("state", this.onListenerError, next);
	}

	private readonly onListenerError = (error: unknown, event: string): void => {
		this.logger.error({ err: error, event }, "Listener threw");
	};
}
