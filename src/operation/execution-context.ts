/**
 * Execution contexts: where an operation's fetch logic runs.
 *
 * An operation hands every step of its producer to its context; the consumer
 * resumes on its own continuation once the step settles. The context is passed
 * explicitly into each operation, defaulting to `BackgroundContext`.
 */

export interface ExecutionContext {
	readonly name: string;
	run<T>(task: () => Promise<T>): Promise<T>;
}

/** Starts each task on a fresh macrotask, off the consumer's current turn. */
export const BackgroundContext: ExecutionContext = {
	name: "background",
	run<T>(task: () => Promise<T>): Promise<T> {
		return new Promise<T>((resolve, reject) => {
			setImmediate(() => {
				try {
					task().then(resolve, reject);
				} catch (error: unknown) {
					reject(error);
				}
			});
		});
	},
};

/** Runs each task inline on the caller's turn. */
export const CallerContext: ExecutionContext = {
	name: "caller",
	async run<T>(task: () => Promise<T>): Promise<T> {
		return task();
	},
};

export const DEFAULT_EXECUTION_CONTEXT: ExecutionContext = BackgroundContext;
