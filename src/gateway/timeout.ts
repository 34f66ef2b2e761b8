import { TimeoutError } from "../shared/errors.js";

/**
 * Run `task` with a time budget. The task receives a signal that aborts when
 * the budget runs out or when `parent` aborts; on timeout the returned promise
 * rejects with TimeoutError. A non-finite or non-positive budget disables the
 * timer.
 */
export async function withTimeout<T>(
	task: (signal: AbortSignal) => Promise<T>,
	timeoutMs: number,
	parent?: AbortSignal,
): Promise<T> {
	const controller = new AbortController();
	const onParentAbort = (): void => {
		controller.abort(parent?.reason);
	};
	if (parent?.aborted) {
		controller.abort(parent.reason);
	} else {
		parent?.addEventListener("abort", onParentAbort, { once: true });
	}

	if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
		try {
			return await task(controller.signal);
		} finally {
			parent?.removeEventListener("abort", onParentAbort);
		}
	}

	let timer: ReturnType<typeof setTimeout> | undefined;
	const expired = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			const error = new TimeoutError(`Request timed out after ${timeoutMs}ms`, timeoutMs);
			controller.abort(error);
			reject(error);
		}, timeoutMs);
	});

	try {
		return await Promise.race([task(controller.signal), expired]);
	} finally {
		clearTimeout(timer);
		parent?.removeEventListener("abort", onParentAbort);
	}
}
