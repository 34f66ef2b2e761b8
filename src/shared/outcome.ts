/**
 * Outcome<T>: the state of one asynchronous operation as seen by its consumer.
 *
 * Every operation and gateway query produces a stream of outcomes: Pending
 * first, then one or more terminal elements. Outcomes are readonly plain
 * values; a fresh one is built for every emission.
 */

// ── Types ────────────────────────────────────────────────────────────

/** Human-readable failure description plus the technical cause that produced it. */
export interface ErrorInfo {
	/** Message of the caught error, or `undefined` when it carried none. */
	readonly message: string | undefined;
	readonly cause: unknown;
}

export interface PendingOutcome {
	readonly status: "pending";
}

export interface SuccessOutcome<T> {
	readonly status: "success";
	readonly value: T;
}

export interface FailureOutcome {
	readonly status: "failure";
	readonly cause: ErrorInfo;
}

/** Discriminated union over the three phases of an async operation. */
export type Outcome<T> = PendingOutcome | SuccessOutcome<T> | FailureOutcome;

/** Elements that end a single fetch attempt. */
export type TerminalOutcome<T> = SuccessOutcome<T> | FailureOutcome;

// ── Factories ────────────────────────────────────────────────────────

const PENDING: PendingOutcome = Object.freeze({ status: "pending" });

export function pending(): PendingOutcome {
	return PENDING;
}

/** Wrap a value. Callers never pass `null` or `undefined`; absent data is a failure or a cache miss. */
export function success<T>(value: T): SuccessOutcome<T> {
	return { status: "success", value };
}

export function failure(cause: ErrorInfo): FailureOutcome {
	return { status: "failure", cause };
}

/** Build the ErrorInfo for a caught value. Only catch sites call this. */
export function toErrorInfo(error: unknown): ErrorInfo {
	const message =
		error instanceof Error
			? error.message
			: typeof error === "string"
				? error
				: undefined;
	return {
		message: message !== undefined && message.length > 0 ? message : undefined,
		cause: error,
	};
}

// ── Guards ───────────────────────────────────────────────────────────

export function isPending<T>(outcome: Outcome<T>): outcome is PendingOutcome {
	return outcome.status === "pending";
}

export function isSuccess<T>(outcome: Outcome<T>): outcome is SuccessOutcome<T> {
	return outcome.status === "success";
}

export function isFailure<T>(outcome: Outcome<T>): outcome is FailureOutcome {
	return outcome.status === "failure";
}

export function isTerminal<T>(outcome: Outcome<T>): outcome is TerminalOutcome<T> {
	return outcome.status !== "pending";
}

// ── Matching ─────────────────────────────────────────────────────────

/** Handlers for every Outcome variant; the compiler rejects a missing branch. */
export interface OutcomeHandlers<T, R> {
	pending(): R;
	success(value: T): R;
	failure(cause: ErrorInfo): R;
}

/** Exhaustively fold an Outcome into a single value. */
export function matchOutcome<T, R>(outcome: Outcome<T>, handlers: OutcomeHandlers<T, R>): R {
	switch (outcome.status) {
		case "pending":
			return handlers.pending();
		case "success":
			return handlers.success(outcome.value);
		case "failure":
			return handlers.failure(outcome.cause);
	}
}

/** Drain a stream into an array. Intended for tests and scripts. */
export async function collectOutcomes<T>(stream: AsyncIterable<Outcome<T>>): Promise<Outcome<T>[]> {
	const outcomes: Outcome<T>[] = [];
	for await (const outcome of stream) {
		outcomes.push(outcome);
	}
	return outcomes;
}
