/**
 * Operation decorators: wrap a raw producer with the stream discipline every
 * consumer relies on:
 *
 * - Pending is always the first element, exactly once.
 * - A throw while building or iterating the producer ends the stream with a
 *   single Failure carrying the thrown value; nothing escapes as an exception.
 * - Each producer step runs on the operation's ExecutionContext.
 * - Once the caller's signal aborts, no further element is yielded and the
 *   producer is closed.
 */

import type { Logger } from "../lib/logger/index.js";
import { SILENT_LOGGER } from "../lib/logger/index.js";
import type { ErrorInfo, Outcome } from "../shared/outcome.js";
import { failure, isPending, pending, toErrorInfo } from "../shared/outcome.js";
import type { Result } from "../shared/result.js";
import { err } from "../shared/result.js";
import { DEFAULT_EXECUTION_CONTEXT } from "./execution-context.js";
import type { ExecutionContext } from "./execution-context.js";

// ── Types ────────────────────────────────────────────────────────────

export interface OperationOptions {
	/** Name bound to every log line of the operation */
	readonly name: string;
	/** Defaults to BackgroundContext */
	readonly context?: ExecutionContext | undefined;
	readonly logger?: Logger | undefined;
}

/** Business operation producing a fresh Outcome stream per invocation. */
export interface Operation<P, T> {
	readonly name: string;
	invoke(params: P, signal?: AbortSignal): AsyncIterable<Outcome<T>>;
}

export interface OperationNoParams<T> {
	readonly name: string;
	invoke(signal?: AbortSignal): AsyncIterable<Outcome<T>>;
}

/** Operation with exactly one response and no Pending phase. */
export interface SingleShotOperation<P, T> {
	readonly name: string;
	invoke(params: P, signal?: AbortSignal): Promise<Result<T, ErrorInfo>>;
}

export type OutcomeProducer<P, T> = (
	params: P,
	signal: AbortSignal | undefined,
) => AsyncIterable<Outcome<T>>;

export type ResultProducer<P, T> = (
	params: P,
	signal: AbortSignal | undefined,
) => Promise<Result<T, ErrorInfo>>;

// ── Stream driver ────────────────────────────────────────────────────

async function* drive<T>(
	produce: () => AsyncIterable<Outcome<T>>,
	context: ExecutionContext,
	logger: Logger,
	signal: AbortSignal | undefined,
): AsyncGenerator<Outcome<T>, void, undefined> {
	if (signal?.aborted) return;
	yield pending();

	let iterator: AsyncIterator<Outcome<T>> | undefined;
	let leading = true;
	try {
		const it = produce()[Symbol.asyncIterator]();
		iterator = it;
		while (true) {
			const step = await context.run(() => it.next());
			if (signal?.aborted || step.done) return;

			const outcome = step.value;
			if (leading) {
				leading = false;
				if (isPending(outcome)) continue;
			}
			yield outcome;
		}
	} catch (error: unknown) {
		if (signal?.aborted) return;
		logger.debug({ err: error }, "Operation failed");
		yield failure(toErrorInfo(error));
	} finally {
		await closeQuietly(iterator, logger);
	}
}

async function closeQuietly<T>(iterator: AsyncIterator<T> | undefined, logger: Logger): Promise<void> {
	if (iterator?.return === undefined) return;
	try {
		await iterator.return();
	} catch (error: unknown) {
		logger.warn({ err: error }, "Producer failed while closing");
	}
}

function resolveOptions(options: OperationOptions): {
	context: ExecutionContext;
	logger: Logger;
} {
	return {
		context: options.context ?? DEFAULT_EXECUTION_CONTEXT,
		logger: (options.logger ?? SILENT_LOGGER).child({ operation: options.name }),
	};
}

// ── Factories ────────────────────────────────────────────────────────

/**
 * Build an Operation from a raw producer.
 *
 * @example
 * ```ts
 * const getDetails = createOperation(
 *   (id: MovieId, signal) => gateway.getMovieDetails(id, signal),
 *   { name: "get-movie-details" },
 * );
 * for await (const outcome of getDetails.invoke(movieId(42))) render(outcome);
 * ```
 */
export function createOperation<P, T>(
	execute: OutcomeProducer<P, T>,
	options: OperationOptions,
): Operation<P, T> {
	const { context, logger } = resolveOptions(options);
	return {
		name: options.name,
		invoke: (params: P, signal?: AbortSignal) =>
			drive(() => execute(params, signal), context, logger, signal),
	};
}

export function createOperationNoParams<T>(
	execute: (signal: AbortSignal | undefined) => AsyncIterable<Outcome<T>>,
	options: OperationOptions,
): OperationNoParams<T> {
	const { context, logger } = resolveOptions(options);
	return {
		name: options.name,
		invoke: (signal?: AbortSignal) => drive(() => execute(signal), context, logger, signal),
	};
}

/** Build a SingleShotOperation; a throw from `execute` resolves to `err(ErrorInfo)`. */
export function createSingleShotOperation<P, T>(
	execute: ResultProducer<P, T>,
	options: OperationOptions,
): SingleShotOperation<P, T> {
	const { context, logger } = resolveOptions(options);
	return {
		name: options.name,
		async invoke(params: P, signal?: AbortSignal): Promise<Result<T, ErrorInfo>> {
			try {
				return await context.run(() => execute(params, signal));
			} catch (error: unknown) {
				logger.debug({ err: error }, "Operation failed");
				return err(toErrorInfo(error));
			}
		},
	};
}
