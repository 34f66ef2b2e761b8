/**
 * Fetch strategies: how a gateway combines the remote source with its cache.
 *
 * All strategies emit Pending first. Failures are classified into
 * PipelineErrors before they reach an Outcome. When every path fails, the
 * first failure of the invocation is the one surfaced.
 */

import type { Logger } from "../lib/logger/index.js";
import { CacheError, classifyError } from "../shared/errors.js";
import type { PipelineError } from "../shared/errors.js";
import type { ErrorInfo, Outcome } from "../shared/outcome.js";
import { failure, pending, success, toErrorInfo } from "../shared/outcome.js";
import type { Result } from "../shared/result.js";
import { tryCatchAsync } from "../shared/result.js";

/** A remote fetch plus the cache slot that mirrors it. */
export interface CachedSources<T> {
	/** Cache key, also bound to log lines */
	readonly key: string;
	fetchRemote(): Promise<T>;
	/** Resolves to `undefined` on a cache miss */
	readCache(): Promise<T | undefined>;
	writeCache(value: T): Promise<void>;
}

function cacheError(key: string, op: "read" | "write"): (error: unknown) => CacheError {
	return (error: unknown): CacheError =>
		error instanceof CacheError
			? error
			: new CacheError(`Cache ${op} failed for ${key}`, { key, cause: error });
}

/**
 * Write a fresh remote value through to the cache. A failed write, thrown or
 * rejected, is logged as a CacheError and never reaches the caller.
 */
export async function persist(key: string, write: () => Promise<void>, logger: Logger): Promise<void> {
	const written = await tryCatchAsync(write, cacheError(key, "write"));
	if (!written.ok) {
		logger.warn({ key, err: written.error }, "Cache write failed; serving remote value");
	}
}

// ── Strategies ───────────────────────────────────────────────────────

/** One remote call: `[Pending, Success | Failure]`. */
export async function* singleFetch<T>(
	fetchRemote: () => Promise<T>,
): AsyncGenerator<Outcome<T>, void, undefined> {
	yield pending();
	const remote = await tryCatchAsync(fetchRemote, classifyError);
	yield remote.ok ? success(remote.value) : failure(toErrorInfo(remote.error));
}

/**
 * Remote first, cache as fallback. A remote success is written to the cache;
 * a remote failure is logged and answered from the cache when it holds a
 * value. If the cache is empty or unreadable, the remote failure is surfaced.
 */
export async function* remoteFirst<T>(
	sources: CachedSources<T>,
	logger: Logger,
): AsyncGenerator<Outcome<T>, void, undefined> {
	yield pending();

	const remote = await tryCatchAsync(() => sources.fetchRemote(), classifyError);
	if (remote.ok) {
		const fresh = remote.value;
		await persist(sources.key, () => sources.writeCache(fresh), logger);
		yield success(fresh);
		return;
	}

	logger.warn({ key: sources.key, err: remote.error }, "Remote fetch failed; falling back to cache");

	const cached = await tryCatchAsync(() => sources.readCache(), cacheError(sources.key, "read"));
	if (cached.ok && cached.value !== undefined) {
		yield success(cached.value);
		return;
	}
	if (!cached.ok) {
		logger.warn({ key: sources.key, err: cached.error }, "Cache fallback failed");
	}
	yield failure(toErrorInfo(remote.error));
}

/**
 * Cache first, then refresh from the remote. A cached value is emitted before
 * the remote call starts; a fresh remote value is written back and emitted as
 * a second Success. A refresh failure after a cached value is suppressed.
 */
export async function* cacheFirst<T>(
	sources: CachedSources<T>,
	logger: Logger,
): AsyncGenerator<Outcome<T>, void, undefined> {
	yield pending();

	const cached = await tryCatchAsync(() => sources.readCache(), cacheError(sources.key, "read"));
	if (!cached.ok) {
		logger.warn({ key: sources.key, err: cached.error }, "Cache read failed; fetching remote");
	}
	const preview = cached.ok ? cached.value : undefined;
	if (preview !== undefined) {
		yield success(preview);
	}

	const remote = await tryCatchAsync(() => sources.fetchRemote(), classifyError);
	if (remote.ok) {
		const fresh = remote.value;
		await persist(sources.key, () => sources.writeCache(fresh), logger);
		yield success(fresh);
		return;
	}

	if (preview !== undefined) {
		logger.debug({ key: sources.key, err: remote.error }, "Refresh failed; keeping cached value");
		return;
	}
	const firstFailure: PipelineError = cached.ok ? remote.error : cached.error;
	yield failure(toErrorInfo(firstFailure));
}

/** Single-shot counterpart of `singleFetch`. */
export function executeFetch<T>(fetchRemote: () => Promise<T>): Promise<Result<T, ErrorInfo>> {
	return tryCatchAsync(fetchRemote, (error) => toErrorInfo(classifyError(error)));
}
