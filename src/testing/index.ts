/**
 * In-process stand-ins for tests and examples: a scripted remote API, a
 * recording logger, and record/movie builders.
 */

import type { Movie } from "../domain/movie.js";
import type { MovieApi } from "../gateway/movie-api.js";
import type { MovieRecord } from "../gateway/movie-mapper.js";
import type { CacheStore } from "../lib/cache/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { MovieId } from "../shared/identifiers.js";
import { movieId } from "../shared/identifiers.js";

// ── Builders ─────────────────────────────────────────────────────────

export function movieRecord(id: number, overrides: Partial<MovieRecord> = {}): MovieRecord {
	return {
		id,
		title: `Movie ${id}`,
		overview: `Overview of movie ${id}`,
		poster_path: `/poster-${id}.jpg`,
		backdrop_path: null,
		release_date: "2024-05-01",
		vote_average: 7.5,
		vote_count: 120,
		...overrides,
	};
}

/** The domain value `toMovie(movieRecord(id))` produces. */
export function sampleMovie(id: number, overrides: Partial<Movie> = {}): Movie {
	return {
		id: movieId(id),
		title: `Movie ${id}`,
		overview: `Overview of movie ${id}`,
		posterPath: `/poster-${id}.jpg`,
		backdropPath: null,
		releaseDate: "2024-05-01",
		voteAverage: 7.5,
		voteCount: 120,
		...overrides,
	};
}

export function listResponse(records: readonly MovieRecord[], page = 1): Record<string, unknown> {
	return {
		page,
		results: records,
		total_pages: 1,
		total_results: records.length,
	};
}

// ── Deferred ─────────────────────────────────────────────────────────

export interface Deferred<T> {
	readonly promise: Promise<T>;
	resolve(value: T): void;
	reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {};
	let reject: (error: unknown) => void = () => {};
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

// ── Scripted API ─────────────────────────────────────────────────────

type Responder<A extends unknown[]> = (...args: A) => Promise<unknown>;

/**
 * MovieApi whose answers are set per endpoint. Unscripted endpoints reject.
 * Every call is recorded in `calls`.
 */
export class FakeMovieApi implements MovieApi {
	readonly calls: { endpoint: string; args: readonly unknown[] }[] = [];
	popular: Responder<[number, AbortSignal]> = async () => {
		throw new Error("popular not scripted");
	};
	details: Responder<[MovieId, AbortSignal]> = async () => {
		throw new Error("details not scripted");
	};
	search: Responder<[string, number, AbortSignal]> = async () => {
		throw new Error("search not scripted");
	};

	getPopularMovies(page: number, signal: AbortSignal): Promise<unknown> {
		this.calls.push({ endpoint: "popular", args: [page] });
		return this.popular(page, signal);
	}

	getMovieDetails(id: MovieId, signal: AbortSignal): Promise<unknown> {
		this.calls.push({ endpoint: "details", args: [id] });
		return this.details(id, signal);
	}

	searchMovies(query: string, page: number, signal: AbortSignal): Promise<unknown> {
		this.calls.push({ endpoint: "search", args: [query, page] });
		return this.search(query, page, signal);
	}

	callCount(endpoint: "popular" | "details" | "search"): number {
		return this.calls.filter((c) => c.endpoint === endpoint).length;
	}
}

/** CacheStore whose every call rejects. */
export class FailingCacheStore<V> implements CacheStore<V> {
	async read(_key: string): Promise<V | undefined> {
		throw new Error("disk unavailable");
	}

	async write(_key: string, _value: V): Promise<void> {
		throw new Error("disk unavailable");
	}
}

// ── Recording logger ─────────────────────────────────────────────────

export interface LogEntry {
	readonly level: "info" | "warn" | "error" | "debug";
	readonly msg: string;
	readonly fields: Record<string, unknown>;
}

export interface RecordingLogger extends Logger {
	readonly entries: LogEntry[];
}

/** Logger that keeps every entry in memory; children share the parent's list. */
export function recordingLogger(
	entries: LogEntry[] = [],
	bindings: Record<string, unknown> = {},
): RecordingLogger {
	const record =
		(level: LogEntry["level"]) =>
		(msgOrObj: string | Record<string, unknown>, msg?: string): void => {
			if (typeof msgOrObj === "string") {
				entries.push({ level, msg: msgOrObj, fields: { ...bindings } });
			} else {
				entries.push({ level, msg: msg ?? "", fields: { ...bindings, ...msgOrObj } });
			}
		};
	return {
		entries,
		info: record("info"),
		warn: record("warn"),
		error: record("error"),
		debug: record("debug"),
		child: (extra) => recordingLogger(entries, { ...bindings, ...extra }),
	};
}
