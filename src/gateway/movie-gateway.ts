/**
 * RemoteMovieGateway: MovieGateway over the remote catalogue API with an
 * optional pair of cache stores.
 *
 * Popular movies default to remote-first (fresh when online, cached when
 * not); movie details default to cache-first (instant when seen before).
 * Search results are never cached. Without caches every query is a single
 * remote fetch.
 */

import type { MovieGateway } from "../domain/movie-gateway.js";
import type { Movie } from "../domain/movie.js";
import type { CacheStore } from "../lib/cache/index.js";
import type { Logger } from "../lib/logger/index.js";
import { SILENT_LOGGER } from "../lib/logger/index.js";
import { DEFAULT_PIPELINE_CONFIG } from "../shared/config.js";
import type { MovieId, QueryKey } from "../shared/identifiers.js";
import { queryKey } from "../shared/identifiers.js";
import type { ErrorInfo, Outcome } from "../shared/outcome.js";
import type { Result } from "../shared/result.js";
import type { MovieApi } from "./movie-api.js";
import { parseMovie, parseMovieList } from "./movie-mapper.js";
import { cacheFirst, executeFetch, persist, remoteFirst, singleFetch } from "./strategies.js";
import { withTimeout } from "./timeout.js";

export const FetchStrategy = {
	RemoteFirst: "remote-first",
	CacheFirst: "cache-first",
	NetworkOnly: "network-only",
} as const;

export type FetchStrategy = (typeof FetchStrategy)[keyof typeof FetchStrategy];

export interface MovieGatewayCaches {
	readonly lists: CacheStore<readonly Movie[]>;
	readonly details: CacheStore<Movie>;
}

export interface RemoteMovieGatewayDeps {
	readonly api: MovieApi;
	readonly cache?: MovieGatewayCaches | undefined;
	readonly logger?: Logger | undefined;
}

export interface RemoteMovieGatewayOptions {
	readonly popularStrategy?: FetchStrategy | undefined;
	readonly detailsStrategy?: FetchStrategy | undefined;
	readonly fetchTimeoutMs?: number | undefined;
}

export const QueryKeys = {
	popularMovies: (): QueryKey => queryKey("popular-movies"),
	movieDetails: (id: MovieId): QueryKey => queryKey("movie-details", id),
} as const;

export class RemoteMovieGateway implements MovieGateway {
	private readonly api: MovieApi;
	private readonly cache: MovieGatewayCaches | undefined;
	private readonly logger: Logger;
	private readonly popularStrategy: FetchStrategy;
	private readonly detailsStrategy: FetchStrategy;
	private readonly fetchTimeoutMs: number;

	constructor(deps: RemoteMovieGatewayDeps, options: RemoteMovieGatewayOptions = {}) {
		this.api = deps.api;
		this.cache = deps.cache;
		this.logger = (deps.logger ?? SILENT_LOGGER).child({ component: "movie-gateway" });
		this.popularStrategy = options.popularStrategy ?? FetchStrategy.RemoteFirst;
		this.detailsStrategy = options.detailsStrategy ?? FetchStrategy.CacheFirst;
		this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_PIPELINE_CONFIG.fetchTimeoutMs;
	}

	getPopularMovies(signal?: AbortSignal): AsyncIterable<Outcome<readonly Movie[]>> {
		return this.query<readonly Movie[]>(
			this.popularStrategy,
			QueryKeys.popularMovies(),
			async () => parseMovieList(await this.remote((s) => this.api.getPopularMovies(1, s), signal)),
			this.cache?.lists,
		);
	}

	getMovieDetails(id: MovieId, signal?: AbortSignal): AsyncIterable<Outcome<Movie>> {
		return this.query<Movie>(
			this.detailsStrategy,
			QueryKeys.movieDetails(id),
			() => this.fetchDetails(id, signal),
			this.cache?.details,
		);
	}

	searchMovies(query: string, signal?: AbortSignal): AsyncIterable<Outcome<readonly Movie[]>> {
		return singleFetch(async () =>
			parseMovieList(await this.remote((s) => this.api.searchMovies(query, 1, s), signal)),
		);
	}

	async fetchMovieDetails(id: MovieId, signal?: AbortSignal): Promise<Result<Movie, ErrorInfo>> {
		const result = await executeFetch(() => this.fetchDetails(id, signal));
		const details = this.cache?.details;
		if (result.ok && details !== undefined) {
			const key = QueryKeys.movieDetails(id);
			const movie = result.value;
			await persist(key, () => details.write(key, movie), this.logger);
		}
		return result;
	}

	// ── Internal ──────────────────────────────────────────────────

	private async fetchDetails(id: MovieId, signal: AbortSignal | undefined): Promise<Movie> {
		return parseMovie(await this.remote((s) => this.api.getMovieDetails(id, s), signal));
	}

	private remote(
		call: (signal: AbortSignal) => Promise<unknown>,
		signal: AbortSignal | undefined,
	): Promise<unknown> {
		return withTimeout(call, this.fetchTimeoutMs, signal);
	}

	private query<T>(
		strategy: FetchStrategy,
		key: QueryKey,
		fetchRemote: () => Promise<T>,
		cache: CacheStore<T> | undefined,
	): AsyncIterable<Outcome<T>> {
		if (cache === undefined || strategy === FetchStrategy.NetworkOnly) {
			return singleFetch(fetchRemote);
		}
		const sources = {
			key,
			fetchRemote,
			readCache: () => cache.read(key),
			writeCache: (value: T) => cache.write(key, value),
		};
		return strategy === FetchStrategy.RemoteFirst
			? remoteFirst(sources, this.logger)
			: cacheFirst(sources, this.logger);
	}
}
