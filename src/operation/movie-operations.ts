/**
 * Movie operations: the business rules between the coordinators and the
 * MovieGateway.
 */

import type { MovieGateway } from "../domain/movie-gateway.js";
import type { Movie } from "../domain/movie.js";
import type { Logger } from "../lib/logger/index.js";
import { DEFAULT_PIPELINE_CONFIG } from "../shared/config.js";
import type { MovieId } from "../shared/identifiers.js";
import type { Outcome } from "../shared/outcome.js";
import { success } from "../shared/outcome.js";
import type { ExecutionContext } from "./execution-context.js";
import {
	type Operation,
	type OperationNoParams,
	type SingleShotOperation,
	createOperation,
	createOperationNoParams,
	createSingleShotOperation,
} from "./operation.js";

export interface MovieOperationOptions {
	readonly context?: ExecutionContext | undefined;
	readonly logger?: Logger | undefined;
}

export interface SearchMoviesOptions extends MovieOperationOptions {
	/** Queries shorter than this never reach the gateway. Default 3. */
	readonly minQueryLength?: number | undefined;
}

export function getPopularMoviesOperation(
	gateway: MovieGateway,
	options: MovieOperationOptions = {},
): OperationNoParams<readonly Movie[]> {
	return createOperationNoParams((signal) => gateway.getPopularMovies(signal), {
		...options,
		name: "get-popular-movies",
	});
}

export function getMovieDetailsOperation(
	gateway: MovieGateway,
	options: MovieOperationOptions = {},
): Operation<MovieId, Movie> {
	return createOperation((id: MovieId, signal) => gateway.getMovieDetails(id, signal), {
		...options,
		name: "get-movie-details",
	});
}

async function* noMatches(): AsyncGenerator<Outcome<readonly Movie[]>> {
	yield success([]);
}

/**
 * Search by title. A query below the minimum length is a business rule, not a
 * failure: it resolves to an empty list without touching the gateway.
 */
export function searchMoviesOperation(
	gateway: MovieGateway,
	options: SearchMoviesOptions = {},
): Operation<string, readonly Movie[]> {
	const minQueryLength = options.minQueryLength ?? DEFAULT_PIPELINE_CONFIG.minSearchQueryLength;
	return createOperation(
		(query: string, signal) => {
			if (query.length < minQueryLength) {
				return noMatches();
			}
			return gateway.searchMovies(query, signal);
		},
		{ context: options.context, logger: options.logger, name: "search-movies" },
	);
}

/** Re-fetch one movie from the remote source as a single Result. */
export function refreshMovieDetailsOperation(
	gateway: MovieGateway,
	options: MovieOperationOptions = {},
): SingleShotOperation<MovieId, Movie> {
	return createSingleShotOperation((id: MovieId, signal) => gateway.fetchMovieDetails(id, signal), {
		...options,
		name: "refresh-movie-details",
	});
}
