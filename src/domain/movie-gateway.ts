/**
 * MovieGateway: the data-access contract the operations depend on.
 *
 * Queries are streams following the operation discipline: Pending first, then
 * terminal elements. Implementations decide which sources back each query.
 */

import type { MovieId } from "../shared/identifiers.js";
import type { ErrorInfo, Outcome } from "../shared/outcome.js";
import type { Result } from "../shared/result.js";
import type { Movie } from "./movie.js";

export interface MovieGateway {
	getPopularMovies(signal?: AbortSignal): AsyncIterable<Outcome<readonly Movie[]>>;
	getMovieDetails(id: MovieId, signal?: AbortSignal): AsyncIterable<Outcome<Movie>>;
	searchMovies(query: string, signal?: AbortSignal): AsyncIterable<Outcome<readonly Movie[]>>;
	/** Single-shot remote fetch of one movie, bypassing the cache preview. */
	fetchMovieDetails(id: MovieId, signal?: AbortSignal): Promise<Result<Movie, ErrorInfo>>;
}
