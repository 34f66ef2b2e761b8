import type { Movie } from "../domain/movie.js";
import type { Operation } from "../operation/operation.js";
import { Coordinator } from "./coordinator.js";
import type { CoordinatorOptions } from "./coordinator.js";
import { EMPTY, errorState, toScreenState } from "./screen-state.js";
import type { ScreenState } from "./screen-state.js";

export type MovieSearchState = ScreenState<readonly Movie[]>;

/**
 * Search screen. Starts `empty`; each `search` call runs independently and
 * the last element to arrive wins, so a slow early query can overwrite a
 * faster later one.
 */
export class MovieSearchCoordinator extends Coordinator<MovieSearchState> {
	private readonly searchMovies: Operation<string, readonly Movie[]>;
	private lastQuery: string | undefined;

	constructor(searchMovies: Operation<string, readonly Movie[]>, options: CoordinatorOptions = {}) {
		super(EMPTY, { name: "movie-search", ...options });
		this.searchMovies = searchMovies;
	}

	get query(): string | undefined {
		return this.lastQuery;
	}

	search(query: string): Promise<void> {
		this.lastQuery = query;
		return this.launch(
			"search",
			(signal) => this.searchMovies.invoke(query, signal),
			(outcome) => this.setState(() => toScreenState(outcome, this.defaultErrorMessage)),
		);
	}

	/** Repeat the last query; a no-op before the first search. */
	retry(): Promise<void> {
		if (this.lastQuery === undefined) return Promise.resolve();
		return this.search(this.lastQuery);
	}

	protected faultState(message: string): MovieSearchState {
		return errorState(message);
	}
}
