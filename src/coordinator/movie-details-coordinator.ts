import type { Movie } from "../domain/movie.js";
import type { Operation, SingleShotOperation } from "../operation/operation.js";
import type { MovieId } from "../shared/identifiers.js";
import { Coordinator } from "./coordinator.js";
import type { CoordinatorOptions } from "./coordinator.js";
import { LOADING, errorState, toScreenState } from "./screen-state.js";
import type { ScreenState } from "./screen-state.js";

export type MovieDetailsState = ScreenState<Movie>;

export type MovieDetailsNotification = { readonly type: "show-message"; readonly message: string };

export interface MovieDetailsOperations {
	readonly getMovieDetails: Operation<MovieId, Movie>;
	readonly refreshMovieDetails: SingleShotOperation<MovieId, Movie>;
}

/**
 * Details screen for one movie. `refresh` re-fetches without going back to
 * `loading`: a success replaces the data, a failure only raises a
 * `show-message` notification.
 */
export class MovieDetailsCoordinator extends Coordinator<MovieDetailsState, MovieDetailsNotification> {
	private readonly operations: MovieDetailsOperations;
	private currentId: MovieId | undefined;

	constructor(operations: MovieDetailsOperations, options: CoordinatorOptions = {}) {
		super(LOADING, { name: "movie-details", ...options });
		this.operations = operations;
	}

	get movieId(): MovieId | undefined {
		return this.currentId;
	}

	load(movieId: MovieId): Promise<void> {
		this.currentId = movieId;
		return this.launch(
			"load-details",
			(signal) => this.operations.getMovieDetails.invoke(movieId, signal),
			(outcome) => this.setState(() => toScreenState(outcome, this.defaultErrorMessage)),
		);
	}

	retry(): Promise<void> {
		if (this.currentId === undefined) return Promise.resolve();
		return this.load(this.currentId);
	}

	refresh(): Promise<void> {
		const movieId = this.currentId;
		if (movieId === undefined) return Promise.resolve();
		return this.launchOnce(
			"refresh-details",
			(signal) => this.operations.refreshMovieDetails.invoke(movieId, signal),
			(result) => {
				if (result.ok) {
					this.setState(() => ({ status: "success", data: result.value }));
				} else {
					this.notify({
						type: "show-message",
						message: result.error.message ?? this.defaultErrorMessage,
					});
				}
			},
		);
	}

	protected faultState(message: string): MovieDetailsState {
		return errorState(message);
	}
}
