import type { Movie } from "../domain/movie.js";
import type { OperationNoParams } from "../operation/operation.js";
import type { MovieId } from "../shared/identifiers.js";
import { Coordinator } from "./coordinator.js";
import type { CoordinatorOptions } from "./coordinator.js";
import { LOADING, errorState, toScreenState } from "./screen-state.js";
import type { ScreenState } from "./screen-state.js";

export type MoviesState = ScreenState<readonly Movie[]>;

export type MoviesNotification = { readonly type: "navigate-to-details"; readonly movieId: MovieId };

/** Popular-movies list screen. */
export class MoviesCoordinator extends Coordinator<MoviesState, MoviesNotification> {
	private readonly getPopularMovies: OperationNoParams<readonly Movie[]>;

	constructor(getPopularMovies: OperationNoParams<readonly Movie[]>, options: CoordinatorOptions = {}) {
		super(LOADING, { name: "movies", ...options });
		this.getPopularMovies = getPopularMovies;
	}

	/** Initial load; resolves once the stream has ended. */
	start(): Promise<void> {
		return this.loadMovies();
	}

	loadMovies(): Promise<void> {
		return this.launch(
			"load-movies",
			(signal) => this.getPopularMovies.invoke(signal),
			(outcome) => this.setState(() => toScreenState(outcome, this.defaultErrorMessage)),
		);
	}

	/** Re-run the load from a clean Pending state. */
	retry(): Promise<void> {
		return this.loadMovies();
	}

	selectMovie(movieId: MovieId): void {
		this.notify({ type: "navigate-to-details", movieId });
	}

	protected faultState(message: string): MoviesState {
		return errorState(message);
	}
}
