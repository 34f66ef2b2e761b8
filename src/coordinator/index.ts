export {
	type ScreenState,
	LOADING,
	EMPTY,
	errorState,
	isEmptyCollection,
	toScreenState,
} from "./screen-state.js";

export { type CoordinatorOptions, Coordinator } from "./coordinator.js";

export {
	type MoviesState,
	type MoviesNotification,
	MoviesCoordinator,
} from "./movies-coordinator.js";

export { type MovieSearchState, MovieSearchCoordinator } from "./movie-search-coordinator.js";

export {
	type MovieDetailsState,
	type MovieDetailsNotification,
	type MovieDetailsOperations,
	MovieDetailsCoordinator,
} from "./movie-details-coordinator.js";
