export {
	type ExecutionContext,
	BackgroundContext,
	CallerContext,
	DEFAULT_EXECUTION_CONTEXT,
} from "./execution-context.js";

export {
	type Operation,
	type OperationNoParams,
	type OperationOptions,
	type SingleShotOperation,
	type OutcomeProducer,
	type ResultProducer,
	createOperation,
	createOperationNoParams,
	createSingleShotOperation,
} from "./operation.js";

export {
	type MovieOperationOptions,
	type SearchMoviesOptions,
	getPopularMoviesOperation,
	getMovieDetailsOperation,
	searchMoviesOperation,
	refreshMovieDetailsOperation,
} from "./movie-operations.js";
