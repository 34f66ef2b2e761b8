// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type MovieId,
	type QueryKey,
	movieId,
	queryKey,
	type Outcome,
	type ErrorInfo,
	type OutcomeHandlers,
	pending,
	success,
	failure,
	toErrorInfo,
	isPending,
	isSuccess,
	isFailure,
	isTerminal,
	matchOutcome,
	collectOutcomes,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	ErrorCategory,
	PipelineError,
	TransportError,
	TimeoutError,
	MappingError,
	CacheError,
	CoordinatorFault,
	ConfigError,
	classifyError,
	type PipelineConfig,
	DEFAULT_PIPELINE_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger } from "./lib/logger/index.js";
export { type CacheStore, MemoryCacheStore } from "./lib/cache/index.js";
export { TypedEmitter } from "./lib/events/index.js";
export { ValidationError } from "./lib/validation/index.js";

// ── Domain ───────────────────────────────────────────────────────────
export { type Movie, type MovieGateway } from "./domain/index.js";

// ── Operations ───────────────────────────────────────────────────────
export {
	type ExecutionContext,
	BackgroundContext,
	CallerContext,
	type Operation,
	type OperationNoParams,
	type SingleShotOperation,
	type OperationOptions,
	createOperation,
	createOperationNoParams,
	createSingleShotOperation,
	getPopularMoviesOperation,
	getMovieDetailsOperation,
	searchMoviesOperation,
	refreshMovieDetailsOperation,
} from "./operation/index.js";

// ── Gateway ──────────────────────────────────────────────────────────
export {
	type CachedSources,
	singleFetch,
	remoteFirst,
	cacheFirst,
	executeFetch,
	withTimeout,
	parseMovie,
	parseMovieList,
	imageUrl,
	type MovieApi,
	HttpMovieApi,
	FetchStrategy,
	QueryKeys,
	type MovieGatewayCaches,
	RemoteMovieGateway,
} from "./gateway/index.js";

// ── Coordinators ─────────────────────────────────────────────────────
export {
	type ScreenState,
	toScreenState,
	Coordinator,
	type CoordinatorOptions,
	MoviesCoordinator,
	type MoviesNotification,
	MovieSearchCoordinator,
	MovieDetailsCoordinator,
	type MovieDetailsNotification,
} from "./coordinator/index.js";
