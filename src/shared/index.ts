export { type MovieId, type QueryKey, movieId, queryKey } from "./identifiers.js";

export {
	type Outcome,
	type PendingOutcome,
	type SuccessOutcome,
	type FailureOutcome,
	type TerminalOutcome,
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
} from "./outcome.js";

export {
	type Result,
	ok,
	err,
	map,
	unwrapOr,
	isOk,
	isErr,
	tryCatchAsync,
} from "./result.js";

export {
	ErrorCategory,
	type ErrorContext,
	PipelineError,
	TransportError,
	TimeoutError,
	MappingError,
	CacheError,
	CoordinatorFault,
	ConfigError,
	classifyError,
	isTransportError,
	isMappingError,
	isCacheError,
	isCoordinatorFault,
} from "./errors.js";

export {
	type PipelineConfig,
	type ConfigLogLevel,
	LOG_LEVELS,
	DEFAULT_PIPELINE_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
