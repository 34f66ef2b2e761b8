export {
	type CachedSources,
	singleFetch,
	remoteFirst,
	cacheFirst,
	executeFetch,
} from "./strategies.js";

export { withTimeout } from "./timeout.js";

export {
	MovieRecordSchema,
	MovieListResponseSchema,
	type MovieRecord,
	type MovieListResponse,
	toMovie,
	parseMovie,
	parseMovieList,
	imageUrl,
} from "./movie-mapper.js";

export { type MovieApi, type HttpMovieApiConfig, HttpMovieApi } from "./movie-api.js";

export {
	FetchStrategy,
	QueryKeys,
	type MovieGatewayCaches,
	type RemoteMovieGatewayDeps,
	type RemoteMovieGatewayOptions,
	RemoteMovieGateway,
} from "./movie-gateway.js";
