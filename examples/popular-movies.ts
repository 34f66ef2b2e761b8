/**
 * Popular Movies
 *
 * Wires the whole pipeline against the live catalogue API:
 * - Loads the popular list remote-first, with an in-memory cache behind it
 * - Opens the details of the first movie cache-first
 * - Runs one title search
 *
 * Requires REELKIT_API_KEY. Other REELKIT_* variables are optional.
 */

import type { Movie, ScreenState } from "../src/index.js";
import {
	HttpMovieApi,
	MemoryCacheStore,
	MovieDetailsCoordinator,
	MovieSearchCoordinator,
	MoviesCoordinator,
	RemoteMovieGateway,
	createLogger,
	getMovieDetailsOperation,
	getPopularMoviesOperation,
	imageUrl,
	refreshMovieDetailsOperation,
	resolveConfig,
	searchMoviesOperation,
} from "../src/index.js";

const config = resolveConfig();
const logger = createLogger({ level: config.logLevel });

const gateway = new RemoteMovieGateway(
	{
		api: new HttpMovieApi({ baseUrl: config.apiBaseUrl, apiKey: config.apiKey }),
		cache: { lists: new MemoryCacheStore(), details: new MemoryCacheStore() },
		logger,
	},
	{ fetchTimeoutMs: config.fetchTimeoutMs },
);

const operationOptions = { logger };
const coordinatorOptions = { logger, defaultErrorMessage: config.defaultErrorMessage };

function describeState<T>(state: ScreenState<T>, render: (data: T) => string): string {
	switch (state.status) {
		case "loading":
			return "loading...";
		case "empty":
			return "nothing to show";
		case "error":
			return `error: ${state.message}`;
		case "success":
			return render(state.data);
	}
}

const listLine = (movies: readonly Movie[]): string =>
	movies
		.slice(0, 5)
		.map((m) => `${m.title} (${m.voteAverage.toFixed(1)})`)
		.join(", ");

// ── Popular list ─────────────────────────────────────────────────────

const movies = new MoviesCoordinator(getPopularMoviesOperation(gateway, operationOptions), coordinatorOptions);
movies.subscribe((state) => console.log(`[popular] ${describeState(state, listLine)}`));
movies.onNotification((n) => console.log(`[popular] navigate to movie ${n.movieId}`));
await movies.start();

// ── Details of the first movie ───────────────────────────────────────

const first = movies.state.status === "success" ? movies.state.data[0] : undefined;
if (first !== undefined) {
	movies.selectMovie(first.id);

	const details = new MovieDetailsCoordinator(
		{
			getMovieDetails: getMovieDetailsOperation(gateway, operationOptions),
			refreshMovieDetails: refreshMovieDetailsOperation(gateway, operationOptions),
		},
		coordinatorOptions,
	);
	details.subscribe((state) =>
		console.log(
			`[details] ${describeState(state, (m) => `${m.title}, ${m.releaseDate}, poster ${imageUrl(m.posterPath, "w500", config.imageBaseUrl) ?? "none"}`)}`,
		),
	);
	details.onNotification((n) => console.log(`[details] ${n.message}`));
	await details.load(first.id);
	await details.refresh();
	details.dispose();
}

// ── Search ───────────────────────────────────────────────────────────

const search = new MovieSearchCoordinator(
	searchMoviesOperation(gateway, { ...operationOptions, minQueryLength: config.minSearchQueryLength }),
	coordinatorOptions,
);
search.subscribe((state) => console.log(`[search] ${describeState(state, listLine)}`));
await search.search("the matrix");

movies.dispose();
search.dispose();
