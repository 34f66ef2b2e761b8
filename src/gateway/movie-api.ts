/**
 * MovieApi: raw remote calls against the catalogue's REST endpoints.
 *
 * Responses are returned unparsed; the gateway maps them. The request URL is
 * never logged or put into an error because it carries the API key.
 */

import { ConfigError, MappingError, PipelineError, TransportError } from "../shared/errors.js";
import type { MovieId } from "../shared/identifiers.js";

export interface MovieApi {
	getPopularMovies(page: number, signal: AbortSignal): Promise<unknown>;
	getMovieDetails(id: MovieId, signal: AbortSignal): Promise<unknown>;
	searchMovies(query: string, page: number, signal: AbortSignal): Promise<unknown>;
}

export interface HttpMovieApiConfig {
	/** e.g. `https://api.themoviedb.org/3/` */
	readonly baseUrl: string;
	readonly apiKey: string;
	/** Injectable for tests; defaults to the global fetch */
	readonly fetchFn?: typeof fetch | undefined;
}

export class HttpMovieApi implements MovieApi {
	private readonly baseUrl: string;
	private readonly apiKey: string;
	private readonly fetchFn: typeof fetch;

	constructor(config: HttpMovieApiConfig) {
		if (config.apiKey.trim().length === 0) {
			throw new ConfigError("HttpMovieApi requires a non-empty apiKey");
		}
		this.baseUrl = config.baseUrl.endsWith("/") ? config.baseUrl : `${config.baseUrl}/`;
		this.apiKey = config.apiKey;
		this.fetchFn = config.fetchFn ?? fetch;
	}

	getPopularMovies(page: number, signal: AbortSignal): Promise<unknown> {
		return this.request("movie/popular", { page }, signal);
	}

	getMovieDetails(id: MovieId, signal: AbortSignal): Promise<unknown> {
		return this.request(`movie/${id}`, {}, signal);
	}

	searchMovies(query: string, page: number, signal: AbortSignal): Promise<unknown> {
		return this.request("search/movie", { query, page }, signal);
	}

	private async request(
		path: string,
		params: Record<string, string | number>,
		signal: AbortSignal,
	): Promise<unknown> {
		const url = new URL(path, this.baseUrl);
		url.searchParams.set("api_key", this.apiKey);
		for (const [name, value] of Object.entries(params)) {
			url.searchParams.set(name, String(value));
		}

		let response: Response;
		try {
			response = await this.fetchFn(url, { signal, headers: { accept: "application/json" } });
		} catch (error: unknown) {
			if (signal.aborted && signal.reason instanceof PipelineError) throw signal.reason;
			throw new TransportError(`Request to ${path} failed`, { path, cause: error });
		}

		if (!response.ok) {
			throw new TransportError(`Request to ${path} failed with HTTP ${response.status}`, {
				path,
				status: response.status,
			});
		}

		try {
			return await response.json();
		} catch (error: unknown) {
			throw new MappingError(`Response from ${path} is not valid JSON`, { path, cause: error });
		}
	}
}
