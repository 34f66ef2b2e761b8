/**
 * Raw record schemas for the remote catalogue and their mapping to the
 * domain model. Mapping is pure; validation failures raise MappingError.
 */

import type { Movie } from "../domain/movie.js";
import { formatIssues, validate, z } from "../lib/validation/index.js";
import { MappingError } from "../shared/errors.js";
import { movieId } from "../shared/identifiers.js";

export const MovieRecordSchema = z.object({
	id: z.number().int().positive(),
	title: z.string(),
	overview: z.string().default(""),
	poster_path: z.string().nullable().optional(),
	backdrop_path: z.string().nullable().optional(),
	release_date: z.string().default(""),
	vote_average: z.number().default(0),
	vote_count: z.number().int().nonnegative().default(0),
});

export type MovieRecord = z.infer<typeof MovieRecordSchema>;

export const MovieListResponseSchema = z.object({
	page: z.number().int(),
	results: z.array(MovieRecordSchema),
	total_pages: z.number().int(),
	total_results: z.number().int(),
});

export type MovieListResponse = z.infer<typeof MovieListResponseSchema>;

/** Field mapping from a validated record to the domain model. */
export function toMovie(record: MovieRecord): Movie {
	return {
		id: movieId(record.id),
		title: record.title,
		overview: record.overview,
		posterPath: record.poster_path ?? null,
		backdropPath: record.backdrop_path ?? null,
		releaseDate: record.release_date,
		voteAverage: record.vote_average,
		voteCount: record.vote_count,
	};
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T {
	const result = validate(schema, raw);
	if (!result.ok) {
		throw new MappingError(`Malformed ${what}: ${formatIssues(result.error.issues)}`, {
			cause: result.error,
		});
	}
	return result.value;
}

/** @throws MappingError when `raw` is not a movie record */
export function parseMovie(raw: unknown): Movie {
	return toMovie(parse(MovieRecordSchema, raw, "movie record"));
}

/** @throws MappingError when `raw` is not a movie list response */
export function parseMovieList(raw: unknown): Movie[] {
	return parse(MovieListResponseSchema, raw, "movie list").results.map(toMovie);
}

/**
 * Absolute image URL for a poster or backdrop path, or `null` without a path.
 * @example imageUrl("/abc.jpg", "w500", "https://img.example/t/p/") // "https://img.example/t/p/w500/abc.jpg"
 */
export function imageUrl(path: string | null, size: string, baseUrl: string): string | null {
	if (path === null || path.length === 0) return null;
	const base = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
	const rel = path.startsWith("/") ? path : `/${path}`;
	return `${base}/${size}${rel}`;
}
