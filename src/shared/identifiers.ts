/**
 * Domain primitive identifiers: branded types for compile-time safety.
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Remote catalogue identifier of a movie. */
export type MovieId = Brand<number, "MovieId">;

/** Identifies one logical query, e.g. `popular-movies` or `movie-details:42`. */
export type QueryKey = Brand<string, "QueryKey">;

/** Create a validated MovieId. Throws if the value is not a positive integer. */
export function movieId(value: number): MovieId {
	if (!Number.isInteger(value) || value <= 0) {
		throw new Error(`MovieId must be a positive integer, got ${value}`);
	}
	return value as MovieId;
}

/** Create a QueryKey from its segments, joined with `:`. Throws on an empty first segment. */
export function queryKey(name: string, ...params: readonly (string | number)[]): QueryKey {
	const trimmed = name.trim();
	if (trimmed.length === 0) {
		throw new Error("QueryKey name cannot be empty");
	}
	return [trimmed, ...params.map(String)].join(":") as QueryKey;
}
