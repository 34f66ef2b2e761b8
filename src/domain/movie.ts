import type { MovieId } from "../shared/identifiers.js";

/** A catalogue entry as the rest of the application sees it. */
export interface Movie {
	readonly id: MovieId;
	readonly title: string;
	readonly overview: string;
	/** Relative image path on the image host; `null` when the catalogue has none */
	readonly posterPath: string | null;
	readonly backdropPath: string | null;
	/** ISO date (`YYYY-MM-DD`), or empty when unreleased */
	readonly releaseDate: string;
	/** Average rating on a 0–10 scale */
	readonly voteAverage: number;
	readonly voteCount: number;
}
