import { describe, expect, it } from "vitest";
import { movieId, queryKey } from "./identifiers.js";

describe("movieId", () => {
	it("accepts positive integers", () => {
		expect(movieId(550)).toBe(550);
	});

	it.each([0, -3, 1.5, Number.NaN])("rejects %s", (value) => {
		expect(() => movieId(value)).toThrow("MovieId must be a positive integer");
	});
});

describe("queryKey", () => {
	it("joins name and params with colons", () => {
		expect(queryKey("movie-details", 42)).toBe("movie-details:42");
		expect(queryKey("popular-movies")).toBe("popular-movies");
	});

	it("rejects an empty name", () => {
		expect(() => queryKey("  ")).toThrow("QueryKey name cannot be empty");
	});
});
