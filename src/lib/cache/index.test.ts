import { describe, expect, it } from "vitest";
import { MemoryCacheStore } from "./index.js";

describe("MemoryCacheStore", () => {
	it("reads undefined for a key never written", async () => {
		const cache = new MemoryCacheStore<string>();
		expect(await cache.read("popular-movies")).toBeUndefined();
	});

	it("returns the most recent write", async () => {
		const cache = new MemoryCacheStore<number[]>();
		await cache.write("popular-movies", [1]);
		await cache.write("popular-movies", [1, 2]);

		expect(await cache.read("popular-movies")).toEqual([1, 2]);
		expect(cache.size).toBe(1);
	});

	it("keeps keys independent", async () => {
		const cache = new MemoryCacheStore<string>();
		await cache.write("movie-details:1", "one");
		await cache.write("movie-details:2", "two");

		expect(await cache.read("movie-details:1")).toBe("one");
		expect(await cache.read("movie-details:2")).toBe("two");
	});

	it("delete() and clear() remove entries", async () => {
		const cache = new MemoryCacheStore<string>();
		await cache.write("a", "1");
		await cache.write("b", "2");

		expect(cache.delete("a")).toBe(true);
		expect(cache.delete("a")).toBe(false);
		expect(await cache.read("a")).toBeUndefined();

		cache.clear();
		expect(cache.size).toBe(0);
	});

	it("tracks hits, misses and writes", async () => {
		const cache = new MemoryCacheStore<string>();
		await cache.write("a", "1");
		await cache.read("a");
		await cache.read("a");
		await cache.read("b");
		await cache.read("c");

		expect(cache.getStats()).toEqual({ hits: 2, misses: 2, writes: 1, hitRate: 0.5 });
	});

	it("reports a zero hit rate before any read", () => {
		expect(new MemoryCacheStore<string>().getStats().hitRate).toBe(0);
	});
});
