import { describe, expect, it } from "vitest";
import { failure, pending, success } from "../shared/outcome.js";
import { EMPTY, LOADING, errorState, isEmptyCollection, toScreenState } from "./screen-state.js";

describe("isEmptyCollection", () => {
	it.each([
		[[], true],
		[[1], false],
		[new Set(), true],
		[new Set([1]), false],
		[new Map(), true],
		[new Map([["a", 1]]), false],
		["", false],
		[0, false],
		[{}, false],
	])("%o -> %s", (value, expected) => {
		expect(isEmptyCollection(value)).toBe(expected);
	});
});

describe("toScreenState", () => {
	it("maps Pending to loading", () => {
		expect(toScreenState(pending())).toBe(LOADING);
	});

	it("maps a value to success", () => {
		expect(toScreenState(success([1, 2]))).toEqual({ status: "success", data: [1, 2] });
		expect(toScreenState(success({ id: 1 }))).toEqual({ status: "success", data: { id: 1 } });
	});

	it("maps an empty collection to empty", () => {
		expect(toScreenState(success([]))).toBe(EMPTY);
	});

	it("uses the failure's message", () => {
		expect(toScreenState(failure({ message: "offline", cause: null }))).toEqual(errorState("offline"));
	});

	it("falls back to the default message", () => {
		const blank = failure({ message: undefined, cause: null });
		expect(toScreenState(blank)).toEqual({ status: "error", message: "An error occurred" });
		expect(toScreenState(blank, "Try again")).toEqual({ status: "error", message: "Try again" });
	});
});
