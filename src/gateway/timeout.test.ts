import { describe, expect, it } from "vitest";
import { TimeoutError } from "../shared/errors.js";
import { withTimeout } from "./timeout.js";

/** Never settles on its own; rejects with the abort reason. */
function untilAborted(signal: AbortSignal): Promise<never> {
	return new Promise<never>((_, reject) => {
		signal.addEventListener("abort", () => reject(signal.reason), { once: true });
	});
}

describe("withTimeout", () => {
	it("resolves with the task's value inside the budget", async () => {
		expect(await withTimeout(async () => "done", 1_000)).toBe("done");
	});

	it("rejects with TimeoutError and aborts the task's signal", async () => {
		let seen: AbortSignal | undefined;
		const result = withTimeout((signal) => {
			seen = signal;
			return untilAborted(signal);
		}, 10);

		await expect(result).rejects.toBeInstanceOf(TimeoutError);
		await expect(result).rejects.toThrow("Request timed out after 10ms");
		expect(seen?.aborted).toBe(true);
		expect(seen?.reason).toBeInstanceOf(TimeoutError);
	});

	it("propagates the task's own rejection", async () => {
		await expect(withTimeout(() => Promise.reject(new Error("HTTP 500")), 1_000)).rejects.toThrow(
			"HTTP 500",
		);
	});

	it("aborts the task when the parent signal aborts", async () => {
		const parent = new AbortController();
		const reason = new Error("screen closed");
		const result = withTimeout(untilAborted, 1_000, parent.signal);

		parent.abort(reason);

		await expect(result).rejects.toBe(reason);
	});

	it("hands an aborted signal to the task when the parent already aborted", async () => {
		const parent = new AbortController();
		parent.abort();

		const aborted = await withTimeout(async (signal) => signal.aborted, 1_000, parent.signal);

		expect(aborted).toBe(true);
	});

	it.each([0, -1, Number.POSITIVE_INFINITY])("runs without a timer for a budget of %s", async (ms) => {
		const aborted = await withTimeout(async (signal) => {
			await new Promise((resolve) => setTimeout(resolve, 5));
			return signal.aborted;
		}, ms);

		expect(aborted).toBe(false);
	});
});
