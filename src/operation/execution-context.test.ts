import { describe, expect, it } from "vitest";
import { BackgroundContext, CallerContext, DEFAULT_EXECUTION_CONTEXT } from "./execution-context.js";

describe("BackgroundContext", () => {
	it("starts the task after the caller's turn", async () => {
		const order: string[] = [];
		const result = BackgroundContext.run(async () => {
			order.push("task");
			return 42;
		});
		order.push("caller");

		expect(await result).toBe(42);
		expect(order).toEqual(["caller", "task"]);
	});

	it("rejects with a synchronous throw from the task", async () => {
		await expect(
			BackgroundContext.run(() => {
				throw new Error("sync failure");
			}),
		).rejects.toThrow("sync failure");
	});

	it("rejects with the task's rejection", async () => {
		await expect(BackgroundContext.run(() => Promise.reject(new Error("async failure")))).rejects.toThrow(
			"async failure",
		);
	});

	it("is the default context", () => {
		expect(DEFAULT_EXECUTION_CONTEXT).toBe(BackgroundContext);
	});
});

describe("CallerContext", () => {
	it("starts the task on the caller's turn", async () => {
		const order: string[] = [];
		const result = CallerContext.run(async () => {
			order.push("task");
			return "done";
		});
		order.push("caller");

		expect(await result).toBe("done");
		expect(order).toEqual(["task", "caller"]);
	});
});
