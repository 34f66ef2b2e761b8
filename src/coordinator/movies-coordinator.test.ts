import { describe, expect, it } from "vitest";
import type { Movie } from "../domain/movie.js";
import { CallerContext } from "../operation/execution-context.js";
import { createOperationNoParams } from "../operation/operation.js";
import type { OperationNoParams } from "../operation/operation.js";
import { movieId } from "../shared/identifiers.js";
import type { Outcome } from "../shared/outcome.js";
import { failure, success } from "../shared/outcome.js";
import { sampleMovie } from "../testing/index.js";
import { MoviesCoordinator } from "./movies-coordinator.js";
import type { MoviesNotification, MoviesState } from "./movies-coordinator.js";
import { EMPTY, LOADING } from "./screen-state.js";

type Script = Outcome<readonly Movie[]>[];

/** Each invocation plays the next script; the last one repeats. */
function scriptedPopular(...scripts: Script[]): OperationNoParams<readonly Movie[]> {
	let calls = 0;
	return createOperationNoParams(
		async function* () {
			const script = scripts[Math.min(calls, scripts.length - 1)] ?? [];
			calls++;
			yield* script;
		},
		{ name: "get-popular-movies", context: CallerContext },
	);
}

function observe(coordinator: MoviesCoordinator): MoviesState[] {
	const states: MoviesState[] = [];
	coordinator.subscribe((s) => states.push(s));
	return states;
}

const offline = failure({ message: "offline", cause: null });

describe("MoviesCoordinator", () => {
	it("starts in loading", () => {
		expect(new MoviesCoordinator(scriptedPopular([])).state).toBe(LOADING);
	});

	it("shows the popular movies after start", async () => {
		const movies = [sampleMovie(1), sampleMovie(2)];
		const coordinator = new MoviesCoordinator(scriptedPopular([success(movies)]));
		const states = observe(coordinator);

		await coordinator.start();

		expect(states).toEqual([LOADING, { status: "success", data: movies }]);
	});

	it("shows empty for an empty list", async () => {
		const coordinator = new MoviesCoordinator(scriptedPopular([success([])]));

		await coordinator.start();

		expect(coordinator.state).toBe(EMPTY);
	});

	it("shows a refreshed list after a cached one", async () => {
		const cached = [sampleMovie(1)];
		const fresh = [sampleMovie(1), sampleMovie(2)];
		const coordinator = new MoviesCoordinator(scriptedPopular([success(cached), success(fresh)]));
		const states = observe(coordinator);

		await coordinator.start();

		expect(states).toEqual([
			LOADING,
			{ status: "success", data: cached },
			{ status: "success", data: fresh },
		]);
	});

	it("retries from loading after an error", async () => {
		const movies = [sampleMovie(3)];
		const coordinator = new MoviesCoordinator(scriptedPopular([offline], [success(movies)]));
		const states = observe(coordinator);

		await coordinator.start();
		expect(coordinator.state).toEqual({ status: "error", message: "offline" });

		await coordinator.retry();

		expect(states).toEqual([
			LOADING,
			{ status: "error", message: "offline" },
			LOADING,
			{ status: "success", data: movies },
		]);
	});

	it("falls back to its default error message", async () => {
		const coordinator = new MoviesCoordinator(
			scriptedPopular([failure({ message: undefined, cause: null })]),
			{ defaultErrorMessage: "Could not load movies" },
		);

		await coordinator.start();

		expect(coordinator.state).toEqual({ status: "error", message: "Could not load movies" });
	});

	it("emits navigation as a notification without touching the state", async () => {
		const coordinator = new MoviesCoordinator(scriptedPopular([success([sampleMovie(42)])]));
		await coordinator.start();
		const stateBefore = coordinator.state;
		const notifications: MoviesNotification[] = [];
		coordinator.onNotification((n) => notifications.push(n));

		coordinator.selectMovie(movieId(42));

		expect(notifications).toEqual([{ type: "navigate-to-details", movieId: 42 }]);
		expect(coordinator.state).toBe(stateBefore);
	});

	it("does not navigate after dispose", () => {
		const coordinator = new MoviesCoordinator(scriptedPopular([]));
		const notifications: MoviesNotification[] = [];
		coordinator.onNotification((n) => notifications.push(n));

		coordinator.dispose();
		coordinator.selectMovie(movieId(1));

		expect(notifications).toEqual([]);
	});
});
