import { describe, expect, it } from "vitest";
import { SILENT_LOGGER, createLogger } from "./index.js";

function capture(): { lines: string[]; destination: { write(msg: string): void } } {
	const lines: string[] = [];
	return {
		lines,
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	};
}

function parsed(lines: readonly string[]): Record<string, unknown>[] {
	return lines.map((line) => JSON.parse(line));
}

describe("Logger", () => {
	describe("createLogger", () => {
		it("writes the message and fields as one JSON line", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "info", destination });

			logger.info({ key: "popular-movies" }, "Remote fetch failed");

			expect(lines).toHaveLength(1);
			const [entry] = parsed(lines);
			expect(entry?.["msg"]).toBe("Remote fetch failed");
			expect(entry?.["key"]).toBe("popular-movies");
		});

		it("accepts a bare message", () => {
			const { lines, destination } = capture();
			createLogger({ level: "info", destination }).warn("Cache write failed");

			expect(parsed(lines)[0]?.["msg"]).toBe("Cache write failed");
		});

		it("drops entries below the configured level", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "warn", destination });

			logger.debug("hidden");
			logger.info("hidden");
			logger.error("shown");

			expect(parsed(lines).map((e) => e["msg"])).toEqual(["shown"]);
		});

		it("child loggers carry their bindings", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "info", destination });

			logger.child({ component: "movie-gateway" }).child({ key: "movie-details:7" }).info("hit");

			const [entry] = parsed(lines);
			expect(entry?.["component"]).toBe("movie-gateway");
			expect(entry?.["key"]).toBe("movie-details:7");
		});
	});

	describe("redaction", () => {
		it("censors apiKey at the top level and one level down", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "info", destination });

			logger.info({ apiKey: "test-secret", api: { apiKey: "test-secret", baseUrl: "http://x" } }, "init");

			const [entry] = parsed(lines);
			expect(entry?.["apiKey"]).toBe("[REDACTED]");
			expect(entry?.["api"]).toEqual({ apiKey: "[REDACTED]", baseUrl: "http://x" });
		});

		it("uses caller-supplied paths instead of the defaults", () => {
			const { lines, destination } = capture();
			const logger = createLogger({ level: "info", redactPaths: ["token"], destination });

			logger.info({ token: "test-secret", safe: "visible" }, "test");

			const [entry] = parsed(lines);
			expect(entry?.["token"]).toBe("[REDACTED]");
			expect(entry?.["safe"]).toBe("visible");
		});

		it("redacts nothing when given no paths", () => {
			const { lines, destination } = capture();
			createLogger({ level: "info", redactPaths: [], destination }).info(
				{ apiKey: "test-secret" },
				"plain",
			);

			expect(parsed(lines)[0]?.["apiKey"]).toBe("test-secret");
		});
	});

	it("SILENT_LOGGER accepts every call", () => {
		expect(() => {
			SILENT_LOGGER.error({ err: new Error("x") }, "ignored");
			SILENT_LOGGER.child({ a: 1 }).debug("ignored");
		}).not.toThrow();
	});
});
