/**
 * Logger wrapper: domain-agnostic structured logging backed by pino.
 *
 * The API key never reaches a log line: `apiKey` is redacted at the top
 * level and one level down unless the caller supplies its own paths.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger used by every layer of the pipeline. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

export const DEFAULT_REDACT_PATHS: readonly string[] = ["apiKey", "*.apiKey"];

// ── Factory ─────────────────────────────────────────────────────────

type PinoLevelMethod = "info" | "warn" | "error" | "debug";

function forward(target: pino.Logger, level: PinoLevelMethod, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "object" && msgOrObj !== null) {
		target[level](msgOrObj, msg ?? "");
	} else {
		target[level](String(msgOrObj ?? ""));
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with `apiKey` redaction and an optional
 * custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.child({ component: "gateway" }).warn({ err }, "Remote fetch failed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const paths = config.redactPaths ?? DEFAULT_REDACT_PATHS;
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (paths.length > 0) {
		pinoOptions.redact = {
			paths: [...paths],
			censor: "[REDACTED]",
		};
	}

	const pinoLogger = config.destination
		? pino(pinoOptions, config.destination)
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** Logger that discards everything; the default wherever no logger is injected. */
export const SILENT_LOGGER: Logger = createLogger({ level: "silent" });
