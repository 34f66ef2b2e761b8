/**
 * PipelineError hierarchy: structured error classification.
 *
 * The category tells the gateway and the coordinator where a failure came
 * from: the remote source, the field mapping, the local cache, the
 * coordinator's own reaction logic, or configuration.
 */

/** Failure origins across the pipeline layers. */
export const ErrorCategory = {
	Transport: "transport",
	Mapping: "mapping",
	Cache: "cache",
	Coordinator: "coordinator",
	Config: "config",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Extra context accepted by every subclass; `cause` is lifted onto the error itself. */
export type ErrorContext = Record<string, unknown> & { readonly cause?: unknown };

/** Base error class for every failure raised inside the pipeline. */
export class PipelineError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		const { cause, ...rest } = context;
		super(message);
		this.name = "PipelineError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Remote source unreachable or answered with an error status. */
export class TransportError extends PipelineError {
	constructor(message: string, context: ErrorContext = {}, code = "TRANSPORT_ERROR") {
		super(message, code, ErrorCategory.Transport, context);
		this.name = "TransportError";
	}
}

/** Remote call exceeded its time budget. */
export class TimeoutError extends TransportError {
	/** The budget that expired; undefined when the error came from outside the pipeline. */
	readonly timeoutMs: number | undefined;

	constructor(message: string, timeoutMs?: number, context: ErrorContext = {}) {
		super(message, context, "TIMEOUT_ERROR");
		this.name = "TimeoutError";
		this.timeoutMs = timeoutMs;
	}

	override toJSON(): Record<string, unknown> {
		const json = super.toJSON();
		return this.timeoutMs === undefined ? json : { ...json, timeoutMs: this.timeoutMs };
	}
}

/** Remote payload did not match the expected record shape. */
export class MappingError extends PipelineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "MAPPING_ERROR", ErrorCategory.Mapping, context);
		this.name = "MappingError";
	}
}

/** Local cache read or write failed. */
export class CacheError extends PipelineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CACHE_ERROR", ErrorCategory.Cache, context);
		this.name = "CacheError";
	}
}

/** Exception raised by a coordinator's own state-reduction logic. */
export class CoordinatorFault extends PipelineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "COORDINATOR_FAULT", ErrorCategory.Coordinator, context);
		this.name = "CoordinatorFault";
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends PipelineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Config, context);
		this.name = "ConfigError";
	}
}

// ── Classification helper ────────────────────────────────────────────

const NETWORK_CODES = new Set(["ECONNREFUSED", "ENOTFOUND", "ECONNRESET", "EAI_AGAIN"]);

function errorCode(error: Error): string | undefined {
	if ("code" in error && typeof error.code === "string") return error.code;
	return undefined;
}

/**
 * Classify an unknown thrown value into a PipelineError subtype.
 * Values that already are PipelineErrors pass through unchanged; anything
 * unrecognised is treated as a transport failure of the remote source.
 */
export function classifyError(error: unknown): PipelineError {
	if (error instanceof PipelineError) return error;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		const code = errorCode(error);

		if (error.name === "ZodError") {
			return new MappingError(error.message, { cause: error });
		}
		if (code === "ETIMEDOUT" || msg.includes("timed out") || msg.includes("timeout")) {
			return new TimeoutError(error.message, undefined, { cause: error });
		}
		if ((code !== undefined && NETWORK_CODES.has(code)) || msg.includes("fetch failed")) {
			return new TransportError(error.message, { cause: error, code });
		}
		if (error instanceof SyntaxError) {
			return new MappingError(error.message, { cause: error });
		}
		return new TransportError(error.message, { cause: error });
	}
	return new TransportError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isTransportError(e: unknown): e is TransportError {
	return e instanceof TransportError;
}

export function isMappingError(e: unknown): e is MappingError {
	return e instanceof MappingError;
}

export function isCacheError(e: unknown): e is CacheError {
	return e instanceof CacheError;
}

export function isCoordinatorFault(e: unknown): e is CoordinatorFault {
	return e instanceof CoordinatorFault;
}
