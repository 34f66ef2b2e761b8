/**
 * Pipeline configuration.
 *
 * Defaults, then REELKIT_* environment variables, then explicit overrides.
 * Every layer reads its settings from the resolved object; nothing reads
 * process.env after startup.
 */

import { formatIssues, validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type ConfigLogLevel = (typeof LOG_LEVELS)[number];

export interface PipelineConfig {
	/** Base URL of the remote catalogue API, with trailing slash */
	readonly apiBaseUrl: string;
	/** API key sent as the `api_key` query parameter */
	readonly apiKey: string;
	/** Base URL for poster and backdrop images */
	readonly imageBaseUrl: string;
	/** Upper bound for a single remote fetch in milliseconds */
	readonly fetchTimeoutMs: number;
	/** Search queries shorter than this resolve to an empty list without a remote call */
	readonly minSearchQueryLength: number;
	/** Shown when a failure carries no message of its own */
	readonly defaultErrorMessage: string;
	readonly logLevel: ConfigLogLevel;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
	apiBaseUrl: "https://api.themoviedb.org/3/",
	apiKey: "",
	imageBaseUrl: "https://image.tmdb.org/t/p/",
	fetchTimeoutMs: 30_000,
	minSearchQueryLength: 3,
	defaultErrorMessage: "An error occurred",
	logLevel: "info",
};

const EnvSchema = z.object({
	REELKIT_API_BASE_URL: z.string().url().optional(),
	REELKIT_API_KEY: z.string().optional(),
	REELKIT_IMAGE_BASE_URL: z.string().url().optional(),
	REELKIT_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
	REELKIT_MIN_SEARCH_QUERY_LENGTH: z.coerce.number().int().nonnegative().optional(),
	REELKIT_DEFAULT_ERROR_MESSAGE: z.string().optional(),
	REELKIT_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

/**
 * Reads config values from environment variables. Unset and empty variables
 * are ignored.
 * @throws ConfigError listing every invalid variable
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<PipelineConfig> {
	const present: Record<string, string> = {};
	for (const key of Object.keys(EnvSchema.shape)) {
		const raw = env[key];
		if (raw !== undefined && raw.trim().length > 0) {
			present[key] = raw.trim();
		}
	}

	const parsed = validate(EnvSchema, present);
	if (!parsed.ok) {
		throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error.issues)}`, {
			cause: parsed.error,
		});
	}

	const e = parsed.value;
	return {
		...(e.REELKIT_API_BASE_URL !== undefined && { apiBaseUrl: e.REELKIT_API_BASE_URL }),
		...(e.REELKIT_API_KEY !== undefined && { apiKey: e.REELKIT_API_KEY }),
		...(e.REELKIT_IMAGE_BASE_URL !== undefined && { imageBaseUrl: e.REELKIT_IMAGE_BASE_URL }),
		...(e.REELKIT_FETCH_TIMEOUT_MS !== undefined && { fetchTimeoutMs: e.REELKIT_FETCH_TIMEOUT_MS }),
		...(e.REELKIT_MIN_SEARCH_QUERY_LENGTH !== undefined && {
			minSearchQueryLength: e.REELKIT_MIN_SEARCH_QUERY_LENGTH,
		}),
		...(e.REELKIT_DEFAULT_ERROR_MESSAGE !== undefined && {
			defaultErrorMessage: e.REELKIT_DEFAULT_ERROR_MESSAGE,
		}),
		...(e.REELKIT_LOG_LEVEL !== undefined && { logLevel: e.REELKIT_LOG_LEVEL }),
	};
}

/** Merge defaults, environment and explicit overrides (highest precedence last). */
export function resolveConfig(
	overrides: Partial<PipelineConfig> = {},
	env: NodeJS.ProcessEnv = process.env,
): PipelineConfig {
	return { ...DEFAULT_PIPELINE_CONFIG, ...configFromEnv(env), ...overrides };
}
