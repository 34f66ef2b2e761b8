/**
 * ScreenState: what a screen renders for one query.
 *
 * The `status` field is the discriminator; the rendering layer switches on it
 * exhaustively.
 */

import { DEFAULT_PIPELINE_CONFIG } from "../shared/config.js";
import type { Outcome } from "../shared/outcome.js";

export type ScreenState<T> =
	| { readonly status: "loading" }
	| { readonly status: "success"; readonly data: T }
	| { readonly status: "empty" }
	| { readonly status: "error"; readonly message: string };

export const LOADING: ScreenState<never> = Object.freeze({ status: "loading" });
export const EMPTY: ScreenState<never> = Object.freeze({ status: "empty" });

export function errorState<T>(message: string): ScreenState<T> {
	return { status: "error", message };
}

/** True for arrays, Sets and Maps with no entries. */
export function isEmptyCollection(value: unknown): boolean {
	if (Array.isArray(value)) return value.length === 0;
	if (value instanceof Set || value instanceof Map) return value.size === 0;
	return false;
}

/**
 * Fold one Outcome into the next ScreenState. An empty collection becomes
 * `empty` rather than `success`; a failure without a message shows
 * `fallbackMessage`.
 */
export function toScreenState<T>(
	outcome: Outcome<T>,
	fallbackMessage: string = DEFAULT_PIPELINE_CONFIG.defaultErrorMessage,
): ScreenState<T> {
	switch (outcome.status) {
		case "pending":
			return LOADING;
		case "success":
			return isEmptyCollection(outcome.value) ? EMPTY : { status: "success", data: outcome.value };
		case "failure":
			return errorState(outcome.cause.message ?? fallbackMessage);
	}
}
