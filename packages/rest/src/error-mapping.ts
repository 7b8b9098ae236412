/**
 * Error-to-HTTP-status mapping for REST API responses.
 *
 * Maps tagged errors to HTTP status codes and structured error response
 * bodies. Each error's _tag is the discriminant, and the response includes
 * the error's fields so clients can see why a request was rejected.
 *
 * @module
 */

import { Cause, Option, Runtime } from "effect";

// ============================================================================
// Types
// ============================================================================

/**
 * Structured error response returned by mapErrorToResponse.
 * Contains the HTTP status code and the response body to send.
 */
export interface ErrorResponse {
	/** HTTP status code (e.g., 400, 500) */
	readonly status: number;

	/** Response body containing error details */
	readonly body: {
		/** Error tag identifying the error type */
		readonly _tag: string;
		/** Human-readable error category */
		readonly error: string;
		/** The error's own fields, including its message */
		readonly details?: Record<string, unknown>;
	};
}

interface TaggedFailure {
	readonly tag: string;
	readonly fields: Record<string, unknown>;
}

/**
 * Reads the tag and fields off a value shaped like a tagged error.
 * `message` lives on Error instances as a non-enumerable property, so it is
 * copied over explicitly.
 */
const asTaggedFailure = (value: unknown): TaggedFailure | null => {
	if (
		value === null ||
		typeof value !== "object" ||
		!("_tag" in value) ||
		typeof value._tag !== "string"
	) {
		return null;
	}
	const fields: Record<string, unknown> = {};
	for (const [key, field] of Object.entries(value)) {
		if (key !== "_tag") {
			fields[key] = field;
		}
	}
	if (value instanceof Error && value.message !== "") {
		fields.message = value.message;
	}
	return { tag: value._tag, fields };
};

/**
 * Extract a tagged error from an unknown error value.
 *
 * Runtime.runPromise rejects with a FiberFailure when the Effect fails.
 * This function extracts the underlying tagged error from the FiberFailure
 * or returns the error directly if it's already a tagged error.
 */
const extractTaggedFailure = (error: unknown): TaggedFailure | null => {
	if (Runtime.isFiberFailure(error)) {
		const failure = Cause.failureOption(error[Runtime.FiberFailureCauseId]);
		return Option.isSome(failure) ? asTaggedFailure(failure.value) : null;
	}
	return asTaggedFailure(error);
};

// ============================================================================
// Status Code Mapping
// ============================================================================

/**
 * Static mapping from error _tag values to HTTP status codes.
 *
 * Both known errors are caller mistakes (400). Anything else is a 500.
 */
const ERROR_STATUS_MAP: Record<string, number> = {
	InvalidArgumentError: 400,
	RequestValidationError: 400,
};

/**
 * Human-readable error messages for each error type.
 */
const ERROR_MESSAGES: Record<string, string> = {
	InvalidArgumentError: "Invalid argument",
	RequestValidationError: "Invalid request",
};

// ============================================================================
// Error Mapping Function
// ============================================================================

/**
 * Map a tagged error to an HTTP response.
 *
 * Matches on the error's `_tag` property and returns the appropriate HTTP
 * status code along with a structured error body. Unknown errors default
 * to 500 Internal Server Error.
 *
 * @example
 * ```typescript
 * import { invalidArgument } from "@synonymy/core"
 *
 * const response = mapErrorToResponse(invalidArgument("SelfSynonym", ["a", "A"]))
 * // response = {
 * //   status: 400,
 * //   body: {
 * //     _tag: "InvalidArgumentError",
 * //     error: "Invalid argument",
 * //     details: {
 * //       reason: "SelfSynonym",
 * //       words: ["a", "A"],
 * //       message: "A word cannot be a synonym of itself"
 * //     }
 * //   }
 * // }
 * ```
 */
export const mapErrorToResponse = (error: unknown): ErrorResponse => {
	const tagged = extractTaggedFailure(error);

	if (tagged !== null) {
		const { tag, fields } = tagged;
		return {
			status: ERROR_STATUS_MAP[tag] ?? 500,
			body: {
				_tag: tag,
				error: ERROR_MESSAGES[tag] ?? "Internal server error",
				details: Object.keys(fields).length > 0 ? fields : undefined,
			},
		};
	}

	if (error instanceof Error) {
		return {
			status: 500,
			body: {
				_tag: "UnknownError",
				error: "Internal server error",
				details: {
					message: error.message,
					name: error.name,
				},
			},
		};
	}

	return {
		status: 500,
		body: {
			_tag: "UnknownError",
			error: "Internal server error",
		},
	};
};
