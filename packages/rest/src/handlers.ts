/**
 * REST Handler Generation for a synonym index.
 *
 * Generates framework-agnostic HTTP handlers for adding, looking up,
 * listing and clearing synonyms.
 *
 * @module
 */

import type { SynonymIndexShape } from "@synonymy/core";
import { Effect, Runtime } from "effect";
import { mapErrorToResponse } from "./error-mapping.js";
import {
	parseWordParam,
	parseWordsParams,
	type QueryParams,
} from "./query-params.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Framework-agnostic request object shape.
 * Adapters for specific frameworks convert their native request objects to
 * this shape before invoking handlers.
 */
export interface RestRequest {
	/**
	 * URL path parameters extracted by the framework's router.
	 */
	readonly params: Record<string, string>;

	/**
	 * URL query parameters (search params).
	 * Values can be strings or arrays of strings for repeated parameters.
	 * Example: ?words[]=a&words[]=b → { "words[]": ["a", "b"] }
	 */
	readonly query: QueryParams;

	/**
	 * Parsed request body (for POST requests).
	 * The framework adapter is responsible for parsing JSON or form bodies.
	 */
	readonly body: unknown;
}

/**
 * Framework-agnostic response object shape.
 * Handlers return this shape; framework adapters convert it to native responses.
 */
export interface RestResponse {
	/** HTTP status code (e.g., 200, 204, 400, 500) */
	readonly status: number;

	/** Response body to serialize as JSON; null for 204 */
	readonly body: unknown;

	/** Optional additional headers */
	readonly headers?: Record<string, string>;
}

/**
 * Framework-agnostic HTTP handler function.
 * Receives a request object and returns a promise resolving to a response object.
 */
export type RestHandler = (req: RestRequest) => Promise<RestResponse>;

/**
 * HTTP method type for route definitions.
 */
export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE" | "PATCH";

/**
 * Route descriptor returned by createRestHandlers.
 * Contains the HTTP method, path pattern, and handler function.
 */
export interface RouteDescriptor {
	/** HTTP method for this route */
	readonly method: HttpMethod;

	/** URL path pattern (e.g., "/synonyms") */
	readonly path: string;

	/** Handler function to invoke for matching requests */
	readonly handler: RestHandler;
}

export interface RestHandlerOptions {
	/**
	 * Runtime the index effects run on. The server passes one carrying its
	 * logger and minimum log level; defaults to `Runtime.defaultRuntime`.
	 */
	readonly runtime?: Runtime.Runtime<never>;

	/** Path prefix for every route. Defaults to "/synonyms". */
	readonly basePath?: string;
}

// ============================================================================
// Handler Factory
// ============================================================================

/**
 * Create REST handlers for a synonym index.
 *
 * Generated routes:
 * - POST   /synonyms        — add the given words as one synonym chain (204)
 * - GET    /synonyms        — synonyms of `?word=` as a sorted array (200)
 * - GET    /synonyms/groups — every group as a sorted array (200)
 * - DELETE /synonyms        — forget every word (204)
 *
 * @example
 * ```typescript
 * import { createRestHandlers } from "@synonymy/rest"
 * import { makeSynonymIndex } from "@synonymy/core"
 *
 * const index = await Effect.runPromise(makeSynonymIndex)
 * const routes = createRestHandlers(index)
 *
 * for (const { method, path, handler } of routes) {
 *   app.on(method, path, async (c) => {
 *     const response = await handler({ params: {}, query: {}, body: undefined })
 *     return c.json(response.body, response.status)
 *   })
 * }
 * ```
 */
export const createRestHandlers = (
	index: SynonymIndexShape,
	options: RestHandlerOptions = {},
): ReadonlyArray<RouteDescriptor> => {
	const runtime = options.runtime ?? Runtime.defaultRuntime;
	const basePath = options.basePath ?? "/synonyms";
	const run = Runtime.runPromise(runtime);

	return [
		{
			method: "GET",
			path: `${basePath}/groups`,
			handler: createGroupsHandler(index, run),
		},
		{
			method: "GET",
			path: basePath,
			handler: createLookupHandler(index, run),
		},
		{
			method: "POST",
			path: basePath,
			handler: createAddHandler(index, run),
		},
		{
			method: "DELETE",
			path: basePath,
			handler: createClearHandler(index, run),
		},
	];
};

// ============================================================================
// Individual Handler Factories
// ============================================================================

type Run = <A, E>(effect: Effect.Effect<A, E>) => Promise<A>;

const sortWords = (words: Iterable<string>): ReadonlyArray<string> =>
	Array.from(words).sort();

/**
 * Logs a rejected request at warning level before the error reaches the
 * caller.
 */
const logRejection = <
	A,
	E extends { readonly _tag: string; readonly message: string },
>(
	route: string,
	effect: Effect.Effect<A, E>,
): Effect.Effect<A, E> =>
	Effect.tapError(effect, (error) =>
		Effect.logWarning(`rejected ${route}: ${error.message}`).pipe(
			Effect.annotateLogs({ error: error._tag }),
		),
	);

/**
 * Create a POST handler adding every supplied word as one chain.
 */
const createAddHandler = (index: SynonymIndexShape, run: Run): RestHandler => {
	return async (req: RestRequest): Promise<RestResponse> => {
		try {
			await run(
				logRejection(
					"add",
					parseWordsParams(req.query, req.body).pipe(
						Effect.flatMap((words) => index.addAll(words)),
					),
				),
			);
			return { status: 204, body: null };
		} catch (error) {
			return mapErrorToResponse(error);
		}
	};
};

/**
 * Create a GET handler returning the synonyms of one word.
 */
const createLookupHandler = (
	index: SynonymIndexShape,
	run: Run,
): RestHandler => {
	return async (req: RestRequest): Promise<RestResponse> => {
		try {
			const synonyms = await run(
				logRejection(
					"lookup",
					parseWordParam(req.query).pipe(
						Effect.flatMap((word) => index.get(word)),
					),
				),
			);
			return { status: 200, body: sortWords(synonyms) };
		} catch (error) {
			return mapErrorToResponse(error);
		}
	};
};

/**
 * Create a GET handler returning the whole partition, groups ordered by
 * their first word.
 */
const createGroupsHandler = (
	index: SynonymIndexShape,
	run: Run,
): RestHandler => {
	return async (_req: RestRequest): Promise<RestResponse> => {
		try {
			const groups = await run(index.getAll());
			const body = groups
				.map(sortWords)
				.sort((a, b) => (a.join("\u0000") < b.join("\u0000") ? -1 : 1));
			return { status: 200, body };
		} catch (error) {
			return mapErrorToResponse(error);
		}
	};
};

/**
 * Create a DELETE handler clearing the index.
 */
const createClearHandler = (
	index: SynonymIndexShape,
	run: Run,
): RestHandler => {
	return async (_req: RestRequest): Promise<RestResponse> => {
		try {
			await run(index.clear());
			return { status: 204, body: null };
		} catch (error) {
			return mapErrorToResponse(error);
		}
	};
};
