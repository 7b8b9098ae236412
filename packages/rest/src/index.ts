/**
 * @synonymy/rest — framework-agnostic REST handlers for a synonym index.
 *
 * Given a SynonymIndex, generates HTTP handlers for adding synonym chains,
 * looking up a word, listing every group and clearing the dictionary.
 * Includes request parameter parsing and tagged-error to status mapping.
 *
 * @example
 * ```ts
 * import { createRestHandlers } from "@synonymy/rest"
 * import { makeSynonymIndex } from "@synonymy/core"
 *
 * const handlers = createRestHandlers(await Effect.runPromise(makeSynonymIndex))
 *
 * // Framework-agnostic handler signature:
 * // (req: { params, query, body }) => Promise<{ status, body }>
 *
 * // Generated routes:
 * // POST   /synonyms         — add ?words[]=… (or body words) as synonyms
 * // GET    /synonyms?word=…  — synonyms of one word
 * // GET    /synonyms/groups  — every synonym group
 * // DELETE /synonyms         — clear the dictionary
 * ```
 *
 * @module
 */

// ============================================================================
// Handler Generation
// ============================================================================

export {
	createRestHandlers,
	type HttpMethod,
	type RestHandler,
	type RestHandlerOptions,
	type RestRequest,
	type RestResponse,
	type RouteDescriptor,
} from "./handlers.js";

// ============================================================================
// Request Parameter Parsing
// ============================================================================

export {
	parseWordParam,
	parseWordsParams,
	type QueryParams,
	WORD_PARAM,
	WORDS_PARAMS,
	wordsFromBody,
	wordsFromQuery,
} from "./query-params.js";

export { RequestValidationError } from "./request-errors.js";

// ============================================================================
// Error Mapping
// ============================================================================

export { type ErrorResponse, mapErrorToResponse } from "./error-mapping.js";
