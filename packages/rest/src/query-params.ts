/**
 * REST parameter parsing for the synonyms routes.
 *
 * Words may arrive as repeated query parameters (`?words[]=a&words[]=b`,
 * `?words=a&words=b`), a JSON body (`{ "words": ["a", "b"] }`) or form
 * fields using the same names. Values are passed through untouched;
 * canonicalization and validation belong to the index.
 *
 * @module
 */

import { isBlank } from "@synonymy/core";
import { Effect } from "effect";
import { RequestValidationError } from "./request-errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Input query parameters from URL.
 * Values can be strings or arrays of strings for repeated parameters.
 */
export type QueryParams = Record<string, string | ReadonlyArray<string>>;

// ============================================================================
// Constants
// ============================================================================

/**
 * Accepted names for the list of words, in lookup order.
 */
export const WORDS_PARAMS = ["words[]", "words"] as const;

export const WORD_PARAM = "word";

// ============================================================================
// Helpers
// ============================================================================

const toStrings = (value: unknown): ReadonlyArray<string> => {
	if (typeof value === "string") {
		return [value];
	}
	if (Array.isArray(value)) {
		return value.filter((item): item is string => typeof item === "string");
	}
	return [];
};

/**
 * Words carried by a parsed request body, whether JSON or form encoded.
 */
export const wordsFromBody = (body: unknown): ReadonlyArray<string> => {
	if (typeof body !== "object" || body === null) {
		return [];
	}
	const words: Array<string> = [];
	if ("words[]" in body) {
		words.push(...toStrings(body["words[]"]));
	}
	if ("words" in body) {
		words.push(...toStrings(body.words));
	}
	return words;
};

export const wordsFromQuery = (query: QueryParams): ReadonlyArray<string> =>
	WORDS_PARAMS.flatMap((name) => toStrings(query[name]));

// ============================================================================
// Parsers
// ============================================================================

/**
 * Collects the words of an add request: query parameters first, then body.
 * Fails only when no word was supplied at all.
 */
export const parseWordsParams = (
	query: QueryParams,
	body: unknown,
): Effect.Effect<ReadonlyArray<string>, RequestValidationError> =>
	Effect.suspend(() => {
		const words = [...wordsFromQuery(query), ...wordsFromBody(body)];
		if (words.length === 0) {
			return Effect.fail(
				new RequestValidationError({
					parameter: "words[]",
					message: "Required parameter 'words[]' is missing",
				}),
			);
		}
		return Effect.succeed(words);
	});

/**
 * Reads the `word` parameter of a lookup. The first value wins when the
 * parameter is repeated.
 */
export const parseWordParam = (
	query: QueryParams,
): Effect.Effect<string, RequestValidationError> =>
	Effect.suspend(() => {
		const [word] = toStrings(query[WORD_PARAM]);
		if (word === undefined) {
			return Effect.fail(
				new RequestValidationError({
					parameter: WORD_PARAM,
					message: "Required parameter 'word' is missing",
				}),
			);
		}
		if (isBlank(word)) {
			return Effect.fail(
				new RequestValidationError({
					parameter: WORD_PARAM,
					message: "String cannot be blank",
				}),
			);
		}
		return Effect.succeed(word);
	});
