import { Effect } from "effect";
import {
	type InvalidArgumentError,
	invalidArgument,
} from "../errors/argument-errors.js";

/**
 * Canonical form of a word: surrounding whitespace removed, then lowercased.
 * Only canonical forms are ever stored or compared.
 */
export const canonicalize = (word: string): string =>
	word.trim().toLowerCase();

/**
 * True when nothing but whitespace is left after trimming.
 */
export const isBlank = (word: string): boolean => word.trim().length === 0;

/**
 * Validates a synonym pair and returns both words in canonical form.
 * Fails when either word is blank or both canonicalize to the same word.
 */
export const validatePair = (
	word1: string,
	word2: string,
): Effect.Effect<readonly [string, string], InvalidArgumentError> =>
	Effect.suspend(() => {
		if (isBlank(word1) || isBlank(word2)) {
			return Effect.fail(invalidArgument("BlankWord", [word1, word2]));
		}
		const first = canonicalize(word1);
		const second = canonicalize(word2);
		if (first === second) {
			return Effect.fail(invalidArgument("SelfSynonym", [word1, word2]));
		}
		return Effect.succeed([first, second] as const);
	});

/**
 * Validates a chain of words for `addAll` and returns them canonicalized,
 * in input order.
 *
 * Checks run in this order: at least two words, none blank, no duplicates
 * after canonicalization.
 */
export const validateChain = (
	words: ReadonlyArray<string>,
): Effect.Effect<ReadonlyArray<string>, InvalidArgumentError> =>
	Effect.suspend(() => {
		if (words.length < 2) {
			return Effect.fail(invalidArgument("TooFewWords", words));
		}
		if (words.some(isBlank)) {
			return Effect.fail(invalidArgument("BlankWord", words));
		}
		const canonical = words.map(canonicalize);
		if (new Set(canonical).size !== canonical.length) {
			return Effect.fail(invalidArgument("DuplicateWords", words));
		}
		return Effect.succeed(canonical);
	});
