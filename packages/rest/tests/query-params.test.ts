/**
 * Tests for query-params.ts — request parameter parsing.
 */

import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import {
	parseWordParam,
	parseWordsParams,
	wordsFromBody,
	wordsFromQuery,
} from "../src/query-params.js";

describe("wordsFromQuery", () => {
	it("should read repeated words[] parameters", () => {
		expect(wordsFromQuery({ "words[]": ["a", "b", "c"] })).toEqual([
			"a",
			"b",
			"c",
		]);
	});

	it("should read a single words parameter", () => {
		expect(wordsFromQuery({ words: "alone" })).toEqual(["alone"]);
	});

	it("should put words[] before words", () => {
		expect(wordsFromQuery({ words: ["y"], "words[]": "x" })).toEqual([
			"x",
			"y",
		]);
	});

	it("should ignore unrelated parameters", () => {
		expect(wordsFromQuery({ word: "a", other: ["b"] })).toEqual([]);
	});
});

describe("wordsFromBody", () => {
	it("should read a JSON words array", () => {
		expect(wordsFromBody({ words: ["a", "b"] })).toEqual(["a", "b"]);
	});

	it("should read form fields", () => {
		expect(wordsFromBody({ "words[]": ["a", "b"], words: "c" })).toEqual([
			"a",
			"b",
			"c",
		]);
	});

	it("should drop values that are not strings", () => {
		expect(wordsFromBody({ words: ["a", 1, null, "b"] })).toEqual(["a", "b"]);
	});

	it("should return nothing for bodies without words", () => {
		expect(wordsFromBody(undefined)).toEqual([]);
		expect(wordsFromBody("a,b")).toEqual([]);
		expect(wordsFromBody({ word: "a" })).toEqual([]);
	});
});

describe("parseWordsParams", () => {
	it("should combine query words and body words in that order", async () => {
		const words = await Effect.runPromise(
			parseWordsParams({ "words[]": ["a", "b"] }, { words: ["c"] }),
		);

		expect(words).toEqual(["a", "b", "c"]);
	});

	it("should pass words through without canonicalizing them", async () => {
		const words = await Effect.runPromise(
			parseWordsParams({ "words[]": [" Big ", "big"] }, undefined),
		);

		expect(words).toEqual([" Big ", "big"]);
	});

	it("should fail when no words are supplied", async () => {
		const error = await Effect.runPromise(
			Effect.flip(parseWordsParams({}, {})),
		);

		expect(error._tag).toBe("RequestValidationError");
		expect(error.parameter).toBe("words[]");
		expect(error.message).toBe("Required parameter 'words[]' is missing");
	});
});

describe("parseWordParam", () => {
	it("should return the word as given", async () => {
		const word = await Effect.runPromise(parseWordParam({ word: "Hello" }));

		expect(word).toBe("Hello");
	});

	it("should take the first of repeated values", async () => {
		const word = await Effect.runPromise(
			parseWordParam({ word: ["first", "second"] }),
		);

		expect(word).toBe("first");
	});

	it("should fail when the word is missing", async () => {
		const error = await Effect.runPromise(Effect.flip(parseWordParam({})));

		expect(error.parameter).toBe("word");
		expect(error.message).toBe("Required parameter 'word' is missing");
	});

	it("should fail when the word is blank", async () => {
		const error = await Effect.runPromise(
			Effect.flip(parseWordParam({ word: "  " })),
		);

		expect(error.message).toBe("String cannot be blank");
	});
});
