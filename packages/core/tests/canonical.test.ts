import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";
import {
	canonicalize,
	isBlank,
	validateChain,
	validatePair,
} from "../src/words/canonical.js";

describe("canonicalize", () => {
	it("lowercases and trims", () => {
		expect(canonicalize("Word")).toBe("word");
		expect(canonicalize("  MiXeD\t")).toBe("mixed");
		expect(canonicalize("two words")).toBe("two words");
	});
});

describe("isBlank", () => {
	it("treats empty and whitespace-only strings as blank", () => {
		expect(isBlank("")).toBe(true);
		expect(isBlank(" \n\t")).toBe(true);
		expect(isBlank(" a ")).toBe(false);
	});
});

describe("validatePair", () => {
	it("returns both words in canonical form", async () => {
		const pair = await Effect.runPromise(validatePair("Happy", " glad "));
		expect(pair).toEqual(["happy", "glad"]);
	});

	it("checks blankness before sameness", async () => {
		const result = await Effect.runPromise(Effect.either(validatePair(" ", " ")));
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.reason).toBe("BlankWord");
		}
	});

	it("rejects words equal once canonicalized", async () => {
		const error = await Effect.runPromise(
			Effect.flip(validatePair("Same", "same ")),
		);
		expect(error.reason).toBe("SelfSynonym");
		expect(error.words).toEqual(["Same", "same "]);
	});
});

describe("validateChain", () => {
	it("keeps input order", async () => {
		const words = await Effect.runPromise(validateChain(["C", "b", "A"]));
		expect(words).toEqual(["c", "b", "a"]);
	});

	it("checks the word count first", async () => {
		const error = await Effect.runPromise(Effect.flip(validateChain([" "])));
		expect(error.reason).toBe("TooFewWords");
	});

	it("checks blank words before duplicates", async () => {
		const error = await Effect.runPromise(
			Effect.flip(validateChain(["", "", "a"])),
		);
		expect(error.reason).toBe("BlankWord");
	});

	it("finds duplicates that differ only in case", async () => {
		const error = await Effect.runPromise(
			Effect.flip(validateChain(["one", "two", "ONE"])),
		);
		expect(error.reason).toBe("DuplicateWords");
	});
});
