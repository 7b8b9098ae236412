/**
 * Shared constants and generators for property-based testing.
 *
 * This module provides:
 * - DEFAULT_NUM_RUNS: default number of test runs per property (100)
 * - getNumRuns(): reads FC_NUM_RUNS env variable or returns default
 * - word and pair arbitraries over a small vocabulary, so merges are frequent
 * - referencePartition(): the expected partition, computed by a plain union-find
 */

import * as fc from "fast-check";

/**
 * Default number of runs per property test.
 */
export const DEFAULT_NUM_RUNS = 100;

/**
 * Get the number of runs for property tests.
 * Reads from FC_NUM_RUNS environment variable if set, otherwise returns DEFAULT_NUM_RUNS.
 *
 * @example
 * // In shell: FC_NUM_RUNS=1000 npm test
 * // In test: fc.assert(fc.property(...), { numRuns: getNumRuns() })
 */
export const getNumRuns = (): number => {
	const envValue = process.env.FC_NUM_RUNS;
	if (envValue === undefined || envValue === "") {
		return DEFAULT_NUM_RUNS;
	}
	const parsed = Number.parseInt(envValue, 10);
	if (Number.isNaN(parsed) || parsed <= 0) {
		return DEFAULT_NUM_RUNS;
	}
	return parsed;
};

export type WordPair = readonly [string, string];

/**
 * Lowercase words drawn from `vocabularySize` distinct entries.
 */
export const wordArbitrary = (vocabularySize = 24): fc.Arbitrary<string> =>
	fc.integer({ min: 0, max: vocabularySize - 1 }).map((n) => `w${n}`);

/**
 * A pair of distinct words, each randomly upper-cased, so the pair is only
 * valid after canonicalization compares them.
 */
export const pairArbitrary = (vocabularySize = 24): fc.Arbitrary<WordPair> =>
	fc
		.tuple(
			wordArbitrary(vocabularySize),
			wordArbitrary(vocabularySize),
			fc.boolean(),
			fc.boolean(),
		)
		.filter(([a, b]) => a !== b)
		.map(
			([a, b, upperA, upperB]): WordPair => [
				upperA ? a.toUpperCase() : a,
				upperB ? b.toUpperCase() : b,
			],
		);

export const pairsArbitrary = (
	maxLength = 40,
	vocabularySize = 24,
): fc.Arbitrary<ReadonlyArray<WordPair>> =>
	fc.array(pairArbitrary(vocabularySize), { minLength: 0, maxLength });

/**
 * Order-free representation of a partition: each group sorted and joined,
 * then the groups sorted.
 */
export const partitionKey = (
	groups: Iterable<Iterable<string>>,
): ReadonlyArray<string> =>
	Array.from(groups, (group) => Array.from(group).sort().join(" ")).sort();

/**
 * The partition `pairs` should produce, computed with a path-splitting
 * union-find over lowercased words.
 */
export const referencePartition = (
	pairs: ReadonlyArray<WordPair>,
): ReadonlyArray<string> => {
	const parent = new Map<string, string>();

	const find = (word: string): string => {
		let current = word;
		let next = parent.get(current) ?? current;
		while (next !== current) {
			const grand = parent.get(next) ?? next;
			parent.set(current, grand);
			current = next;
			next = grand;
		}
		return current;
	};

	for (const [a, b] of pairs) {
		const x = a.toLowerCase();
		const y = b.toLowerCase();
		if (!parent.has(x)) parent.set(x, x);
		if (!parent.has(y)) parent.set(y, y);
		const rootX = find(x);
		const rootY = find(y);
		if (rootX !== rootY) {
			parent.set(rootX, rootY);
		}
	}

	const groups = new Map<string, Array<string>>();
	for (const word of parent.keys()) {
		const root = find(word);
		const members = groups.get(root) ?? [];
		members.push(word);
		groups.set(root, members);
	}
	return partitionKey(groups.values());
};
