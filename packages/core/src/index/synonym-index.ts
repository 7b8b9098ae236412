import {
	Array as Arr,
	Context,
	Effect,
	Layer,
	STM,
	TReentrantLock,
} from "effect";
import type { InvalidArgumentError } from "../errors/argument-errors.js";
import {
	createIndexState,
	type LinkOutcome,
	linkPair,
	resetIndexState,
	snapshotGroups,
	synonymsOf,
} from "../state/index-state.js";
import {
	canonicalize,
	isBlank,
	validateChain,
	validatePair,
} from "../words/canonical.js";

// ============================================================================
// SynonymIndex Effect Service
// ============================================================================

/**
 * An in-memory dictionary of synonym groups.
 *
 * Mutations hold the write lock for their whole run and reads hold the read
 * lock, so a reader sees either the partition before a merge or the one after
 * it, never a word moved without its group. Every returned collection is a
 * fresh copy owned by the caller.
 */
export interface SynonymIndexShape {
	/**
	 * Makes two words synonyms, merging whatever groups they already belong to.
	 * Fails with `InvalidArgumentError` when either word is blank or both are
	 * the same word once lowercased.
	 */
	readonly add: (
		word1: string,
		word2: string,
	) => Effect.Effect<void, InvalidArgumentError>;

	/**
	 * Links each consecutive pair of `words` in input order, so every word ends
	 * up in one group. Fails, without touching the index, on fewer than two
	 * words, a blank word, or duplicates.
	 */
	readonly addAll: (
		words: ReadonlyArray<string>,
	) => Effect.Effect<void, InvalidArgumentError>;

	/**
	 * Words sharing a group with `word`, excluding `word` itself. Empty for
	 * unknown or blank words.
	 */
	readonly get: (word: string) => Effect.Effect<ReadonlySet<string>>;

	/** Every group, in no particular order. */
	readonly getAll: () => Effect.Effect<ReadonlyArray<ReadonlySet<string>>>;

	/** Forgets every word and group. */
	readonly clear: () => Effect.Effect<void>;
}

export class SynonymIndex extends Context.Tag("SynonymIndex")<
	SynonymIndex,
	SynonymIndexShape
>() {}

// ============================================================================
// Construction
// ============================================================================

const logOutcome = (
	word1: string,
	word2: string,
	outcome: LinkOutcome,
): Effect.Effect<void> => {
	const annotations: Record<string, unknown> = {
		word1,
		word2,
		group: outcome.group.toString(),
	};
	if (outcome._tag === "Merged") {
		annotations.mergedFrom = outcome.from.map(String).join(",");
		annotations.size = outcome.size;
	}
	return Effect.logDebug(`synonyms ${outcome._tag.toLowerCase()}`).pipe(
		Effect.annotateLogs(annotations),
	);
};

/**
 * Creates an empty, independent index with its own lock.
 */
export const makeSynonymIndex: Effect.Effect<SynonymIndexShape> = Effect.gen(
	function* () {
		const lock = yield* STM.commit(TReentrantLock.make);
		const state = createIndexState();

		const exclusive = <A>(mutate: () => A): Effect.Effect<A> =>
			TReentrantLock.withWriteLock(Effect.sync(mutate), lock);
		const shared = <A>(read: () => A): Effect.Effect<A> =>
			TReentrantLock.withReadLock(Effect.sync(read), lock);

		const link = (word1: string, word2: string): Effect.Effect<void> =>
			exclusive(() => linkPair(state, word1, word2)).pipe(
				Effect.flatMap((outcome) => logOutcome(word1, word2, outcome)),
			);

		const add = (
			word1: string,
			word2: string,
		): Effect.Effect<void, InvalidArgumentError> =>
			validatePair(word1, word2).pipe(
				Effect.flatMap(([first, second]) => link(first, second)),
			);

		const addAll = (
			words: ReadonlyArray<string>,
		): Effect.Effect<void, InvalidArgumentError> =>
			validateChain(words).pipe(
				Effect.flatMap((canonical) =>
					Effect.forEach(
						Arr.zip(canonical, canonical.slice(1)),
						([first, second]) => link(first, second),
						{ discard: true },
					),
				),
			);

		const get = (word: string): Effect.Effect<ReadonlySet<string>> =>
			isBlank(word)
				? Effect.succeed(new Set<string>())
				: shared(() => synonymsOf(state, canonicalize(word)));

		const getAll = (): Effect.Effect<ReadonlyArray<ReadonlySet<string>>> =>
			shared(() => snapshotGroups(state));

		const clear = (): Effect.Effect<void> =>
			exclusive(() => resetIndexState(state)).pipe(
				Effect.zipRight(Effect.logInfo("synonym index cleared")),
			);

		return { add, addAll, get, getAll, clear } satisfies SynonymIndexShape;
	},
);

/**
 * Layer providing a fresh, empty SynonymIndex.
 */
export const SynonymIndexLive: Layer.Layer<SynonymIndex> = Layer.effect(
	SynonymIndex,
	makeSynonymIndex,
);
