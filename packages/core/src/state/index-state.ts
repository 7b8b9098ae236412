/**
 * Mutable state behind a synonym index: the word → group and
 * group → words maps plus the group id sequence.
 *
 * Nothing here locks. Every function assumes the caller holds the index's
 * write lock (mutations) or read lock (snapshots) for the whole call.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Opaque 64-bit group identifier. Allocated from a sequence that only grows,
 * so an id is never handed out twice, even across `clear`.
 */
export type GroupId = bigint;

export interface IndexState {
	readonly wordToGroup: Map<string, GroupId>;
	readonly groupToWords: Map<GroupId, Set<string>>;
	/** Last id handed out; 0n before the first group exists. */
	lastGroupId: GroupId;
}

/**
 * What a single pairwise link did to the partition.
 */
export type LinkOutcome =
	| { readonly _tag: "Created"; readonly group: GroupId }
	| {
			readonly _tag: "Linked";
			readonly group: GroupId;
			readonly word: string;
	  }
	| { readonly _tag: "Unchanged"; readonly group: GroupId }
	| {
			readonly _tag: "Merged";
			readonly from: readonly [GroupId, GroupId];
			readonly group: GroupId;
			readonly size: number;
	  };

// ============================================================================
// Construction
// ============================================================================

export const createIndexState = (): IndexState => ({
	wordToGroup: new Map(),
	groupToWords: new Map(),
	lastGroupId: 0n,
});

const allocateGroupId = (state: IndexState): GroupId => {
	state.lastGroupId += 1n;
	return state.lastGroupId;
};

// ============================================================================
// Mutations (write lock held)
// ============================================================================

const assign = (state: IndexState, group: GroupId, word: string): void => {
	state.wordToGroup.set(word, group);
	const members = state.groupToWords.get(group);
	if (members === undefined) {
		state.groupToWords.set(group, new Set([word]));
	} else {
		members.add(word);
	}
};

/**
 * Dissolves both groups and moves every member into a freshly allocated one.
 * Neither old id survives, so a stale id can never name the merged group.
 */
const merge = (
	state: IndexState,
	group1: GroupId,
	group2: GroupId,
): LinkOutcome => {
	const members = new Set([
		...(state.groupToWords.get(group1) ?? []),
		...(state.groupToWords.get(group2) ?? []),
	]);
	state.groupToWords.delete(group1);
	state.groupToWords.delete(group2);

	const group = allocateGroupId(state);
	for (const word of members) {
		state.wordToGroup.set(word, group);
	}
	state.groupToWords.set(group, members);
	return { _tag: "Merged", from: [group1, group2], group, size: members.size };
};

/**
 * Makes two distinct canonical words synonyms, merging their groups if both
 * already belong to different ones.
 */
export const linkPair = (
	state: IndexState,
	word1: string,
	word2: string,
): LinkOutcome => {
	const group1 = state.wordToGroup.get(word1);
	const group2 = state.wordToGroup.get(word2);

	if (group1 === undefined) {
		if (group2 === undefined) {
			const group = allocateGroupId(state);
			assign(state, group, word1);
			assign(state, group, word2);
			return { _tag: "Created", group };
		}
		assign(state, group2, word1);
		return { _tag: "Linked", group: group2, word: word1 };
	}
	if (group2 === undefined) {
		assign(state, group1, word2);
		return { _tag: "Linked", group: group1, word: word2 };
	}
	if (group1 === group2) {
		return { _tag: "Unchanged", group: group1 };
	}
	return merge(state, group1, group2);
};

/**
 * Empties both maps. The id sequence keeps counting.
 */
export const resetIndexState = (state: IndexState): void => {
	state.wordToGroup.clear();
	state.groupToWords.clear();
};

// ============================================================================
// Snapshots (read lock held)
// ============================================================================

/**
 * Copy of every word grouped with `word`, without `word` itself.
 */
export const synonymsOf = (state: IndexState, word: string): Set<string> => {
	const group = state.wordToGroup.get(word);
	if (group === undefined) {
		return new Set();
	}
	const synonyms = new Set(state.groupToWords.get(group));
	synonyms.delete(word);
	return synonyms;
};

/**
 * Copy of every group's members.
 */
export const snapshotGroups = (state: IndexState): Array<Set<string>> =>
	Array.from(state.groupToWords.values(), (members) => new Set(members));

// ============================================================================
// Consistency check
// ============================================================================

/**
 * Lists every way the two maps disagree with each other. Empty when the
 * state is consistent.
 */
export const findInconsistencies = (
	state: IndexState,
): ReadonlyArray<string> => {
	const problems: Array<string> = [];

	for (const [word, group] of state.wordToGroup) {
		if (!state.groupToWords.get(group)?.has(word)) {
			problems.push(`"${word}" maps to group ${group} but is not a member`);
		}
	}

	for (const [group, members] of state.groupToWords) {
		if (members.size < 2) {
			problems.push(`group ${group} has ${members.size} member(s)`);
		}
		if (group > state.lastGroupId) {
			problems.push(`group ${group} is ahead of the sequence`);
		}
		for (const word of members) {
			const mapped = state.wordToGroup.get(word);
			if (mapped !== group) {
				problems.push(
					`"${word}" is a member of group ${group} but maps to ${mapped ?? "nothing"}`,
				);
			}
		}
	}

	return problems;
};
