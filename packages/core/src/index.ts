/**
 * Main entry point for @synonymy/core.
 *
 * Exports the synonym index service, word canonicalization and the typed
 * errors its mutations fail with.
 */

// ============================================================================
// Synonym Index Service
// ============================================================================

export {
	makeSynonymIndex,
	SynonymIndex,
	SynonymIndexLive,
} from "./index/synonym-index.js";

export type { SynonymIndexShape } from "./index/synonym-index.js";

// ============================================================================
// Index State
// ============================================================================

export {
	createIndexState,
	findInconsistencies,
	linkPair,
	resetIndexState,
	snapshotGroups,
	synonymsOf,
} from "./state/index-state.js";

export type { GroupId, IndexState, LinkOutcome } from "./state/index-state.js";

// ============================================================================
// Words
// ============================================================================

export {
	canonicalize,
	isBlank,
	validateChain,
	validatePair,
} from "./words/canonical.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	INVALID_ARGUMENT_MESSAGES,
	InvalidArgumentError,
	invalidArgument,
} from "./errors/index.js";

export type { InvalidArgumentReason, SynonymIndexError } from "./errors/index.js";
