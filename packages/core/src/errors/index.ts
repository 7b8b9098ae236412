// ============================================================================
// Argument Errors (re-exported from argument-errors.ts)
// ============================================================================

export type { InvalidArgumentReason } from "./argument-errors.js";
export {
	INVALID_ARGUMENT_MESSAGES,
	InvalidArgumentError,
	invalidArgument,
} from "./argument-errors.js";

// ============================================================================
// Union Types
// ============================================================================

import type { InvalidArgumentError } from "./argument-errors.js";

export type SynonymIndexError = InvalidArgumentError;
