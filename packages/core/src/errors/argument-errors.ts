import { Data } from "effect";

// ============================================================================
// Effect TaggedError Argument Error Types
// ============================================================================

/**
 * Why a mutation was rejected. Checked before the index is touched, so a
 * rejected call never changes the partition.
 */
export type InvalidArgumentReason =
	| "BlankWord"
	| "SelfSynonym"
	| "TooFewWords"
	| "DuplicateWords";

export class InvalidArgumentError extends Data.TaggedError(
	"InvalidArgumentError",
)<{
	readonly reason: InvalidArgumentReason;
	readonly words: ReadonlyArray<string>;
	readonly message: string;
}> {}

/**
 * Fixed message for each rejection reason.
 */
export const INVALID_ARGUMENT_MESSAGES: Readonly<
	Record<InvalidArgumentReason, string>
> = {
	BlankWord: "Words cannot be blank",
	SelfSynonym: "A word cannot be a synonym of itself",
	TooFewWords: "At least two words must be passed",
	DuplicateWords: "Words contain duplicates",
};

export const invalidArgument = (
	reason: InvalidArgumentReason,
	words: ReadonlyArray<string>,
): InvalidArgumentError =>
	new InvalidArgumentError({
		reason,
		words,
		message: INVALID_ARGUMENT_MESSAGES[reason],
	});
