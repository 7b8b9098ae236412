import { Data } from "effect";

/**
 * A request whose parameters could not be turned into index arguments:
 * a missing or blank `word`, or a POST with no words at all.
 */
export class RequestValidationError extends Data.TaggedError(
	"RequestValidationError",
)<{
	readonly parameter: string;
	readonly message: string;
}> {}
