// CHANGE: Typed domain error ADT for the commit-range pipeline using Effect.Data
// WHY: Errors are values discriminated by `_tag`, never runtime exceptions from CORE
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Event payload could not be decoded (malformed JSON, missing `id`, missing sha).
 *
 * @pure true (Data class)
 * @invariant source.length > 0 ∧ detail.length > 0
 */
export class EventPayloadError extends Data.TaggedError("EventPayloadError")<{
	readonly source: string;
	readonly detail: string;
}> {}

/**
 * A required input is absent from both flags and environment.
 *
 * @pure true (Data class)
 */
export class MissingEventData extends Data.TaggedError("MissingEventData")<{
	readonly what: string;
	readonly hint: string;
}> {}

/**
 * Event kind has no derivation rule and strict mode is on.
 *
 * @pure true (Data class)
 */
export class UnknownEventKind extends Data.TaggedError("UnknownEventKind")<{
	readonly eventName: string;
}> {}

/**
 * Command execution error
 *
 * @pure true (Data class)
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Output name or value would break the one-entry-per-line GITHUB_OUTPUT format.
 *
 * @pure true (Data class)
 */
export class OutputValueError extends Data.TaggedError("OutputValueError")<{
	readonly name: string;
	readonly detail: string;
}> {}

export type AppError =
	| EventPayloadError
	| MissingEventData
	| UnknownEventKind
	| ExecError
	| FSError
	| OutputValueError;

/**
 * Renders an application error as a single diagnostic line.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeError = (error: AppError): string => {
	switch (error._tag) {
		case "EventPayloadError":
			return `Malformed event payload (${error.source}): ${error.detail}`;
		case "MissingEventData":
			return `Missing ${error.what}. ${error.hint}`;
		case "UnknownEventKind":
			return `No commit range rule for event "${error.eventName}" (strict mode)`;
		case "Exec":
			return `Command failed: ${error.command}: ${error.detail}`;
		case "FS":
			return error.path === undefined
				? `Filesystem error: ${error.detail}`
				: `Filesystem error at ${error.path}: ${error.detail}`;
		case "OutputValueError":
			return `Cannot publish output "${error.name}": ${error.detail}`;
	}
};
