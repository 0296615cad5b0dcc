// CHANGE: Decode the triggering event from flags, environment and the event payload file
// WHY: Malformed commit lists must fail fast with a diagnostic instead of yielding a malformed range
// SOURCE: https://effect.website/docs/schema/introduction
// PURITY: SHELL (reads the event file lazily, only when flags and env do not cover the event)
// EFFECT: Effect<TriggerEvent, EventPayloadError | MissingEventData | FSError>
// INVARIANT: push commits keep payload order (oldest first); extra fields are ignored
// COMPLEXITY: O(n) where n = |commits|

import { Effect, ParseResult, Schema } from "effect";

import {
	EventPayloadError,
	FSError,
	MissingEventData,
} from "../../core/errors.js";
import type {
	CommitRef,
	PullRequestPayload,
	TriggerEvent,
} from "../../core/models.js";
import type { CLIOptions } from "../../core/types/index.js";
import { fs } from "../utils/node-mods.js";

/**
 * Revision as it may appear in a range: no whitespace (newlines would split a
 * GITHUB_OUTPUT entry) and no leading "-" (git would read it as an option).
 */
export const RevisionSchema = Schema.String.pipe(
	Schema.pattern(/^[^\s-]\S*$/u, {
		message: () => "expected a revision without whitespace or a leading '-'",
	}),
);

const CommitRefSchema = Schema.Struct({ id: RevisionSchema });

/** `toJson(github.event.commits)` is `null` for branch deletions. */
const CommitListSchema = Schema.NullOr(Schema.Array(CommitRefSchema));

const CommitListJson = Schema.parseJson(CommitListSchema);

const PushEventFileSchema = Schema.Struct({
	commits: Schema.optional(CommitListSchema),
});

const ShaSchema = Schema.Struct({ sha: RevisionSchema });

const PullRequestEventFileSchema = Schema.Struct({
	pull_request: Schema.Struct({ base: ShaSchema, head: ShaSchema }),
});

type EventInputs = Pick<
	CLIOptions,
	"eventName" | "eventPath" | "commitsJson" | "baseSha" | "headSha"
>;

const formatParseError = (error: ParseResult.ParseError): string =>
	ParseResult.TreeFormatter.formatErrorSync(error);

/**
 * Reads and parses the event payload file.
 *
 * @effect Effect<unknown, MissingEventData | FSError | EventPayloadError>
 */
export function readEventFile(
	eventPath: string | undefined,
): Effect.Effect<unknown, MissingEventData | FSError | EventPayloadError> {
	if (eventPath === undefined) {
		return Effect.fail(
			new MissingEventData({
				what: "event payload",
				hint: "Pass the data via flags/environment or set GITHUB_EVENT_PATH (--event-path).",
			}),
		);
	}
	return Effect.tryPromise({
		try: () => fs.promises.readFile(eventPath, "utf8"),
		catch: (error) =>
			new FSError({
				path: eventPath,
				detail: error instanceof Error ? error.message : String(error),
			}),
	}).pipe(
		Effect.flatMap((text) =>
			Effect.try({
				try: (): unknown => JSON.parse(text),
				catch: (error) =>
					new EventPayloadError({
						source: eventPath,
						detail: error instanceof Error ? error.message : String(error),
					}),
			}),
		),
	);
}

/**
 * Decodes a JSON commit list (`--commits` / COMMIT_LIST).
 *
 * @pure false (Effect for typed failure only)
 * @invariant null → []
 */
export function decodeCommitList(
	json: string,
	source: string,
): Effect.Effect<readonly CommitRef[], EventPayloadError> {
	return Schema.decodeUnknown(CommitListJson)(json).pipe(
		Effect.map((commits) => commits ?? []),
		Effect.mapError(
			(error) =>
				new EventPayloadError({ source, detail: formatParseError(error) }),
		),
	);
}

function pushEvent(
	inputs: EventInputs,
): Effect.Effect<TriggerEvent, EventPayloadError | MissingEventData | FSError> {
	if (inputs.commitsJson !== undefined) {
		return decodeCommitList(inputs.commitsJson, "commit list").pipe(
			Effect.map((commits) => ({ kind: "push" as const, commits })),
		);
	}
	const source = inputs.eventPath ?? "event payload";
	return readEventFile(inputs.eventPath).pipe(
		Effect.flatMap((payload) =>
			Schema.decodeUnknown(PushEventFileSchema)(payload).pipe(
				Effect.mapError(
					(error) =>
						new EventPayloadError({ source, detail: formatParseError(error) }),
				),
			),
		),
		Effect.map(({ commits }) => ({
			kind: "push" as const,
			commits: commits ?? [],
		})),
	);
}

/**
 * Validates a revision supplied by a flag or the environment.
 *
 * @invariant result ∉ {"", whitespace, "-..."}
 */
export function decodeRevision(
	value: string,
	source: string,
): Effect.Effect<string, EventPayloadError> {
	return Schema.decodeUnknown(RevisionSchema)(value).pipe(
		Effect.mapError(
			(error) =>
				new EventPayloadError({ source, detail: formatParseError(error) }),
		),
	);
}

const decodeOptionalRevision = (
	value: string | undefined,
	source: string,
): Effect.Effect<string | undefined, EventPayloadError> =>
	value === undefined ? Effect.succeed(undefined) : decodeRevision(value, source);

function pullRequestEvent(
	inputs: EventInputs,
): Effect.Effect<TriggerEvent, EventPayloadError | MissingEventData | FSError> {
	return Effect.gen(function* () {
		const baseSha = yield* decodeOptionalRevision(inputs.baseSha, "base");
		const headSha = yield* decodeOptionalRevision(inputs.headSha, "head");
		if (baseSha !== undefined && headSha !== undefined) {
			return { kind: "pull_request" as const, baseSha, headSha };
		}
		return yield* pullRequestFromFile(inputs.eventPath, baseSha, headSha);
	});
}

function pullRequestFromFile(
	eventPath: string | undefined,
	baseSha: string | undefined,
	headSha: string | undefined,
): Effect.Effect<TriggerEvent, EventPayloadError | MissingEventData | FSError> {
	const source = eventPath ?? "event payload";
	return readEventFile(eventPath).pipe(
		Effect.flatMap((payload) =>
			Schema.decodeUnknown(PullRequestEventFileSchema)(payload).pipe(
				Effect.mapError(
					(error) =>
						new EventPayloadError({ source, detail: formatParseError(error) }),
				),
			),
		),
		Effect.map(({ pull_request }): PullRequestPayload => ({
			baseSha: baseSha ?? pull_request.base.sha,
			headSha: headSha ?? pull_request.head.sha,
		})),
		Effect.map((payload) => ({ kind: "pull_request" as const, ...payload })),
	);
}

/**
 * Builds the TriggerEvent.
 *
 * Precedence: flags, then environment (already merged into `inputs`), then the
 * event payload file.
 *
 * @effect Effect<TriggerEvent, EventPayloadError | MissingEventData | FSError>
 */
export function loadTriggerEvent(
	inputs: EventInputs,
): Effect.Effect<TriggerEvent, EventPayloadError | MissingEventData | FSError> {
	const { eventName } = inputs;
	if (eventName === undefined) {
		return Effect.fail(
			new MissingEventData({
				what: "event name",
				hint: "Set GITHUB_EVENT_NAME or pass --event-name.",
			}),
		);
	}
	switch (eventName) {
		case "push":
			return pushEvent(inputs);
		case "pull_request":
			return pullRequestEvent(inputs);
		default:
			return Effect.succeed({ kind: "other" as const, eventName });
	}
}
