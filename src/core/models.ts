// CHANGE: Functional Core domain models for commit-range resolution (pure, immutable)
// WHY: Event kinds are a tagged union matched exhaustively instead of string comparisons
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the CLI process.
 *
 * @remarks
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/** Revision hash as reported by git. */
export type RevisionId = string;

export interface CommitRef {
	readonly id: RevisionId;
}

/**
 * Commits carried by a push, oldest first.
 */
export interface PushPayload {
	readonly commits: readonly CommitRef[];
}

export interface PullRequestPayload {
	readonly baseSha: RevisionId;
	readonly headSha: RevisionId;
}

/**
 * Triggering event.
 *
 * @remarks
 * - @invariant kind is the discriminant; `other` keeps the raw event name for diagnostics
 */
export type TriggerEvent =
	| ({ readonly kind: "push" } & PushPayload)
	| ({ readonly kind: "pull_request" } & PullRequestPayload)
	| { readonly kind: "other"; readonly eventName: string };

/**
 * Ordered parents of a revision: 0 for a root, 1 for a regular commit, 2+ for a merge.
 */
export type ParentSet = readonly RevisionId[];

/**
 * Range expression for `git log` / `git rev-list`; the empty string means "undetermined".
 */
export type CommitRange = string;

export type UndeterminedReason =
	| "no-commits"
	| "single-commit"
	| "unsupported-event";

/**
 * Outcome of a resolution.
 *
 * @remarks
 * - @invariant status = "undetermined" ↔ range = ""
 */
export type RangeResolution =
	| { readonly status: "resolved"; readonly range: CommitRange }
	| {
			readonly status: "undetermined";
			readonly range: "";
			readonly reason: UndeterminedReason;
			readonly eventName: string;
	  };
