// CHANGE: Pure commit-range derivation rules
// WHY: Isolate every branch of the resolution algorithm from git and the environment
// FORMAT THEOREM: ∀e ∈ TriggerEvent: planRange(e) is total and deterministic
// PURITY: CORE
// INVARIANT: push with n ≤ 1 commits → empty; pull_request → base...head; other → empty
// COMPLEXITY: O(1) time / O(1) space

import { match } from "ts-pattern";

import type {
	CommitRange,
	RangeResolution,
	RevisionId,
	TriggerEvent,
	UndeterminedReason,
} from "./models.js";

/**
 * What the resolver still has to do for an event.
 *
 * `needs-parents` is the only plan that requires a git query: the parent
 * count of the oldest pushed commit.
 */
export type RangePlan =
	| {
			readonly kind: "needs-parents";
			readonly oldest: RevisionId;
			readonly newest: RevisionId;
	  }
	| { readonly kind: "done"; readonly resolution: RangeResolution };

/**
 * `oldest^k...newest`.
 *
 * With k = 1 this is the commit's only parent; with k = 2 on a merge commit it
 * is the merged-in side, which keeps the base branch history out of the range.
 * k = 0 refers to `oldest` itself.
 *
 * @pure true
 * @precondition parentCount ≥ 0
 */
export const parentRange = (
	oldest: RevisionId,
	parentCount: number,
	newest: RevisionId,
): CommitRange => `${oldest}^${parentCount}...${newest}`;

/**
 * @pure true
 */
export const threeDotRange = (
	base: RevisionId,
	head: RevisionId,
): CommitRange => `${base}...${head}`;

export const resolved = (range: CommitRange): RangeResolution => ({
	status: "resolved",
	range,
});

export const undetermined = (
	reason: UndeterminedReason,
	eventName: string,
): RangeResolution => ({
	status: "undetermined",
	range: "",
	reason,
	eventName,
});

/**
 * Decides the resolution for an event, deferring only the parent lookup.
 *
 * @pure true
 * @invariant result.kind = "needs-parents" → event.kind = "push" ∧ |commits| ≥ 2
 * @complexity O(1)
 */
export const planRange = (event: TriggerEvent): RangePlan =>
	match(event)
		.returnType<RangePlan>()
		.with({ kind: "push" }, ({ commits }) => {
			const oldest = commits.at(0);
			const newest = commits.at(-1);
			if (commits.length <= 1 || oldest === undefined || newest === undefined) {
				return {
					kind: "done",
					resolution: undetermined(
						commits.length === 0 ? "no-commits" : "single-commit",
						"push",
					),
				};
			}
			return { kind: "needs-parents", oldest: oldest.id, newest: newest.id };
		})
		.with({ kind: "pull_request" }, ({ baseSha, headSha }) => ({
			kind: "done",
			resolution: resolved(threeDotRange(baseSha, headSha)),
		}))
		.with({ kind: "other" }, ({ eventName }) => ({
			kind: "done",
			resolution: undetermined("unsupported-event", eventName),
		}))
		.exhaustive();

/**
 * Splits whitespace-separated git output (`%P`, `rev-list`) into revision ids.
 *
 * @pure true
 * @example splitRevisionList("a1 b2\n") // ["a1", "b2"]
 */
export const splitRevisionList = (stdout: string): readonly RevisionId[] =>
	stdout.split(/\s+/u).filter((token) => token.length > 0);
