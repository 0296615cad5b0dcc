// CHANGE: Application-level resolver composing the pure plan with the single git query
// WHY: CORE decides every branch; only the push case with ≥ 2 commits reaches git
// PURITY: APP
// EFFECT: Effect<RangeResolution, ExecError>
// INVARIANT: Same event and same parent answers → same resolution (no hidden state)
// COMPLEXITY: O(1) plus at most one git invocation

import { Effect } from "effect";
import { match } from "ts-pattern";

import type { ExecError } from "../core/errors.js";
import type { RangeResolution, TriggerEvent } from "../core/models.js";
import { parentRange, planRange, resolved } from "../core/range.js";
import type { GitClient } from "../shell/git/index.js";

/**
 * Computes the commit range for an event.
 *
 * @param event - Decoded trigger event
 * @param git - Parent lookup (real git or a fake)
 *
 * @example
 * ```ts
 * // oldest "a" has one parent
 * resolveCommitRange({ kind: "push", commits: [{ id: "a" }, { id: "b" }] }, git);
 * // => { status: "resolved", range: "a^1...b" }
 * ```
 */
export function resolveCommitRange(
	event: TriggerEvent,
	git: Pick<GitClient, "getParents">,
): Effect.Effect<RangeResolution, ExecError> {
	return match(planRange(event))
		.returnType<Effect.Effect<RangeResolution, ExecError>>()
		.with({ kind: "done" }, ({ resolution }) => Effect.succeed(resolution))
		.with({ kind: "needs-parents" }, ({ oldest, newest }) =>
			git
				.getParents(oldest)
				.pipe(
					Effect.map((parents) =>
						resolved(parentRange(oldest, parents.length, newest)),
					),
				),
		)
		.exhaustive();
}
