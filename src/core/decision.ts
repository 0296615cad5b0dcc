// CHANGE: Pure decision function mapping a run outcome to the process exit code
// WHY: Centralize termination logic in Functional Core
// FORMAT THEOREM: ∀o ∈ RunOutcome: o.ok ↔ computeExitCode(o) = 0
// PURITY: CORE
// INVARIANT: An undetermined (empty) range is a success, not a failure
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { AppError } from "./errors.js";
import type { ExitCode, RangeResolution } from "./models.js";

export type RunOutcome =
	| { readonly ok: true; readonly resolution: RangeResolution }
	| { readonly ok: false; readonly error: AppError };

/**
 * Computes process exit code from the run outcome.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 *
 * @example
 * ```ts
 * computeExitCode({ ok: true, resolution: { status: "resolved", range: "a...b" } }); // 0
 * ```
 */
export const computeExitCode = (outcome: RunOutcome): ExitCode =>
	pipe(
		outcome,
		(o) => o.ok,
		(ok): ExitCode => (ok ? 0 : 1),
	);
