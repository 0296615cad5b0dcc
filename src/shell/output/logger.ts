// CHANGE: Console reporting for the commit-range run
// WHY: stdout is reserved for the published value, so every log line goes to stderr
// PURITY: SHELL (console output)
// INVARIANT: Exactly one COMMIT_RANGE line per successful run
// COMPLEXITY: O(1) per line

import { match } from "ts-pattern";

import type { RangeResolution, UndeterminedReason } from "../../core/models.js";

const MAGENTA = "\u001b[35m";
const BOLD = "\u001b[1m";
const RESET = "\u001b[0m";

const reasonText: Readonly<Record<UndeterminedReason, string>> = {
	"no-commits": "push carries no commits",
	"single-commit": "push carries a single commit",
	"unsupported-event": "no range rule for this event",
};

/**
 * Highlighted range line.
 *
 * @pure true
 * @example formatRangeLine("a...b") // "\u001b[35m\u001b[1m COMMIT_RANGE = a...b \u001b[0m"
 */
export const formatRangeLine = (range: string): string =>
	`${MAGENTA}${BOLD} COMMIT_RANGE = ${range} ${RESET}`;

/**
 * Explanation for an undetermined result, or null when the range was resolved.
 *
 * @pure true
 */
export const describeResolution = (resolution: RangeResolution): string | null =>
	match(resolution)
		.returnType<string | null>()
		.with({ status: "resolved" }, () => null)
		.with(
			{ status: "undetermined" },
			({ reason, eventName }) =>
				`⚠️ Commit range undetermined for "${eventName}": ${reasonText[reason]}`,
		)
		.exhaustive();

export function logResolution(resolution: RangeResolution): void {
	const note = describeResolution(resolution);
	if (note !== null) {
		console.error(note);
	}
	console.error(formatRangeLine(resolution.range));
}

export function logCommits(commits: readonly string[]): void {
	console.error(`🧾 ${commits.length} commit(s) in range:`);
	for (const commit of commits) {
		console.error(`   ${commit}`);
	}
}

export function logInfo(message: string): void {
	console.error(message);
}

export function logFailure(message: string): void {
	console.error(`❌ ${message}`);
}
