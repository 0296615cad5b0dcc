// CHANGE: Make main.ts a thin APP delegator
// WHY: main parses CLI options and delegates orchestration to app/runCommitRange
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without side effects on the process
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { runCommitRange } from "./app/runCommitRange.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/index.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param argv - Arguments without `node` and the script name
 * @returns ExitCode (0 | 1)
 */
export async function main(
	argv: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	return Effect.runPromise(runCommitRange(parseCLIArgs(argv)));
}
