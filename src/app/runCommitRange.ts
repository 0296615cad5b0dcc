// CHANGE: Application layer orchestration for one commit-range run
// WHY: APP composes CORE decisions with SHELL integrations and returns an ExitCode as a value
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Every AppError is reported once on stderr and maps to exit code 1
// COMPLEXITY: O(n) where n = |commits| in the event payload

import { Effect } from "effect";

import { computeExitCode, type RunOutcome } from "../core/decision.js";
import { type AppError, describeError, UnknownEventKind } from "../core/errors.js";
import type { ExitCode, RangeResolution } from "../core/models.js";
import type { CLIOptions } from "../core/types/index.js";
import { USAGE } from "../shell/config/usage.js";
import { createGitClient, type GitClient } from "../shell/git/index.js";
import { loadTriggerEvent } from "../shell/github/event.js";
import { publishOutput } from "../shell/github/output.js";
import {
	logCommits,
	logFailure,
	logInfo,
	logResolution,
} from "../shell/output/logger.js";
import { resolveCommitRange } from "./resolveCommitRange.js";

export interface RunDependencies {
	readonly git: GitClient;
}

/**
 * Rejects an undetermined event kind when strict mode is on.
 *
 * @pure true
 */
function enforceStrict(
	resolution: RangeResolution,
	strict: boolean,
): Effect.Effect<RangeResolution, UnknownEventKind> {
	if (
		strict &&
		resolution.status === "undetermined" &&
		resolution.reason === "unsupported-event"
	) {
		return Effect.fail(
			new UnknownEventKind({ eventName: resolution.eventName }),
		);
	}
	return Effect.succeed(resolution);
}

/**
 * Resolve, report and publish the commit range.
 *
 * @effect Effect<RangeResolution, AppError>
 */
export function computeAndPublish(
	options: CLIOptions,
	deps: RunDependencies,
): Effect.Effect<RangeResolution, AppError> {
	return Effect.gen(function* () {
		const event = yield* loadTriggerEvent(options);
		const resolution = yield* resolveCommitRange(event, deps.git).pipe(
			Effect.flatMap((r) => enforceStrict(r, options.strict)),
		);
		logResolution(resolution);

		if (options.listCommits && resolution.status === "resolved") {
			const commits = yield* deps.git.listCommits(resolution.range);
			logCommits(commits);
		}

		const target = yield* publishOutput(
			options.outputName,
			resolution.range,
			options.outputFile,
		);
		if (target === "github-output") {
			logInfo(`✅ Published output "${options.outputName}"`);
		}
		return resolution;
	});
}

/**
 * Orchestrates the run and returns ExitCode as value (no process.exit).
 *
 * @param options - Parsed CLI options
 * @param deps - Git boundary; defaults to the system git in `options.cwd`
 *
 * @invariant ExitCode ∈ {0,1}
 * @postcondition failure → 1; resolved or undetermined range → 0
 */
export function runCommitRange(
	options: CLIOptions,
	deps: RunDependencies = { git: createGitClient(options.cwd) },
): Effect.Effect<ExitCode, never> {
	if (options.help) {
		return Effect.sync(() => {
			console.log(USAGE);
			return 0 as const;
		});
	}
	return computeAndPublish(options, deps).pipe(
		Effect.match({
			onFailure: (error): RunOutcome => {
				logFailure(describeError(error));
				return { ok: false, error };
			},
			onSuccess: (resolution): RunOutcome => ({ ok: true, resolution }),
		}),
		Effect.map(computeExitCode),
	);
}
